/**
 * In-Memory Ledger Tests
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  InMemoryAssetLedger,
  InMemoryManagedToken,
  createInMemoryAssetLedger,
  createInMemoryManagedToken,
} from "../ledger/index.js";
import { createStateJournal, type StateJournal } from "../runtime/state-journal.js";
import {
  InsufficientBalanceError,
  InsufficientTokenBalanceError,
  InvalidArgumentError,
} from "../errors.js";
import {
  ALICE,
  BOB,
  TREASURY,
  RESERVE_ADDRESS,
  MANAGED_ADDRESS,
} from "./fixtures.js";

describe("InMemoryAssetLedger", () => {
  let journal: StateJournal;
  let asset: InMemoryAssetLedger;

  beforeEach(() => {
    journal = createStateJournal();
    asset = createInMemoryAssetLedger({ address: RESERVE_ADDRESS, symbol: "RSV", decimals: 6, journal });
    asset.issue(ALICE, 1_000n);
  });

  it("should report decimals, supply and balances", () => {
    expect(asset.decimals()).toBe(6);
    expect(asset.totalSupply()).toBe(1_000n);
    expect(asset.balanceOf(ALICE)).toBe(1_000n);
    expect(asset.balanceOf(BOB)).toBe(0n);
  });

  it("should default to 18 decimals", () => {
    const plain = new InMemoryAssetLedger({ address: MANAGED_ADDRESS, symbol: "PLN" });
    expect(plain.decimals()).toBe(18);
  });

  it("should reject unsupported decimals", () => {
    expect(() => new InMemoryAssetLedger({ address: MANAGED_ADDRESS, symbol: "BAD", decimals: -1 }))
      .toThrow(InvalidArgumentError);
  });

  it("should move balances on transfer without changing supply", () => {
    asset.transfer(ALICE, BOB, 400n);

    expect(asset.balanceOf(ALICE)).toBe(600n);
    expect(asset.balanceOf(BOB)).toBe(400n);
    expect(asset.totalSupply()).toBe(1_000n);
  });

  it("should throw InsufficientBalanceError when the sender is short", () => {
    expect(() => asset.transfer(ALICE, BOB, 1_001n)).toThrow(InsufficientBalanceError);
    expect(asset.balanceOf(ALICE)).toBe(1_000n);
  });

  it("should reject negative transfer amounts", () => {
    expect(() => asset.transfer(ALICE, BOB, -1n)).toThrow(InvalidArgumentError);
  });

  it("should notify the transfer hook after balances move", () => {
    const hook = vi.fn();
    asset.setTransferHook(hook);

    asset.transfer(ALICE, BOB, 5n);

    expect(hook).toHaveBeenCalledTimes(1);
    expect(hook).toHaveBeenCalledWith({ asset: RESERVE_ADDRESS, from: ALICE, to: BOB, amount: 5n });
  });

  it("should restore balances and supply from a journal rollback", () => {
    expect(() =>
      journal.atomically("fail", () => {
        asset.transfer(ALICE, BOB, 300n);
        asset.issue(BOB, 50n);
        throw new Error("abort");
      })
    ).toThrow("abort");

    expect(asset.balanceOf(ALICE)).toBe(1_000n);
    expect(asset.balanceOf(BOB)).toBe(0n);
    expect(asset.totalSupply()).toBe(1_000n);
  });
});

describe("InMemoryManagedToken", () => {
  let journal: StateJournal;
  let reserve: InMemoryAssetLedger;
  let token: InMemoryManagedToken;

  beforeEach(() => {
    journal = createStateJournal();
    reserve = new InMemoryAssetLedger({ address: RESERVE_ADDRESS, symbol: "RSV", journal });
    token = createInMemoryManagedToken({
      address: MANAGED_ADDRESS,
      symbol: "BLST",
      reserveAsset: reserve,
      journal,
    });
    token.mint(ALICE, 500n);
  });

  it("should expose the paired reserve asset", () => {
    expect(token.reserveAsset()).toBe(reserve);
  });

  it("should grow supply on mint", () => {
    expect(token.totalSupply()).toBe(500n);
    expect(token.balanceOf(ALICE)).toBe(500n);
  });

  it("should burn within balance and allowance", () => {
    token.approve(ALICE, TREASURY, 200n);

    token.burnFrom(TREASURY, ALICE, 150n);

    expect(token.balanceOf(ALICE)).toBe(350n);
    expect(token.totalSupply()).toBe(350n);
    expect(token.allowance(ALICE, TREASURY)).toBe(50n);
  });

  it("should reject a burn beyond the allowance", () => {
    token.approve(ALICE, TREASURY, 100n);

    expect(() => token.burnFrom(TREASURY, ALICE, 101n)).toThrow(InsufficientTokenBalanceError);
    expect(token.balanceOf(ALICE)).toBe(500n);
  });

  it("should reject a burn beyond the balance", () => {
    token.approve(ALICE, TREASURY, 1_000n);

    try {
      token.burnFrom(TREASURY, ALICE, 600n);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InsufficientTokenBalanceError);
      expect(error).toMatchObject({ requested: 600n, balance: 500n, allowance: 1_000n });
    }
  });

  it("should restore allowances from a journal rollback", () => {
    token.approve(ALICE, TREASURY, 100n);

    expect(() =>
      journal.atomically("fail", () => {
        token.burnFrom(TREASURY, ALICE, 100n);
        throw new Error("abort");
      })
    ).toThrow("abort");

    expect(token.allowance(ALICE, TREASURY)).toBe(100n);
    expect(token.balanceOf(ALICE)).toBe(500n);
    expect(token.totalSupply()).toBe(500n);
  });
});
