export * from "./state-journal.js";
export * from "./reentrancy-guard.js";
