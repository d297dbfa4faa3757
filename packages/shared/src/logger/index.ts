/**
 * Ballast Logger
 * Structured logging with Pino
 */

import pino, { type Logger, type LoggerOptions } from "pino";

// ============================================
// LOGGER CONFIGURATION
// ============================================

const isDevelopment = process.env.NODE_ENV === "development";
const logLevel = process.env.LOG_LEVEL || "info";
const logFormat = process.env.LOG_FORMAT || "json";

const baseOptions: LoggerOptions = {
  level: logLevel,
  base: {
    service: "ballast",
    env: process.env.NODE_ENV || "production",
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      host: bindings.hostname,
      service: bindings.service,
      env: bindings.env,
    }),
  },
  redact: {
    paths: [
      "*.privateKey",
      "*.password",
      "*.secret",
      "*.apiKey",
      "*.signingKey",
    ],
    censor: "[REDACTED]",
  },
};

// Pretty printing for development
const devOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
      messageFormat: "{msg}",
    },
  },
};

// ============================================
// LOGGER INSTANCE
// ============================================

export const logger: Logger =
  isDevelopment && logFormat === "pretty"
    ? pino(devOptions)
    : pino(baseOptions);

// ============================================
// CHILD LOGGERS FOR SERVICES
// ============================================

export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service: serviceName });
}

export const treasuryLogger = createServiceLogger("treasury");

// ============================================
// STRUCTURED LOG HELPERS
// ============================================

interface LedgerMovementLogContext {
  asset: string;
  from?: string;
  to?: string;
  amount: string;
}

/**
 * Logs a token movement (mint, burn, transfer) with structured context
 */
export function logLedgerMovement(
  level: "debug" | "info" | "warn",
  event: string,
  context: LedgerMovementLogContext,
  message?: string
): void {
  treasuryLogger[level](
    {
      event,
      movement: context,
    },
    message || event
  );
}

// ============================================
// AUDIT LOGGING
// ============================================

export interface AuditLogEntry {
  action: string;
  entityType: string;
  entityId?: string;
  actor: string;
  details?: Record<string, unknown>;
}

/**
 * Emits an audit log line for an administrative change
 */
export function audit(entry: AuditLogEntry): void {
  logger.info(
    {
      audit: true,
      ...entry,
      timestamp: new Date().toISOString(),
    },
    `AUDIT: ${entry.action} on ${entry.entityType}${entry.entityId ? ` (${entry.entityId})` : ""} by ${entry.actor}`
  );
}
