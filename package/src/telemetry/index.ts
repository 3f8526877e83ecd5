/**
 * Telemetry (cross-cutting observability).
 *
 * Stable entrypoint for the unified logger (`Logger` / `createLogger` / `logger`).
 */

export type { LogEntry, LogLevel, LoggerOptions } from "./logging/logger.js";
export { Logger, createLogger, logger, normalizeLevel } from "./logging/logger.js";
