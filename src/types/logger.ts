/**
 * Logging types
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Structured fields written after the message as one JSON object
 */
export type LogMeta = Record<string, unknown>;

/**
 * Logger with bound context, as returned by withContext()
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
