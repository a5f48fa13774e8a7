import type { LogLevel } from "@/types";

/**
 * Level order: a line is written when its level is at or above LOG_LEVEL
 */
export const LOG_LEVELS: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Used when LOG_LEVEL is unset or not a known level
 */
export const DEFAULT_LOG_LEVEL: LogLevel = "info";
