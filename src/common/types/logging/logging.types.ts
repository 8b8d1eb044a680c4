import type { LogLevel as NestLogLevel } from "@nestjs/common";

/**
 * Valid values: "error" | "warn" | "log" | "debug" | "verbose" | "fatal"
 */
export type LogLevel = NestLogLevel;

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Check if a message should be logged based on current log level
 */
export function shouldLog(messageLevel: LogLevel, currentLevel: LogLevel): boolean {
  return LOG_LEVELS.indexOf(messageLevel) <= LOG_LEVELS.indexOf(currentLevel);
}

/**
 * Levels enabled for a given threshold, most severe first.
 */
export function enabledLogLevels(currentLevel: LogLevel): LogLevel[] {
  return LOG_LEVELS.filter(level => shouldLog(level, currentLevel));
}
