/**
 * Defines the severity levels for errors, allowing for prioritized handling.
 */
export enum ErrorSeverity {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
  CRITICAL = "critical",
}

/**
 * Common error codes used across the application
 */
export enum ErrorCode {
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  NOT_FOUND = "NOT_FOUND",

  // Source adapters
  PAIR_NOT_SUPPORTED = "PAIR_NOT_SUPPORTED",
  RATE_LIMIT_EXCEEDED = "RATE_LIMIT_EXCEEDED",
  TRANSIENT_ERROR = "TRANSIENT_ERROR",
  PROVIDER_ERROR = "PROVIDER_ERROR",

  // Request gateway
  NETWORK_ERROR = "NETWORK_ERROR",
  TIMEOUT_ERROR = "TIMEOUT_ERROR",

  // Persistence
  STORAGE_READ_ERROR = "STORAGE_READ_ERROR",
  STORAGE_WRITE_ERROR = "STORAGE_WRITE_ERROR",
}

/**
 * Base interface for all error details.
 */
export interface IErrorDetails {
  /**
   * Machine-readable error code
   */
  code: ErrorCode;

  /**
   * Human-readable error message
   */
  message: string;

  severity: ErrorSeverity;

  /**
   * Module name where the error originated
   */
  module?: string;

  timestamp: number;

  context?: Record<string, unknown>;
}

/**
 * Normalises anything thrown into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
