import { ErrorCode, ErrorSeverity, type IErrorDetails } from "./error.types";

/**
 * Outcome classes a source adapter can report for a single fetch.
 */
export enum SourceErrorKind {
  /** The pair does not exist on the venue. Definitive, drives the unsupported-pair registry. */
  NotSupported = "NotSupported",
  /** HTTP 429 or a provider rate-limit payload. Never blacklists. */
  RateLimited = "RateLimited",
  /** Timeout, network failure, malformed or unexpected body. */
  TransientError = "TransientError",
  /** Any other business rejection reported by the provider. */
  ProviderError = "ProviderError",
}

export interface SourceError extends IErrorDetails {
  kind: SourceErrorKind;
  /** Adapter id the error came from */
  provider: string;
  ticker: string;
  /** Seconds until the provider accepts requests again, when known */
  retryAfterSeconds?: number;
}

const CODE_BY_KIND: Record<SourceErrorKind, ErrorCode> = {
  [SourceErrorKind.NotSupported]: ErrorCode.PAIR_NOT_SUPPORTED,
  [SourceErrorKind.RateLimited]: ErrorCode.RATE_LIMIT_EXCEEDED,
  [SourceErrorKind.TransientError]: ErrorCode.TRANSIENT_ERROR,
  [SourceErrorKind.ProviderError]: ErrorCode.PROVIDER_ERROR,
};

const SEVERITY_BY_KIND: Record<SourceErrorKind, ErrorSeverity> = {
  [SourceErrorKind.NotSupported]: ErrorSeverity.LOW,
  [SourceErrorKind.RateLimited]: ErrorSeverity.MEDIUM,
  [SourceErrorKind.TransientError]: ErrorSeverity.MEDIUM,
  [SourceErrorKind.ProviderError]: ErrorSeverity.HIGH,
};

/**
 * Creates a new SourceError
 */
export function createSourceError(
  kind: SourceErrorKind,
  provider: string,
  ticker: string,
  message: string,
  options: {
    retryAfterSeconds?: number;
    context?: Record<string, unknown>;
  } = {}
): SourceError {
  return {
    kind,
    code: CODE_BY_KIND[kind],
    severity: SEVERITY_BY_KIND[kind],
    message,
    module: "adapter",
    provider,
    ticker,
    timestamp: Date.now(),
    retryAfterSeconds: options.retryAfterSeconds,
    context: options.context,
  };
}

/**
 * Type guard for SourceError
 */
export function isSourceError(error: unknown): error is SourceError {
  return (
    typeof error === "object" &&
    error !== null &&
    "kind" in error &&
    "provider" in error &&
    "ticker" in error &&
    "message" in error
  );
}

export function isRateLimitedError(error: SourceError): boolean {
  return error.kind === SourceErrorKind.RateLimited;
}

/**
 * Text that providers and the gateway use when rejecting for throughput reasons.
 */
export function isRateLimitMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return lower.includes("rate limit") || lower.includes("429") || lower.includes("too many requests");
}
