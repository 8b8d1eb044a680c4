import { ErrorCode, ErrorSeverity, type IErrorDetails } from "./error.types";

export enum GatewayErrorKind {
  RateLimited = "RateLimited",
  Timeout = "Timeout",
  Network = "Network",
}

export interface GatewayError extends IErrorDetails {
  kind: GatewayErrorKind;
  url: string;
  domain: string;
  /** Set for RateLimited: seconds until the domain is usable again */
  retryAfterSeconds?: number;
  /** Set when the failing attempt went through a proxy */
  proxy?: string;
}

export function createGatewayError(
  kind: GatewayErrorKind,
  url: string,
  domain: string,
  message: string,
  options: { retryAfterSeconds?: number; proxy?: string } = {}
): GatewayError {
  return {
    kind,
    code:
      kind === GatewayErrorKind.RateLimited
        ? ErrorCode.RATE_LIMIT_EXCEEDED
        : kind === GatewayErrorKind.Timeout
          ? ErrorCode.TIMEOUT_ERROR
          : ErrorCode.NETWORK_ERROR,
    severity: kind === GatewayErrorKind.Network ? ErrorSeverity.HIGH : ErrorSeverity.MEDIUM,
    message,
    module: "gateway",
    url,
    domain,
    timestamp: Date.now(),
    retryAfterSeconds: options.retryAfterSeconds,
    proxy: options.proxy,
  };
}
