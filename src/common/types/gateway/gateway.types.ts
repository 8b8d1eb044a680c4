import type { GatewayError } from "../error-handling";

/**
 * Any HTTP answer other than 429. Status classification is left to the caller.
 */
export interface GatewayResponse {
  status: number;
  data: unknown;
  headers: Record<string, string>;
}

export type GatewayResult = { ok: true; response: GatewayResponse } | { ok: false; error: GatewayError };

/**
 * Shared HTTP dispatch used by every source adapter.
 */
export interface IRequestGateway {
  request(url: string): Promise<GatewayResult>;
  requestWithProxy(url: string): Promise<GatewayResult>;
}

export interface RateLimitedDomain {
  domain: string;
  limitedUntil: number;
}

export interface ProxyPoolStatus {
  enabled: boolean;
  total: number;
  valid: number;
  failed: number;
  untested: number;
}

export interface GatewayStatus {
  rateLimitedDomains: RateLimitedDomain[];
  proxies: ProxyPoolStatus;
}
