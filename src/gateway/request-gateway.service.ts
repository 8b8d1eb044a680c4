import { Injectable } from "@nestjs/common";
import { StandardService } from "../common/base/composed.service";
import { GatewayErrorKind, createGatewayError, type GatewayError } from "../common/types/error-handling";
import type { GatewayResponse, GatewayResult, GatewayStatus, IRequestGateway } from "../common/types/gateway";
import type { RequestGatewayConfig } from "../config/interfaces/service-config.types";
import { DomainRateLimitTracker } from "./domain-rate-limit.tracker";
import { HttpTransportError, type HttpClient, type HttpClientFactory } from "./http-client.factory";
import { ProxyPool, redact } from "./proxy-pool.service";

const HTTP_TOO_MANY_REQUESTS = 429;

/**
 * Shared HTTP dispatch for every source adapter.
 *
 * Direct requests honour a per-domain rate-limit window; rate-limited requests can be
 * retried through the proxy pool with `requestWithProxy`.
 */
@Injectable()
export class RequestGatewayService extends StandardService implements IRequestGateway {
  private readonly directClient: HttpClient;

  constructor(
    private readonly gatewayConfig: RequestGatewayConfig,
    clientFactory: HttpClientFactory,
    private readonly proxyPool: ProxyPool,
    private readonly rateLimits: DomainRateLimitTracker = new DomainRateLimitTracker()
  ) {
    super();
    this.directClient = clientFactory();
  }

  async request(url: string): Promise<GatewayResult> {
    const domain = domainOf(url);
    if (domain === undefined) {
      return { ok: false, error: createGatewayError(GatewayErrorKind.Network, url, "", `Invalid URL: ${url}`) };
    }

    const remaining = this.rateLimits.remainingSeconds(domain);
    if (remaining > 0) {
      this.logDebug(`Skipping ${domain}: rate limited for another ${remaining}s`);
      return {
        ok: false,
        error: createGatewayError(GatewayErrorKind.RateLimited, url, domain, `Rate limited by ${domain}`, {
          retryAfterSeconds: remaining,
        }),
      };
    }

    const result = await this.sendWithRetries(this.directClient, url, domain);
    if (!result.ok && result.error.kind === GatewayErrorKind.RateLimited) {
      const retryAfter = result.error.retryAfterSeconds ?? this.gatewayConfig.defaultRetryAfterSeconds;
      this.rateLimits.markLimited(domain, retryAfter);
      this.logWarning(`${domain} rate limited, backing off for ${retryAfter}s`);
    }
    return result;
  }

  /**
   * Direct request first; a rate-limited outcome is retried through up to `maxProxyRetries` proxies.
   */
  async requestWithProxy(url: string): Promise<GatewayResult> {
    const direct = await this.request(url);
    if (direct.ok || direct.error.kind !== GatewayErrorKind.RateLimited || !this.proxyPool.enabled) {
      return direct;
    }

    const domain = direct.error.domain;
    const tried = new Set<string>();
    let lastError: GatewayError = direct.error;

    for (let attempt = 0; attempt < this.proxyPool.maxAttemptsPerRequest; attempt++) {
      const proxy = await this.proxyPool.getValidProxy(tried);
      if (!proxy) break;
      tried.add(proxy);

      this.logDebug(`Retrying ${domain} via proxy ${redact(proxy)} (attempt ${attempt + 1})`);
      const result = await this.sendWithRetries(this.proxyPool.clientFor(proxy), url, domain, proxy);
      if (result.ok) {
        return result;
      }

      lastError = result.error;
      if (result.error.kind !== GatewayErrorKind.RateLimited) {
        this.proxyPool.evict(proxy, result.error.message);
      }
    }

    return { ok: false, error: lastError };
  }

  getStatus(): GatewayStatus {
    return {
      rateLimitedDomains: this.rateLimits.list(),
      proxies: this.proxyPool.getStatus(),
    };
  }

  /**
   * One logical GET: 429 answers are retried with linear backoff, `retryDelayMs * (attempt + 1)`.
   */
  private async sendWithRetries(
    client: HttpClient,
    url: string,
    domain: string,
    proxy?: string
  ): Promise<GatewayResult> {
    const maxRetries = this.gatewayConfig.maxDirectRetries;
    let retryAfterSeconds: number | undefined;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      let response: GatewayResponse;
      try {
        response = await client.get(url);
      } catch (error) {
        const timedOut = error instanceof HttpTransportError && error.timedOut;
        const message = error instanceof Error ? error.message : String(error);
        return {
          ok: false,
          error: createGatewayError(
            timedOut ? GatewayErrorKind.Timeout : GatewayErrorKind.Network,
            url,
            domain,
            `Request to ${domain} failed: ${message}`,
            { proxy }
          ),
        };
      }

      if (response.status !== HTTP_TOO_MANY_REQUESTS) {
        return { ok: true, response };
      }

      retryAfterSeconds = parseRetryAfter(response.headers["retry-after"]);
      if (attempt < maxRetries) {
        const delay = this.gatewayConfig.retryDelayMs * (attempt + 1);
        this.logDebug(`429 from ${domain}, retrying in ${delay}ms (attempt ${attempt + 1}/${maxRetries + 1})`);
        await this.sleep(delay);
      }
    }

    return {
      ok: false,
      error: createGatewayError(GatewayErrorKind.RateLimited, url, domain, `Rate limited by ${domain} (HTTP 429)`, {
        retryAfterSeconds,
        proxy,
      }),
    };
  }
}

export function domainOf(url: string): string | undefined {
  try {
    return new URL(url).hostname;
  } catch {
    return undefined;
  }
}

/**
 * Retry-After in whole seconds; anything else yields undefined.
 */
export function parseRetryAfter(value: string | undefined): number | undefined {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) return undefined;
  const seconds = Number.parseInt(value, 10);
  return seconds > 0 ? seconds : undefined;
}
