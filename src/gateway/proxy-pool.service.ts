import { BaseService } from "../common/base/base.service";
import { toError } from "../common/types/error-handling";
import type { ProxyPoolStatus } from "../common/types/gateway";
import type { ProxyPoolConfig } from "../config/interfaces/service-config.types";
import type { HttpClient, HttpClientFactory } from "./http-client.factory";

/**
 * Candidate proxies for rate-limited requests.
 *
 * A proxy starts untested, is checked against the health-check URL before its first use,
 * and ends up either known-good or failed. Failed proxies are never tried again in this process.
 */
export class ProxyPool extends BaseService {
  private proxies: string[] = [];
  private readonly validProxies = new Set<string>();
  private readonly failedProxies = new Set<string>();
  private readonly clients = new Map<string, HttpClient>();

  constructor(
    private readonly poolConfig: ProxyPoolConfig,
    private readonly clientFactory: HttpClientFactory,
    private readonly random: () => number = Math.random
  ) {
    super();
    this.setProxies(poolConfig.proxies);
  }

  get enabled(): boolean {
    return this.poolConfig.enabled && this.proxies.length > 0;
  }

  get maxAttemptsPerRequest(): number {
    return this.poolConfig.maxProxyRetries;
  }

  setProxies(proxies: string[]): void {
    this.proxies = [...new Set(proxies.map(proxy => proxy.trim()).filter(Boolean))];
    for (const proxy of [...this.validProxies]) {
      if (!this.proxies.includes(proxy)) this.validProxies.delete(proxy);
    }
    this.logger.log(`Proxy pool configured with ${this.proxies.length} proxies`);
  }

  clientFor(proxy: string): HttpClient {
    let client = this.clients.get(proxy);
    if (!client) {
      client = this.clientFactory(proxy);
      this.clients.set(proxy, client);
    }
    return client;
  }

  /**
   * Random known-good proxy not in `exclude`, validating a batch of untested ones when none is left.
   */
  async getValidProxy(exclude: ReadonlySet<string> = new Set()): Promise<string | undefined> {
    let candidates = [...this.validProxies].filter(proxy => !exclude.has(proxy));

    if (candidates.length === 0) {
      await this.validateUntested(exclude);
      candidates = [...this.validProxies].filter(proxy => !exclude.has(proxy));
    }

    if (candidates.length === 0) {
      this.logWarning("No working proxies available");
      return undefined;
    }

    return candidates[Math.floor(this.random() * candidates.length)];
  }

  /**
   * Drops a proxy that failed during real use.
   */
  evict(proxy: string, reason: string): void {
    this.validProxies.delete(proxy);
    this.failedProxies.add(proxy);
    this.clients.delete(proxy);
    this.logWarning(`Proxy ${redact(proxy)} evicted: ${reason}`);
  }

  getStatus(): ProxyPoolStatus {
    return {
      enabled: this.enabled,
      total: this.proxies.length,
      valid: this.validProxies.size,
      failed: this.failedProxies.size,
      untested: this.untested(new Set()).length,
    };
  }

  private untested(exclude: ReadonlySet<string>): string[] {
    return this.proxies.filter(
      proxy => !this.validProxies.has(proxy) && !this.failedProxies.has(proxy) && !exclude.has(proxy)
    );
  }

  private async validateUntested(exclude: ReadonlySet<string>): Promise<void> {
    const batch = this.untested(exclude).slice(0, this.poolConfig.validationBatchSize);
    if (batch.length === 0) return;

    this.logDebug(`Validating ${batch.length} proxies`);
    const results = await Promise.all(batch.map(async proxy => ({ proxy, ok: await this.validate(proxy) })));

    for (const { proxy, ok } of results) {
      if (ok) {
        this.validProxies.add(proxy);
      } else {
        this.failedProxies.add(proxy);
        this.clients.delete(proxy);
      }
    }
    this.logDebug(`Proxy validation: ${this.validProxies.size} valid, ${this.failedProxies.size} failed`);
  }

  private async validate(proxy: string): Promise<boolean> {
    try {
      const response = await this.clientFor(proxy).get(this.poolConfig.testUrl, {
        timeoutMs: this.poolConfig.validationTimeoutMs,
      });
      return response.status === 200;
    } catch (error) {
      this.logDebug(`Proxy ${redact(proxy)} failed validation: ${toError(error).message}`);
      return false;
    }
  }
}

/**
 * Hides credentials embedded in a proxy URL
 */
export function redact(proxy: string): string {
  return proxy.replace(/\/\/[^@/]+@/, "//***@");
}
