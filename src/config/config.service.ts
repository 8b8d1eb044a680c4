/**
 * Config Service
 * Hands typed configuration slices to the services that consume them
 */

import { join } from "path";
import { Injectable } from "@nestjs/common";
import { BaseService } from "../common/base/base.service";
import { ENV } from "./environment.constants";
import type {
  AggregatorConfig,
  ConfigValidationResult,
  PriceCacheConfig,
  ProxyPoolConfig,
  RequestGatewayConfig,
  UnsupportedPairRegistryConfig,
} from "./interfaces/service-config.types";

export const MARKETS_CACHE_FILE = "markets_cache.json";
export const UNSUPPORTED_PAIRS_FILE = "unsupported_pairs.json";

/**
 * Pairs forced unsupported regardless of what the registry file says
 */
export const MANUAL_UNSUPPORTED_PAIRS: Record<string, string[]> = {
  binance: ["XMR"],
};

/**
 * Most code should take its slice from here rather than read ENV directly, so tests can pass their own
 */
@Injectable()
export class ConfigService extends BaseService {
  constructor(private readonly env: typeof ENV = ENV) {
    super();
  }

  getEnvironmentConfig(): typeof ENV {
    return this.env;
  }

  getGatewayConfig(): RequestGatewayConfig {
    return {
      httpTimeoutMs: this.env.GATEWAY.HTTP_TIMEOUT_MS,
      maxDirectRetries: this.env.GATEWAY.MAX_DIRECT_RETRIES,
      retryDelayMs: this.env.GATEWAY.RETRY_DELAY_MS,
      defaultRetryAfterSeconds: this.env.GATEWAY.DEFAULT_RETRY_AFTER_S,
      userAgent: this.env.GATEWAY.USER_AGENT,
    };
  }

  getProxyConfig(): ProxyPoolConfig {
    return {
      enabled: this.env.PROXY.ENABLED,
      proxies: [...this.env.PROXY.LIST],
      maxProxyRetries: this.env.PROXY.MAX_RETRIES,
      testUrl: this.env.PROXY.TEST_URL,
      validationTimeoutMs: this.env.PROXY.TIMEOUT_MS,
      validationBatchSize: this.env.PROXY.VALIDATION_BATCH,
    };
  }

  getCacheConfig(): PriceCacheConfig {
    return {
      filePath: join(this.env.STORAGE.DATA_DIR, MARKETS_CACHE_FILE),
      durationSeconds: this.env.CACHE.DURATION_S,
      flushEvery: this.env.CACHE.FLUSH_EVERY,
    };
  }

  getRegistryConfig(): UnsupportedPairRegistryConfig {
    return {
      filePath: join(this.env.STORAGE.DATA_DIR, UNSUPPORTED_PAIRS_FILE),
      flushIntervalMs: this.env.REGISTRY.FLUSH_INTERVAL_MS,
      manualOverrides: MANUAL_UNSUPPORTED_PAIRS,
    };
  }

  getAggregatorConfig(): AggregatorConfig {
    return {
      adapterTimeoutMs: Math.round(this.env.ADAPTERS.TIMEOUT_S * 1000),
      cacheDurationSeconds: this.env.CACHE.DURATION_S,
    };
  }

  /**
   * Enabled adapter ids in dispatch order, or every known id when none are configured
   */
  getEnabledAdapterIds(knownIds: readonly string[]): string[] {
    const configured = this.env.ADAPTERS.ENABLED.map(id => id.toLowerCase());
    if (configured.length === 0) {
      return [...knownIds];
    }

    const unknown = configured.filter(id => !knownIds.includes(id));
    if (unknown.length > 0) {
      this.logWarning(`Ignoring unknown adapters in ENABLED_ADAPTERS: ${unknown.join(", ")}`);
    }
    return configured.filter((id, index) => knownIds.includes(id) && configured.indexOf(id) === index);
  }

  validateConfiguration(): ConfigValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (this.env.PROXY.ENABLED && this.env.PROXY.LIST.length === 0) {
      warnings.push("PROXY_ENABLED is set but PROXY_LIST is empty; rate-limited requests will not be retried via proxy");
    }

    const invalidProxies = this.env.PROXY.LIST.filter(proxy => !/^https?:\/\//.test(proxy));
    if (invalidProxies.length > 0) {
      errors.push(`Invalid proxy URLs: ${invalidProxies.join(", ")}`);
    }

    if (this.env.ADAPTERS.TIMEOUT_S * 1000 < this.env.GATEWAY.HTTP_TIMEOUT_MS) {
      warnings.push("ADAPTER_TIMEOUT is shorter than HTTP_TIMEOUT_MS; slow providers will be cut off by the aggregator");
    }

    return { isValid: errors.length === 0, errors, warnings };
  }
}
