export interface RequestGatewayConfig {
  httpTimeoutMs: number;
  /** Extra direct attempts after the first 429 */
  maxDirectRetries: number;
  /** Linear backoff unit: attempt n waits retryDelayMs * (n + 1) */
  retryDelayMs: number;
  /** Used when a 429 carries no usable Retry-After header */
  defaultRetryAfterSeconds: number;
  userAgent: string;
}

export interface ProxyPoolConfig {
  enabled: boolean;
  proxies: string[];
  /** Proxy attempts per logical request */
  maxProxyRetries: number;
  testUrl: string;
  validationTimeoutMs: number;
  /** Untested proxies validated per refill */
  validationBatchSize: number;
}

export interface PriceCacheConfig {
  filePath: string;
  durationSeconds: number;
  /** Flush to disk after this many writes */
  flushEvery: number;
}

export interface UnsupportedPairRegistryConfig {
  filePath: string;
  /** Minimum wall time between two writes of the registry file */
  flushIntervalMs: number;
  /** provider id -> tickers that are always unsupported */
  manualOverrides: Record<string, string[]>;
}

export interface AggregatorConfig {
  adapterTimeoutMs: number;
  cacheDurationSeconds: number;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}
