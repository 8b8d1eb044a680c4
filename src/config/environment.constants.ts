/**
 * Environment Constants - Centralized Environment Variable Management
 */

import { EnvironmentUtils } from "../common/utils/environment.utils";
import { isLogLevel, type LogLevel } from "../common/types/logging";

function resolveLogLevel(value: string): LogLevel {
  return isLogLevel(value) ? value : "log";
}

// Environment Helpers
export const ENV_HELPERS = {
  isTest: (): boolean => ENV.APPLICATION.NODE_ENV === "test",
  isDevelopment: (): boolean => ENV.APPLICATION.NODE_ENV === "development",
  isProduction: (): boolean => ENV.APPLICATION.NODE_ENV === "production",
};

export const ENV = {
  // Application Settings
  APPLICATION: {
    NODE_ENV: EnvironmentUtils.parseString("NODE_ENV", "production"),
    PORT: EnvironmentUtils.parseInt("APP_PORT", 3101, {
      min: 1,
      max: 65535,
      fieldName: "APP_PORT",
    }),
    BASE_PATH: EnvironmentUtils.parseString("APP_BASE_PATH", ""),
  },

  // Logging Configuration
  LOGGING: {
    LOG_LEVEL: resolveLogLevel(EnvironmentUtils.parseString("LOG_LEVEL", "log")),
  },

  // Price cache
  CACHE: {
    DURATION_S: EnvironmentUtils.parseInt("CACHE_DURATION", 60, { min: 1, max: 86400 }),
    FLUSH_EVERY: EnvironmentUtils.parseInt("CACHE_FLUSH_EVERY", 10, { min: 1, max: 1000 }),
  },

  // Source adapters
  ADAPTERS: {
    // Empty means every known adapter, in the default dispatch order
    ENABLED: EnvironmentUtils.parseList("ENABLED_ADAPTERS", []),
    TIMEOUT_S: EnvironmentUtils.parseFloat("ADAPTER_TIMEOUT", 10, { min: 0.5, max: 120 }),
  },

  // Request gateway
  GATEWAY: {
    HTTP_TIMEOUT_MS: EnvironmentUtils.parseInt("HTTP_TIMEOUT_MS", 10000, { min: 500, max: 60000 }),
    MAX_DIRECT_RETRIES: EnvironmentUtils.parseInt("MAX_DIRECT_RETRIES", 2, { min: 0, max: 10 }),
    RETRY_DELAY_MS: EnvironmentUtils.parseInt("RETRY_DELAY_MS", 1000, { min: 0, max: 30000 }),
    DEFAULT_RETRY_AFTER_S: EnvironmentUtils.parseInt("DEFAULT_RETRY_AFTER_S", 60, { min: 1, max: 3600 }),
    USER_AGENT: EnvironmentUtils.parseString("HTTP_USER_AGENT", "crypto-price-aggregator/1.0"),
  },

  // Proxy rotation for rate-limited requests
  PROXY: {
    ENABLED: EnvironmentUtils.parseBoolean("PROXY_ENABLED", false),
    LIST: EnvironmentUtils.parseList("PROXY_LIST", []),
    MAX_RETRIES: EnvironmentUtils.parseInt("MAX_PROXY_RETRIES", 3, { min: 1, max: 20 }),
    TEST_URL: EnvironmentUtils.parseString("PROXY_TEST_URL", "https://api.coingecko.com/api/v3/ping", {
      pattern: /^https?:\/\//,
    }),
    TIMEOUT_MS: EnvironmentUtils.parseInt("PROXY_TIMEOUT_MS", 5000, { min: 500, max: 60000 }),
    VALIDATION_BATCH: EnvironmentUtils.parseInt("PROXY_VALIDATION_BATCH", 5, { min: 1, max: 50 }),
  },

  // Durable stores
  STORAGE: {
    DATA_DIR: EnvironmentUtils.parseString("DATA_DIR", "data"),
  },

  // Unsupported-pair registry
  REGISTRY: {
    FLUSH_INTERVAL_MS: EnvironmentUtils.parseInt("REGISTRY_FLUSH_INTERVAL_MS", 60000, { min: 1000, max: 3600000 }),
  },

  TIMEOUTS: {
    GRACEFUL_SHUTDOWN_MS: EnvironmentUtils.parseInt("GRACEFUL_SHUTDOWN_TIMEOUT_MS", 30000, { min: 1000, max: 300000 }),
  },
};
