import { Injectable } from "@nestjs/common";
import { StandardService } from "../common/base/composed.service";
import { JsonFileStore, type DocumentStore } from "../common/persistence/json-file.store";
import { toError } from "../common/types/error-handling";
import { deserializeAggregatedResult, type AggregatedResult } from "../common/types/prices";
import type { PriceCacheConfig } from "../config/interfaces/service-config.types";
import {
  decodePriceCache,
  encodePriceCache,
  type CachedEntry,
  type PersistedPriceCache,
} from "./price-cache.codec";

export interface PriceCacheInfo {
  totalEntries: number;
  validEntries: number;
  expiredEntries: number;
  filePath: string;
  durationSeconds: number;
}

/**
 * Aggregated envelopes keyed by ticker.
 *
 * Expiry is lazy: stale entries stay until overwritten or cleared, and `get` simply ignores them.
 * The file is rewritten every `flushEvery` writes and on shutdown.
 */
@Injectable()
export class PriceCacheService extends StandardService {
  private readonly entries = new Map<string, CachedEntry>();
  private readonly store: DocumentStore<PersistedPriceCache>;
  private writesSinceFlush = 0;

  constructor(
    private readonly cacheConfig: PriceCacheConfig,
    store?: DocumentStore<PersistedPriceCache>,
    private readonly now: () => number = Date.now
  ) {
    super();
    this.store = store ?? new JsonFileStore(cacheConfig.filePath, decodePriceCache);
  }

  override async initialize(): Promise<void> {
    await this.load();
  }

  override async cleanup(): Promise<void> {
    if (this.writesSinceFlush > 0) {
      await this.flush();
    }
  }

  get(ticker: string, cacheDurationSeconds: number = this.cacheConfig.durationSeconds): AggregatedResult | undefined {
    const key = ticker.toUpperCase();
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    const ageMs = this.now() - entry.timestamp;
    if (ageMs >= cacheDurationSeconds * 1000) {
      this.logDebug(`Cached data for ${key} expired (age: ${(ageMs / 1000).toFixed(1)}s)`);
      return undefined;
    }

    this.logDebug(`Using cached data for ${key} (age: ${(ageMs / 1000).toFixed(1)}s)`);
    return entry.result;
  }

  set(ticker: string, result: AggregatedResult): void {
    this.entries.set(ticker.toUpperCase(), { timestamp: this.now(), result });
    this.writesSinceFlush++;

    if (this.writesSinceFlush >= this.cacheConfig.flushEvery) {
      void this.flush();
    }
  }

  invalidate(ticker: string): boolean {
    const removed = this.entries.delete(ticker.toUpperCase());
    if (removed) {
      this.writesSinceFlush++;
    }
    return removed;
  }

  /**
   * Returns the number of entries dropped.
   */
  clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    this.writesSinceFlush++;
    this.logger.log(`Cleared ${count} cached entries`);
    return count;
  }

  getInfo(): PriceCacheInfo {
    const now = this.now();
    const durationMs = this.cacheConfig.durationSeconds * 1000;
    let validEntries = 0;
    for (const entry of this.entries.values()) {
      if (now - entry.timestamp < durationMs) validEntries++;
    }

    return {
      totalEntries: this.entries.size,
      validEntries,
      expiredEntries: this.entries.size - validEntries,
      filePath: this.cacheConfig.filePath,
      durationSeconds: this.cacheConfig.durationSeconds,
    };
  }

  async load(): Promise<void> {
    const stored = await this.store.load();
    this.entries.clear();
    for (const [ticker, entry] of Object.entries(stored ?? {})) {
      this.entries.set(ticker.toUpperCase(), {
        timestamp: entry.timestamp,
        result: deserializeAggregatedResult(entry.data),
      });
    }
    this.writesSinceFlush = 0;
    this.logger.log(`Loaded ${this.entries.size} cached tickers`);
  }

  /**
   * A failed write is logged; the in-memory cache keeps serving.
   */
  async flush(): Promise<void> {
    this.writesSinceFlush = 0;
    try {
      await this.store.save(encodePriceCache(this.entries));
      this.logDebug(`Saved ${this.entries.size} cached tickers`);
    } catch (error) {
      this.handleError(toError(error), "price_cache_flush", { shouldThrow: false });
    }
  }
}
