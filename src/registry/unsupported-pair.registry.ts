import { Injectable } from "@nestjs/common";
import { StandardService } from "../common/base/composed.service";
import { JsonFileStore, type DocumentStore } from "../common/persistence/json-file.store";
import { isRecord } from "../common/utils/guards.utils";
import {
  isRateLimitMessage,
  isRateLimitedError,
  isSourceError,
  toError,
  type SourceError,
} from "../common/types/error-handling";
import type { UnsupportedPairRegistryConfig } from "../config/interfaces/service-config.types";

/**
 * provider id -> tickers, as written to disk
 */
export type PersistedUnsupportedPairs = Record<string, string[]>;

export interface UnsupportedPairStats {
  totalEntries: number;
  providerCount: number;
  providers: Record<string, string[]>;
}

export function decodeUnsupportedPairs(raw: unknown): PersistedUnsupportedPairs | undefined {
  if (!isRecord(raw)) return undefined;

  const pairs: PersistedUnsupportedPairs = {};
  for (const [provider, tickers] of Object.entries(raw)) {
    if (!Array.isArray(tickers)) return undefined;
    pairs[provider] = tickers.filter((ticker): ticker is string => typeof ticker === "string");
  }
  return pairs;
}

/**
 * Durable memory of (provider, ticker) pairs that do not exist on a provider.
 *
 * Entries never expire. Disk writes are throttled to one per `flushIntervalMs`;
 * a change inside the window schedules a deferred flush of the full state.
 */
@Injectable()
export class UnsupportedPairRegistry extends StandardService {
  private pairs = new Map<string, Set<string>>();
  private readonly store: DocumentStore<PersistedUnsupportedPairs>;
  private lastFlushAt = 0;
  private pendingFlush?: NodeJS.Timeout;
  private dirty = false;

  constructor(
    private readonly registryConfig: UnsupportedPairRegistryConfig,
    store?: DocumentStore<PersistedUnsupportedPairs>
  ) {
    super();
    this.store = store ?? new JsonFileStore(registryConfig.filePath, decodeUnsupportedPairs);
  }

  override async initialize(): Promise<void> {
    await this.load();
  }

  override async cleanup(): Promise<void> {
    if (this.dirty) {
      await this.flush();
    }
  }

  isBlacklisted(provider: string, ticker: string): boolean {
    return this.pairs.get(normalizeProvider(provider))?.has(normalizeTicker(ticker)) ?? false;
  }

  /**
   * Records a definitive miss. Rate-limit shaped errors are ignored whatever the caller intends.
   * Returns whether the pair was newly added.
   */
  markUnsupported(provider: string, ticker: string, observedError?: SourceError | string): boolean {
    if (isRateLimitShaped(observedError)) {
      this.logDebug(`Not marking ${ticker} unsupported on ${provider}: rate limited`);
      return false;
    }

    const added = this.add(provider, ticker);
    if (added) {
      const reason = isSourceError(observedError) ? observedError.message : observedError;
      this.logger.log(`Marked ${normalizeTicker(ticker)} as unsupported on ${normalizeProvider(provider)}`, {
        reason: reason ?? "not found",
      });
      this.requestFlush();
    }
    return added;
  }

  /**
   * Manual blacklist. Returns whether the registry changed.
   */
  blacklist(provider: string, ticker: string): boolean {
    const added = this.add(provider, ticker);
    if (added) {
      this.logger.log(`Blacklisted ${normalizeTicker(ticker)} on ${normalizeProvider(provider)}`);
      this.requestFlush();
    }
    return added;
  }

  /**
   * Returns whether the registry changed.
   */
  unblacklist(provider: string, ticker: string): boolean {
    const providerId = normalizeProvider(provider);
    const tickers = this.pairs.get(providerId);
    if (!tickers?.delete(normalizeTicker(ticker))) {
      return false;
    }

    if (tickers.size === 0) {
      this.pairs.delete(providerId);
    }
    this.logger.log(`Unblacklisted ${normalizeTicker(ticker)} on ${providerId}`);
    this.requestFlush();
    return true;
  }

  getProvidersForTicker(ticker: string): string[] {
    const normalized = normalizeTicker(ticker);
    return [...this.pairs.entries()]
      .filter(([, tickers]) => tickers.has(normalized))
      .map(([provider]) => provider)
      .sort();
  }

  getStats(): UnsupportedPairStats {
    const providers = this.snapshot();
    return {
      totalEntries: Object.values(providers).reduce((sum, tickers) => sum + tickers.length, 0),
      providerCount: Object.keys(providers).length,
      providers,
    };
  }

  /**
   * Replaces in-memory state with the stored set, then reapplies the manual overrides.
   */
  async load(): Promise<void> {
    const stored = await this.store.load();
    this.pairs = new Map();
    for (const [provider, tickers] of Object.entries(stored ?? {})) {
      for (const ticker of tickers) {
        this.add(provider, ticker);
      }
    }

    const overridesAdded = this.applyManualOverrides();
    this.dirty = overridesAdded > 0;
    this.logger.log(
      `Loaded ${this.getStats().totalEntries} unsupported pairs (${overridesAdded} restored from manual overrides)`
    );
  }

  /**
   * Unsaved changes are written first so the file read back includes them.
   */
  async reload(): Promise<UnsupportedPairStats> {
    if (this.dirty) {
      await this.flush();
    }
    await this.load();
    return this.getStats();
  }

  /**
   * Writes the full current state. Failures are logged and leave the state dirty for the next attempt.
   */
  async flush(): Promise<void> {
    if (this.pendingFlush) {
      this.clearTimer(this.pendingFlush);
      this.pendingFlush = undefined;
    }

    this.lastFlushAt = Date.now();
    this.dirty = false;
    try {
      await this.store.save(this.snapshot());
      this.logDebug(`Saved ${this.getStats().totalEntries} unsupported pairs`);
    } catch (error) {
      this.dirty = true;
      this.handleError(toError(error), "unsupported_pairs_flush", { shouldThrow: false });
    }
  }

  private requestFlush(): void {
    this.dirty = true;
    if (this.pendingFlush) return;

    const elapsed = Date.now() - this.lastFlushAt;
    if (elapsed >= this.registryConfig.flushIntervalMs) {
      void this.flush();
      return;
    }

    this.pendingFlush = this.createTimeout(() => {
      this.pendingFlush = undefined;
      void this.flush();
    }, this.registryConfig.flushIntervalMs - elapsed);
  }

  private applyManualOverrides(): number {
    let added = 0;
    for (const [provider, tickers] of Object.entries(this.registryConfig.manualOverrides)) {
      for (const ticker of tickers) {
        if (this.add(provider, ticker)) added++;
      }
    }
    return added;
  }

  private add(provider: string, ticker: string): boolean {
    const providerId = normalizeProvider(provider);
    const normalized = normalizeTicker(ticker);
    let tickers = this.pairs.get(providerId);
    if (!tickers) {
      tickers = new Set();
      this.pairs.set(providerId, tickers);
    }
    if (tickers.has(normalized)) {
      return false;
    }
    tickers.add(normalized);
    return true;
  }

  private snapshot(): PersistedUnsupportedPairs {
    const snapshot: PersistedUnsupportedPairs = {};
    for (const [provider, tickers] of [...this.pairs.entries()].sort(([a], [b]) => a.localeCompare(b))) {
      if (tickers.size > 0) {
        snapshot[provider] = [...tickers].sort();
      }
    }
    return snapshot;
  }
}

function normalizeProvider(provider: string): string {
  return provider.trim().toLowerCase();
}

function normalizeTicker(ticker: string): string {
  return ticker.trim().toUpperCase();
}

function isRateLimitShaped(observedError: SourceError | string | undefined): boolean {
  if (observedError === undefined) return false;
  if (typeof observedError === "string") return isRateLimitMessage(observedError);
  return isRateLimitedError(observedError) || isRateLimitMessage(observedError.message);
}
