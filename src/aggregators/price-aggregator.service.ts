import { Injectable } from "@nestjs/common";
import { PriceSourceRegistry } from "../adapters/base/price-source.registry";
import { PriceCacheService } from "../cache/price-cache.service";
import { BaseService } from "../common/base/base.service";
import type { IPriceSourceAdapter } from "../common/types/adapters";
import { SourceErrorKind, createSourceError, toError } from "../common/types/error-handling";
import { buildAggregatedResult, type AdapterResult, type AggregatedResult, type PriceQuote } from "../common/types/prices";
import type { AggregatorConfig } from "../config/interfaces/service-config.types";
import { UnsupportedPairRegistry } from "../registry/unsupported-pair.registry";

/**
 * Fans a ticker out to every enabled source and reconciles the answers into one envelope.
 *
 * Sources known to lack the pair are skipped, the rest run concurrently, each bounded by
 * the adapter timeout. Quotes keep dispatch order whatever order they complete in.
 */
@Injectable()
export class PriceAggregatorService extends BaseService {
  constructor(
    private readonly sources: PriceSourceRegistry,
    private readonly unsupportedPairs: UnsupportedPairRegistry,
    private readonly cache: PriceCacheService,
    private readonly aggregatorConfig: AggregatorConfig
  ) {
    super();
  }

  async getAggregatedPrice(
    rawTicker: string,
    useCache = true,
    cacheDurationSeconds: number = this.aggregatorConfig.cacheDurationSeconds
  ): Promise<AggregatedResult> {
    const ticker = rawTicker.trim().toUpperCase();

    if (useCache) {
      const cached = this.cache.get(ticker, cacheDurationSeconds);
      if (cached) {
        return cached;
      }
    }

    const startTime = Date.now();
    const dispatched: IPriceSourceAdapter[] = [];
    let skippedSourceCount = 0;

    for (const adapter of this.sources.getActive()) {
      if (this.unsupportedPairs.isBlacklisted(adapter.id, ticker)) {
        this.logDebug(`Skipping ${ticker} on ${adapter.displayName} (known unsupported pair)`);
        skippedSourceCount++;
      } else {
        dispatched.push(adapter);
      }
    }

    const results = await Promise.all(dispatched.map(adapter => this.fetchWithTimeout(adapter, ticker)));

    const sources = new Map<string, PriceQuote>();
    results.forEach((result, index) => {
      const adapter = dispatched[index];
      if (result.ok) {
        sources.set(adapter.id, result.quote);
        return;
      }

      const { error } = result;
      switch (error.kind) {
        case SourceErrorKind.NotSupported:
          this.unsupportedPairs.markUnsupported(adapter.id, ticker, error);
          break;
        case SourceErrorKind.RateLimited:
          this.logWarning(`${adapter.displayName} rate limited for ${ticker}: ${error.message}`);
          break;
        default:
          this.logDebug(`${adapter.displayName} failed for ${ticker}: ${error.kind} ${error.message}`);
      }
    });

    const result = buildAggregatedResult(ticker, sources, {
      skippedSourceCount,
      failedSourceCount: dispatched.length - sources.size,
    });

    this.logPerformance(`aggregate ${ticker}`, Date.now() - startTime, this.aggregatorConfig.adapterTimeoutMs);
    this.logger.log(
      `${ticker}: ${result.activeSourceCount} sources, ${skippedSourceCount} skipped, ${result.failedSourceCount} failed`
    );

    this.cache.set(ticker, result);
    return result;
  }

  /**
   * Envelopes in input order; duplicate tickers are fetched once.
   */
  async getAggregatedPrices(tickers: string[], useCache = true): Promise<AggregatedResult[]> {
    const unique = [...new Set(tickers.map(ticker => ticker.trim().toUpperCase()))];
    const results = await Promise.all(unique.map(ticker => this.getAggregatedPrice(ticker, useCache)));
    const byTicker = new Map(unique.map((ticker, index) => [ticker, results[index]]));

    return tickers.flatMap(ticker => byTicker.get(ticker.trim().toUpperCase()) ?? []);
  }

  getSourceCount(): number {
    return this.sources.getActive().length;
  }

  private async fetchWithTimeout(adapter: IPriceSourceAdapter, ticker: string): Promise<AdapterResult> {
    const timeoutMs = this.aggregatorConfig.adapterTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<AdapterResult>(resolve => {
      timer = setTimeout(
        () =>
          resolve({
            ok: false,
            error: createSourceError(SourceErrorKind.TransientError, adapter.id, ticker, `Timed out after ${timeoutMs}ms`),
          }),
        timeoutMs
      );
    });

    try {
      return await Promise.race([adapter.fetch(ticker), timeout]);
    } catch (error) {
      return {
        ok: false,
        error: createSourceError(SourceErrorKind.TransientError, adapter.id, ticker, toError(error).message),
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
