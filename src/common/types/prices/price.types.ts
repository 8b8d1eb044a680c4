import type { SourceError } from "../error-handling";

/**
 * One provider's observation for one ticker.
 */
export interface PriceQuote {
  readonly provider: string;
  readonly price: number;
  readonly volume24h?: number;
  readonly change24hPercent?: number;
  readonly fetchedAt: number;
}

export type AdapterResult = { ok: true; quote: PriceQuote } | { ok: false; error: SourceError };

/**
 * Consensus for one ticker across every source that answered.
 */
export interface AggregatedResult {
  ticker: string;
  /** Insertion order is adapter dispatch order */
  sources: Map<string, PriceQuote>;
  averagePrice: number | null;
  averageChange24h: number | null;
  averageVolume24h: number | null;
  activeSourceCount: number;
  skippedSourceCount: number;
  failedSourceCount: number;
  computedAt: number;
}

/**
 * JSON form of AggregatedResult; sources keep their order as entries.
 */
export interface SerializedAggregatedResult extends Omit<AggregatedResult, "sources"> {
  sources: Array<[string, PriceQuote]>;
}

export function createPriceQuote(
  provider: string,
  price: number,
  extras: { volume24h?: number; change24hPercent?: number; fetchedAt?: number } = {}
): PriceQuote {
  const quote: PriceQuote = {
    provider,
    price,
    fetchedAt: extras.fetchedAt ?? Date.now(),
    ...(extras.volume24h !== undefined && { volume24h: extras.volume24h }),
    ...(extras.change24hPercent !== undefined && { change24hPercent: extras.change24hPercent }),
  };
  return Object.freeze(quote);
}

/**
 * Map -> ordered entries, for JSON
 */
export function serializeAggregatedResult(result: AggregatedResult): SerializedAggregatedResult {
  return { ...result, sources: [...result.sources.entries()] };
}

export function deserializeAggregatedResult(data: SerializedAggregatedResult): AggregatedResult {
  return { ...data, sources: new Map(data.sources) };
}

/**
 * Simple means over the quotes that carry each field. `averagePrice` is null exactly when there are no quotes.
 */
export function buildAggregatedResult(
  ticker: string,
  sources: Map<string, PriceQuote>,
  counts: { skippedSourceCount: number; failedSourceCount: number },
  computedAt: number = Date.now()
): AggregatedResult {
  const quotes = [...sources.values()];

  return {
    ticker,
    sources,
    averagePrice: mean(quotes.map(quote => quote.price)),
    averageChange24h: mean(quotes.flatMap(quote => quote.change24hPercent ?? [])),
    averageVolume24h: mean(quotes.flatMap(quote => quote.volume24h ?? [])),
    activeSourceCount: quotes.length,
    skippedSourceCount: counts.skippedSourceCount,
    failedSourceCount: counts.failedSourceCount,
    computedAt,
  };
}

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}
