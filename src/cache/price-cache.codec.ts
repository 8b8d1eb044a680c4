import {
  buildAggregatedResult,
  createPriceQuote,
  serializeAggregatedResult,
  type AggregatedResult,
  type PriceQuote,
  type SerializedAggregatedResult,
} from "../common/types/prices";
import { isRecord } from "../common/utils/guards.utils";

export interface CachedEntry {
  /** Epoch ms the entry was written */
  timestamp: number;
  result: AggregatedResult;
}

/**
 * ticker -> { timestamp, data }, as written to disk
 */
export type PersistedPriceCache = Record<string, { timestamp: number; data: SerializedAggregatedResult }>;

export function encodePriceCache(entries: ReadonlyMap<string, CachedEntry>): PersistedPriceCache {
  const persisted: PersistedPriceCache = {};
  for (const [ticker, entry] of entries) {
    persisted[ticker] = { timestamp: entry.timestamp, data: serializeAggregatedResult(entry.result) };
  }
  return persisted;
}

/**
 * Entries that do not look like a cached envelope are dropped one by one; the rest survive.
 */
export function decodePriceCache(raw: unknown): PersistedPriceCache | undefined {
  if (!isRecord(raw)) return undefined;

  const persisted: PersistedPriceCache = {};
  for (const [ticker, entry] of Object.entries(raw)) {
    if (!isRecord(entry) || typeof entry.timestamp !== "number") continue;
    const data = decodeResult(entry.data);
    if (data) {
      persisted[ticker] = { timestamp: entry.timestamp, data };
    }
  }
  return persisted;
}

function decodeResult(raw: unknown): SerializedAggregatedResult | undefined {
  if (!isRecord(raw) || typeof raw.ticker !== "string" || !Array.isArray(raw.sources)) return undefined;

  const sources: Array<[string, PriceQuote]> = [];
  for (const item of raw.sources) {
    if (!Array.isArray(item) || typeof item[0] !== "string") return undefined;
    const quote = decodeQuote(item[1]);
    if (!quote) return undefined;
    sources.push([item[0], quote]);
  }

  // Counts and means are derived from the sources, never trusted from the file
  const result = buildAggregatedResult(
    raw.ticker,
    new Map(sources),
    {
      skippedSourceCount: optionalNumber(raw.skippedSourceCount) ?? 0,
      failedSourceCount: optionalNumber(raw.failedSourceCount) ?? 0,
    },
    optionalNumber(raw.computedAt) ?? 0
  );
  return serializeAggregatedResult(result);
}

function decodeQuote(raw: unknown): PriceQuote | undefined {
  if (!isRecord(raw) || typeof raw.provider !== "string") return undefined;
  const price = optionalNumber(raw.price);
  if (price === undefined || price <= 0) return undefined;
  return createPriceQuote(raw.provider, price, {
    volume24h: optionalNumber(raw.volume24h),
    change24hPercent: optionalNumber(raw.change24hPercent),
    fetchedAt: optionalNumber(raw.fetchedAt),
  });
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}
