import type { AggregatedResult } from "../common/types/prices";

/**
 * Adapter id -> display name
 */
export type SourceNameResolver = (providerId: string) => string;

const NOT_AVAILABLE = "N/A";

/**
 * `$` with thousands separators; more decimals the smaller the price.
 */
export function formatPrice(price: number | null | undefined): string {
  if (price === null || price === undefined) return NOT_AVAILABLE;

  const decimals = price >= 1 ? 3 : price >= 0.1 ? 4 : price >= 0.01 ? 5 : 6;
  return `$${price.toLocaleString("en-US", { minimumFractionDigits: decimals, maximumFractionDigits: decimals })}`;
}

export function formatPercentChange(change: number | null | undefined): string {
  if (change === null || change === undefined) return NOT_AVAILABLE;

  const formatted = `${change.toFixed(2)}%`;
  return change > 0 ? `+${formatted}` : formatted;
}

/**
 * Header, one line per source in envelope order, then a counts footer.
 */
export function renderEnvelope(result: AggregatedResult, nameOf: SourceNameResolver = id => id): string {
  if (result.activeSourceCount === 0) {
    return `No data available for ${result.ticker}`;
  }

  const lines = [`${result.ticker}  ${formatPrice(result.averagePrice)} (${formatPercentChange(result.averageChange24h)})`];
  for (const [providerId, quote] of result.sources) {
    lines.push(`• ${nameOf(providerId)}: ${formatPrice(quote.price)} (${formatPercentChange(quote.change24hPercent)})`);
  }
  lines.push(`Sources: ${result.activeSourceCount} active, ${result.skippedSourceCount} skipped`);

  return lines.join("\n");
}

/**
 * One line per ticker: shorter tickers first, then higher prices; tickers without data last.
 * Ordering here is presentational and does not touch the envelopes.
 */
export function renderSummary(results: readonly AggregatedResult[]): string {
  const withData = results.filter(result => result.averagePrice !== null);
  const withoutData = results.filter(result => result.averagePrice === null);

  const sorted = [...withData].sort(
    (a, b) => a.ticker.length - b.ticker.length || (b.averagePrice ?? 0) - (a.averagePrice ?? 0)
  );

  return [
    ...sorted.map(
      result =>
        `${result.ticker}  ${formatPrice(result.averagePrice)} (${formatPercentChange(result.averageChange24h)})`
    ),
    ...withoutData.map(result => `${result.ticker}  No data available`),
  ].join("\n");
}
