import { BasePriceSourceAdapter } from "../base/base-price-source.adapter";
import { SourceErrorKind, isRateLimitMessage } from "../../common/types/error-handling";
import type { AdapterResult } from "../../common/types/prices";
import { isRecord, pick } from "../../common/utils/guards.utils";

/**
 * Kraken asset codes that differ from the common ticker
 */
const KRAKEN_ASSET_CODES: Readonly<Record<string, string>> = {
  BTC: "XBT",
};

const BTC_LEGACY_PAIRS = ["XXBTZUSD", "XBTUSD", "XBTZUSD", "XBT/USD"];

/**
 * Kraken ticker entry; every field is an array of strings
 */
export interface KrakenTickerData {
  /** [price, whole lot volume, lot volume] */
  c: string[];
  /** [today, last 24 hours] base volume */
  v: string[];
  /** opening price */
  o: string;
}

export class KrakenAdapter extends BasePriceSourceAdapter {
  readonly id = "kraken";
  readonly displayName = "Kraken";
  protected readonly defaultBaseUrl = "https://api.kraken.com";

  getSymbolMapping(ticker: string): string[] {
    const asset = KRAKEN_ASSET_CODES[ticker] ?? ticker;
    const formats = [
      `${asset}/USD`,
      `${asset}USD`,
      `${asset}USDT`,
      `X${asset}ZUSD`,
      `${asset}ZUSD`,
      `X${asset}USD`,
    ];
    return ticker === "BTC" ? [...new Set([...BTC_LEGACY_PAIRS, ...formats])] : formats;
  }

  protected async fetchPair(ticker: string, pair: string): Promise<AdapterResult> {
    const outcome = await this.get(ticker, `${this.baseUrl}/0/public/Ticker?pair=${encodeURIComponent(pair)}`);
    if (!outcome.ok) return outcome;

    const { response } = outcome;
    const errors = pick(response.data, "error");
    if (Array.isArray(errors) && errors.length > 0) {
      const message = errors.map(String).join(", ");
      if (message.includes("Unknown asset pair")) {
        return this.failure(SourceErrorKind.NotSupported, ticker, `Unknown asset pair ${pair}`);
      }
      if (isRateLimitMessage(message)) {
        return this.failure(SourceErrorKind.RateLimited, ticker, message);
      }
      return this.failure(SourceErrorKind.ProviderError, ticker, message);
    }
    if (response.status !== 200) {
      return this.unexpectedResponse(ticker, response);
    }

    // The result is keyed by Kraken's canonical pair name, which may differ from the one requested
    const result = pick(response.data, "result");
    const entry = isRecord(result) ? Object.values(result).find(value => pick(value, "c") !== undefined) : undefined;
    if (!isKrakenTicker(entry)) {
      return this.failure(SourceErrorKind.TransientError, ticker, "Ticker data not found in response");
    }

    const last = this.parseNumber(entry.c[0]);
    const baseVolume = this.parseOptionalNumber(entry.v[1]);
    return this.success(ticker, last, {
      volume24h: baseVolume === undefined ? undefined : baseVolume * last,
      change24hPercent: this.changeFromOpen(last, this.parseOptionalNumber(entry.o)),
    });
  }
}

function isKrakenTicker(value: unknown): value is KrakenTickerData {
  return (
    isRecord(value) &&
    Array.isArray(value.c) &&
    value.c.length > 0 &&
    Array.isArray(value.v) &&
    (value.o === undefined || typeof value.o === "string")
  );
}
