import { BasePriceSourceAdapter } from "../base/base-price-source.adapter";
import { SourceErrorKind } from "../../common/types/error-handling";
import type { AdapterResult } from "../../common/types/prices";
import { pick } from "../../common/utils/guards.utils";

/**
 * Crypto codes the FX Rates `latest` feed carries
 */
export const FXRATES_SUPPORTED: ReadonlySet<string> = new Set([
  "BTC",
  "ETH",
  "ADA",
  "XRP",
  "BNB",
  "SOL",
  "DOT",
  "LTC",
  "TRX",
  "DAI",
  "OP",
  "ARB",
]);

/**
 * Rates are quoted per USD, so the price is the inverse. No volume or change is available.
 */
export class FxRatesAdapter extends BasePriceSourceAdapter {
  readonly id = "fxrates";
  readonly displayName = "FX Rates";
  protected readonly defaultBaseUrl = "https://api.fxratesapi.com";

  getSymbolMapping(ticker: string): string[] {
    return FXRATES_SUPPORTED.has(ticker) ? [ticker] : [];
  }

  protected async fetchPair(ticker: string, code: string): Promise<AdapterResult> {
    const outcome = await this.get(ticker, `${this.baseUrl}/latest`);
    if (!outcome.ok) return outcome;

    const { response } = outcome;
    if (response.status !== 200) {
      return this.unexpectedResponse(ticker, response);
    }

    const rate = pick(response.data, "rates", code);
    if (pick(response.data, "success") !== true || rate === undefined) {
      return this.failure(SourceErrorKind.TransientError, ticker, `Ticker ${ticker} not found in response`);
    }

    const inverted = this.parseNumber(rate);
    if (inverted <= 0) {
      return this.failure(SourceErrorKind.TransientError, ticker, "Invalid rate value (zero or negative)");
    }
    return this.success(ticker, 1 / inverted);
  }
}
