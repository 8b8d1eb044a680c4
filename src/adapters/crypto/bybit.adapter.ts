import { BasePriceSourceAdapter } from "../base/base-price-source.adapter";
import { SourceErrorKind } from "../../common/types/error-handling";
import type { AdapterResult } from "../../common/types/prices";
import { asString, pick } from "../../common/utils/guards.utils";

const INVALID_PARAMETER = 10001;
const RATE_LIMIT_CODES = new Set([10006, 10018]);

export class BybitAdapter extends BasePriceSourceAdapter {
  readonly id = "bybit";
  readonly displayName = "Bybit";
  protected readonly defaultBaseUrl = "https://api.bybit.com";

  getSymbolMapping(ticker: string): string[] {
    return [`${ticker}USDT`];
  }

  protected async fetchPair(ticker: string, symbol: string): Promise<AdapterResult> {
    const outcome = await this.get(ticker, `${this.baseUrl}/v5/market/tickers?category=spot&symbol=${symbol}`);
    if (!outcome.ok) return outcome;

    const { response } = outcome;
    const retCode = pick(response.data, "retCode");
    const retMsg = asString(pick(response.data, "retMsg")) || undefined;

    if (retCode === INVALID_PARAMETER) {
      return this.failure(SourceErrorKind.NotSupported, ticker, retMsg ?? `Invalid symbol ${symbol}`);
    }
    if (typeof retCode === "number" && RATE_LIMIT_CODES.has(retCode)) {
      return this.failure(SourceErrorKind.RateLimited, ticker, retMsg ?? "Too many visits");
    }
    if (response.status !== 200) {
      return this.unexpectedResponse(ticker, response, retMsg);
    }
    if (retCode !== 0) {
      return this.failure(SourceErrorKind.ProviderError, ticker, `Bybit API error: ${retMsg ?? String(retCode)}`);
    }

    const rows = pick(response.data, "result", "list");
    if (!Array.isArray(rows) || rows.length === 0) {
      return this.failure(SourceErrorKind.TransientError, ticker, `No ticker data for ${symbol}`);
    }

    const row: unknown = rows[0];
    const last = this.parseNumber(pick(row, "lastPrice"));
    return this.success(ticker, last, {
      volume24h: this.parseOptionalNumber(pick(row, "turnover24h")),
      change24hPercent: this.changeFromOpen(last, this.parseOptionalNumber(pick(row, "prevPrice24h"))),
    });
  }
}
