import { BasePriceSourceAdapter } from "../base/base-price-source.adapter";
import { SourceErrorKind } from "../../common/types/error-handling";
import type { AdapterResult } from "../../common/types/prices";
import { asString, pick } from "../../common/utils/guards.utils";

const INSTRUMENT_NOT_FOUND = "51001";
const RATE_LIMIT_CODE = "50011";

export class OkxAdapter extends BasePriceSourceAdapter {
  readonly id = "okx";
  readonly displayName = "OKX";
  protected readonly defaultBaseUrl = "https://www.okx.com";

  getSymbolMapping(ticker: string): string[] {
    return [`${ticker}-USDT`];
  }

  protected async fetchPair(ticker: string, instId: string): Promise<AdapterResult> {
    const outcome = await this.get(ticker, `${this.baseUrl}/api/v5/market/ticker?instId=${instId}`);
    if (!outcome.ok) return outcome;

    const { response } = outcome;
    const code = asString(pick(response.data, "code"));
    const message = asString(pick(response.data, "msg")) || undefined;

    if (code === INSTRUMENT_NOT_FOUND) {
      return this.failure(SourceErrorKind.NotSupported, ticker, message ?? `Instrument ${instId} doesn't exist`);
    }
    if (code === RATE_LIMIT_CODE) {
      return this.failure(SourceErrorKind.RateLimited, ticker, message ?? "Too many requests");
    }
    if (response.status !== 200) {
      return this.unexpectedResponse(ticker, response, message);
    }
    if (code !== "0") {
      return this.failure(SourceErrorKind.ProviderError, ticker, `OKX API error: ${message ?? code ?? "unknown"}`);
    }

    const rows = pick(response.data, "data");
    if (!Array.isArray(rows) || rows.length === 0) {
      return this.failure(SourceErrorKind.TransientError, ticker, "No data found in response");
    }

    const row: unknown = rows[0];
    const last = this.parseNumber(pick(row, "last"));
    return this.success(ticker, last, {
      volume24h: this.parseOptionalNumber(pick(row, "volCcy24h")),
      change24hPercent: this.changeFromOpen(last, this.parseOptionalNumber(pick(row, "open24h"))),
    });
  }
}
