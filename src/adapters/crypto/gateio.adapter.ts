import { BasePriceSourceAdapter } from "../base/base-price-source.adapter";
import { SourceErrorKind } from "../../common/types/error-handling";
import type { AdapterResult } from "../../common/types/prices";
import { asString, pick } from "../../common/utils/guards.utils";

export class GateIoAdapter extends BasePriceSourceAdapter {
  readonly id = "gateio";
  readonly displayName = "Gate.io";
  protected readonly defaultBaseUrl = "https://api.gateio.ws";

  getSymbolMapping(ticker: string): string[] {
    return [`${ticker}_USDT`];
  }

  protected async fetchPair(ticker: string, pair: string): Promise<AdapterResult> {
    const outcome = await this.get(ticker, `${this.baseUrl}/api/v4/spot/tickers?currency_pair=${pair}`);
    if (!outcome.ok) return outcome;

    const { response } = outcome;
    const label = asString(pick(response.data, "label"));
    if (label === "INVALID_CURRENCY_PAIR") {
      return this.failure(SourceErrorKind.NotSupported, ticker, `Unknown currency pair ${pair}`);
    }
    if (response.status !== 200) {
      return this.unexpectedResponse(ticker, response, label);
    }

    const rows: unknown = response.data;
    if (!Array.isArray(rows) || rows.length === 0) {
      return this.failure(SourceErrorKind.TransientError, ticker, "No data found in response");
    }

    const row: unknown = rows[0];
    return this.success(ticker, this.parseNumber(pick(row, "last")), {
      volume24h: this.parseOptionalNumber(pick(row, "quote_volume")),
      change24hPercent: this.parseOptionalNumber(pick(row, "change_percentage")),
    });
  }
}
