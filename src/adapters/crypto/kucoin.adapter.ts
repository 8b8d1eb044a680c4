import { BasePriceSourceAdapter } from "../base/base-price-source.adapter";
import { SourceErrorKind } from "../../common/types/error-handling";
import type { AdapterResult } from "../../common/types/prices";
import { asString, pick } from "../../common/utils/guards.utils";

const SUCCESS_CODE = "200000";
const RATE_LIMIT_CODE = "429000";

export class KuCoinAdapter extends BasePriceSourceAdapter {
  readonly id = "kucoin";
  readonly displayName = "KuCoin";
  protected readonly defaultBaseUrl = "https://api.kucoin.com";

  getSymbolMapping(ticker: string): string[] {
    return [`${ticker}-USDT`];
  }

  protected async fetchPair(ticker: string, symbol: string): Promise<AdapterResult> {
    const outcome = await this.get(ticker, `${this.baseUrl}/api/v1/market/stats?symbol=${symbol}`);
    if (!outcome.ok) return outcome;

    const { response } = outcome;
    const code = asString(pick(response.data, "code"));
    const message = asString(pick(response.data, "msg")) || undefined;

    if (code === RATE_LIMIT_CODE) {
      return this.failure(SourceErrorKind.RateLimited, ticker, message ?? "Too many requests");
    }
    if (response.status !== 200) {
      return this.unexpectedResponse(ticker, response, message);
    }
    if (code !== SUCCESS_CODE) {
      return this.failure(SourceErrorKind.ProviderError, ticker, `KuCoin API error: ${message ?? code ?? "unknown"}`);
    }

    // Unknown symbols still answer 200000, with an empty stats object
    const stats = pick(response.data, "data");
    const last = pick(stats, "last");
    if (last === null || last === undefined) {
      return this.failure(SourceErrorKind.NotSupported, ticker, `No market for ${symbol}`);
    }

    const changeRate = this.parseOptionalNumber(pick(stats, "changeRate"));
    return this.success(ticker, this.parseNumber(last), {
      volume24h: this.parseOptionalNumber(pick(stats, "volValue")),
      change24hPercent: changeRate === undefined ? undefined : changeRate * 100,
    });
  }
}
