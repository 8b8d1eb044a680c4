import { BasePriceSourceAdapter } from "../base/base-price-source.adapter";
import { SourceErrorKind, isRateLimitMessage } from "../../common/types/error-handling";
import type { AdapterResult } from "../../common/types/prices";
import { asString, pick } from "../../common/utils/guards.utils";

export class HuobiAdapter extends BasePriceSourceAdapter {
  readonly id = "huobi";
  readonly displayName = "Huobi";
  protected readonly defaultBaseUrl = "https://api.huobi.pro";

  getSymbolMapping(ticker: string): string[] {
    return [`${ticker.toLowerCase()}usdt`];
  }

  protected async fetchPair(ticker: string, symbol: string): Promise<AdapterResult> {
    const outcome = await this.get(ticker, `${this.baseUrl}/market/detail/merged?symbol=${symbol}`);
    if (!outcome.ok) return outcome;

    const { response } = outcome;
    if (response.status !== 200) {
      return this.unexpectedResponse(ticker, response);
    }

    const data = response.data;
    if (pick(data, "status") === "error") {
      const code = asString(pick(data, "err-code")) ?? "";
      const message = asString(pick(data, "err-msg")) ?? code;
      if (code === "invalid-parameter" || /invalid symbol/i.test(message)) {
        return this.failure(SourceErrorKind.NotSupported, ticker, `Invalid symbol ${symbol}`);
      }
      const kind = isRateLimitMessage(message) ? SourceErrorKind.RateLimited : SourceErrorKind.ProviderError;
      return this.failure(kind, ticker, message);
    }

    const tick = pick(data, "tick");
    if (pick(data, "status") !== "ok" || tick === undefined) {
      return this.failure(SourceErrorKind.TransientError, ticker, "Price not found in response");
    }

    const close = this.parseNumber(pick(tick, "close"));
    return this.success(ticker, close, {
      volume24h: this.parseOptionalNumber(pick(tick, "vol")),
      change24hPercent: this.changeFromOpen(close, this.parseOptionalNumber(pick(tick, "open"))),
    });
  }
}
