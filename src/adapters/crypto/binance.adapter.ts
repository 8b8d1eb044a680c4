import { BasePriceSourceAdapter } from "../base/base-price-source.adapter";
import { SourceErrorKind } from "../../common/types/error-handling";
import type { AdapterResult } from "../../common/types/prices";
import { asString, pick } from "../../common/utils/guards.utils";

const INVALID_SYMBOL_CODE = -1121;
// Binance answers 418 once an IP keeps hammering after 429s
const HTTP_IP_BANNED = 418;

export class BinanceAdapter extends BasePriceSourceAdapter {
  readonly id = "binance";
  readonly displayName = "Binance";
  protected readonly defaultBaseUrl = "https://api.binance.com";

  getSymbolMapping(ticker: string): string[] {
    return [`${ticker}USDT`, `${ticker}BUSD`, `${ticker}USD`, `${ticker}USDC`];
  }

  protected async fetchPair(ticker: string, pair: string): Promise<AdapterResult> {
    const outcome = await this.get(ticker, `${this.baseUrl}/api/v3/ticker/24hr?symbol=${pair}`);
    if (!outcome.ok) return outcome;

    const { response } = outcome;
    if (response.status === HTTP_IP_BANNED) {
      return this.failure(SourceErrorKind.RateLimited, ticker, "IP temporarily banned (HTTP 418)");
    }

    const message = asString(pick(response.data, "msg"));
    if (pick(response.data, "code") === INVALID_SYMBOL_CODE || message?.includes("Invalid symbol")) {
      return this.failure(SourceErrorKind.NotSupported, ticker, `Invalid symbol ${pair}`);
    }
    if (response.status !== 200) {
      return this.unexpectedResponse(ticker, response, message);
    }

    const data = response.data;
    const lastPrice = this.parseNumber(pick(data, "lastPrice"));
    return this.success(ticker, lastPrice, {
      volume24h: this.parseOptionalNumber(pick(data, "quoteVolume")),
      change24hPercent:
        this.parseOptionalNumber(pick(data, "priceChangePercent")) ??
        this.changeFromOpen(lastPrice, this.parseOptionalNumber(pick(data, "openPrice"))),
    });
  }
}
