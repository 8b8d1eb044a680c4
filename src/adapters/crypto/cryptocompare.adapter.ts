import { BasePriceSourceAdapter } from "../base/base-price-source.adapter";
import { SourceErrorKind, isRateLimitMessage } from "../../common/types/error-handling";
import type { AdapterResult } from "../../common/types/prices";
import { asString, pick } from "../../common/utils/guards.utils";

const UNKNOWN_SYMBOL = /no data for the symbol|does not exist|market does not exist/i;

export class CryptoCompareAdapter extends BasePriceSourceAdapter {
  readonly id = "cryptocompare";
  readonly displayName = "CryptoCompare";
  protected readonly defaultBaseUrl = "https://min-api.cryptocompare.com";

  getSymbolMapping(ticker: string): string[] {
    return [ticker];
  }

  protected async fetchPair(ticker: string, symbol: string): Promise<AdapterResult> {
    const outcome = await this.get(ticker, `${this.baseUrl}/data/pricemultifull?fsyms=${symbol}&tsyms=USD`);
    if (!outcome.ok) return outcome;

    const { response } = outcome;
    if (response.status !== 200) {
      return this.unexpectedResponse(ticker, response);
    }

    // Errors arrive as 200 with Response: "Error"
    if (pick(response.data, "Response") === "Error") {
      const message = asString(pick(response.data, "Message")) ?? "Unknown error";
      if (isRateLimitMessage(message)) {
        return this.failure(SourceErrorKind.RateLimited, ticker, message);
      }
      const kind = UNKNOWN_SYMBOL.test(message) ? SourceErrorKind.NotSupported : SourceErrorKind.ProviderError;
      return this.failure(kind, ticker, message);
    }

    const raw = pick(response.data, "RAW", symbol, "USD");
    if (raw === undefined) {
      return this.failure(SourceErrorKind.TransientError, ticker, "Price not found in response");
    }

    return this.success(ticker, this.parseNumber(pick(raw, "PRICE")), {
      volume24h: this.parseOptionalNumber(pick(raw, "VOLUME24HOURTO")),
      change24hPercent: this.parseOptionalNumber(pick(raw, "CHANGEPCT24HOUR")),
    });
  }
}
