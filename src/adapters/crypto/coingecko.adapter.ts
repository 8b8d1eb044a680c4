import { BasePriceSourceAdapter } from "../base/base-price-source.adapter";
import { SourceErrorKind } from "../../common/types/error-handling";
import type { AdapterResult } from "../../common/types/prices";
import { pick } from "../../common/utils/guards.utils";

/**
 * CoinGecko addresses coins by opaque id, so only mapped tickers are queried.
 */
export const COINGECKO_IDS: Readonly<Record<string, string>> = {
  BTC: "bitcoin",
  ETH: "ethereum",
  SOL: "solana",
  TON: "the-open-network",
  DOGE: "dogecoin",
  XRP: "ripple",
  ADA: "cardano",
  DOT: "polkadot",
  AVAX: "avalanche-2",
  LINK: "chainlink",
  LTC: "litecoin",
  VET: "vechain",
  TRX: "tron",
  XMR: "monero",
  BNB: "binancecoin",
  NOT: "not-financial-advice",
  MAJOR: "major-protocol",
};

export class CoinGeckoAdapter extends BasePriceSourceAdapter {
  readonly id = "coingecko";
  readonly displayName = "CoinGecko";
  protected readonly defaultBaseUrl = "https://api.coingecko.com";

  getSymbolMapping(ticker: string): string[] {
    const coinId = COINGECKO_IDS[ticker];
    return coinId ? [coinId] : [];
  }

  protected async fetchPair(ticker: string, coinId: string): Promise<AdapterResult> {
    const url =
      `${this.baseUrl}/api/v3/simple/price?ids=${encodeURIComponent(coinId)}` +
      "&vs_currencies=usd&include_24hr_change=true&include_24hr_vol=true";
    const outcome = await this.get(ticker, url);
    if (!outcome.ok) return outcome;

    const { response } = outcome;
    if (response.status !== 200) {
      return this.unexpectedResponse(ticker, response);
    }

    const coin = pick(response.data, coinId);
    const price = pick(coin, "usd");
    if (price === undefined) {
      return this.failure(SourceErrorKind.TransientError, ticker, "Coin data not found in response");
    }

    return this.success(ticker, this.parseNumber(price), {
      change24hPercent: this.parseOptionalNumber(pick(coin, "usd_24h_change")),
      volume24h: this.parseOptionalNumber(pick(coin, "usd_24h_vol")),
    });
  }
}
