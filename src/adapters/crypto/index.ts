export { CoinGeckoAdapter, COINGECKO_IDS } from "./coingecko.adapter";
export { GateIoAdapter } from "./gateio.adapter";
export { CryptoCompareAdapter } from "./cryptocompare.adapter";
export { BinanceAdapter } from "./binance.adapter";
export { KrakenAdapter, type KrakenTickerData } from "./kraken.adapter";
export { HuobiAdapter } from "./huobi.adapter";
export { OkxAdapter } from "./okx.adapter";
export { KuCoinAdapter } from "./kucoin.adapter";
export { BybitAdapter } from "./bybit.adapter";
export { FxRatesAdapter, FXRATES_SUPPORTED } from "./fxrates.adapter";
