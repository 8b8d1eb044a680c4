import { Module } from "@nestjs/common";
import { PriceSourceRegistry } from "./base/price-source.registry";
import { ConfigService } from "../config/config.service";
import { GatewayModule } from "../gateway/gateway.module";
import { RequestGatewayService } from "../gateway/request-gateway.service";
import type { IPriceSourceAdapter } from "../common/types/adapters";
import type { IRequestGateway } from "../common/types/gateway";

import {
  BinanceAdapter,
  BybitAdapter,
  CoinGeckoAdapter,
  CryptoCompareAdapter,
  FxRatesAdapter,
  GateIoAdapter,
  HuobiAdapter,
  KrakenAdapter,
  KuCoinAdapter,
  OkxAdapter,
} from "./crypto";

/**
 * Every known source, in default dispatch order
 */
export const PRICE_SOURCE_FACTORIES: ReadonlyArray<readonly [string, (gateway: IRequestGateway) => IPriceSourceAdapter]> = [
  ["coingecko", gateway => new CoinGeckoAdapter(gateway)],
  ["gateio", gateway => new GateIoAdapter(gateway)],
  ["cryptocompare", gateway => new CryptoCompareAdapter(gateway)],
  ["binance", gateway => new BinanceAdapter(gateway)],
  ["kraken", gateway => new KrakenAdapter(gateway)],
  ["huobi", gateway => new HuobiAdapter(gateway)],
  ["okx", gateway => new OkxAdapter(gateway)],
  ["kucoin", gateway => new KuCoinAdapter(gateway)],
  ["bybit", gateway => new BybitAdapter(gateway)],
  ["fxrates", gateway => new FxRatesAdapter(gateway)],
];

export const PRICE_SOURCE_IDS: readonly string[] = PRICE_SOURCE_FACTORIES.map(([id]) => id);

export function createPriceSourceRegistry(gateway: IRequestGateway, enabledIds: readonly string[]): PriceSourceRegistry {
  const factories = new Map(PRICE_SOURCE_FACTORIES);
  const registry = new PriceSourceRegistry();

  for (const id of enabledIds) {
    const create = factories.get(id);
    if (create) {
      registry.register(create(gateway));
    }
  }

  return registry;
}

@Module({
  imports: [GatewayModule],
  providers: [
    // Registration order is dispatch order
    {
      provide: PriceSourceRegistry,
      useFactory: (gateway: RequestGatewayService, configService: ConfigService) =>
        createPriceSourceRegistry(gateway, configService.getEnabledAdapterIds(PRICE_SOURCE_IDS)),
      inject: [RequestGatewayService, ConfigService],
    },
  ],
  exports: [PriceSourceRegistry],
})
export class AdaptersModule {}
