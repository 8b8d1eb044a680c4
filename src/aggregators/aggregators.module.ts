import { Module } from "@nestjs/common";
import { PriceAggregatorService } from "./price-aggregator.service";

import { AdaptersModule } from "../adapters/adapters.module";
import { PriceSourceRegistry } from "../adapters/base/price-source.registry";
import { CacheModule } from "../cache/cache.module";
import { PriceCacheService } from "../cache/price-cache.service";
import { ConfigService } from "../config/config.service";
import { RegistryModule } from "../registry/registry.module";
import { UnsupportedPairRegistry } from "../registry/unsupported-pair.registry";

@Module({
  imports: [AdaptersModule, RegistryModule, CacheModule],
  providers: [
    {
      provide: PriceAggregatorService,
      useFactory: (
        sources: PriceSourceRegistry,
        unsupportedPairs: UnsupportedPairRegistry,
        cache: PriceCacheService,
        configService: ConfigService
      ) => new PriceAggregatorService(sources, unsupportedPairs, cache, configService.getAggregatorConfig()),
      inject: [PriceSourceRegistry, UnsupportedPairRegistry, PriceCacheService, ConfigService],
    },
  ],
  exports: [PriceAggregatorService, AdaptersModule, RegistryModule, CacheModule],
})
export class AggregatorsModule {}
