import { Module } from "@nestjs/common";
import { ConfigService } from "../config/config.service";
import { PriceCacheService } from "./price-cache.service";

@Module({
  providers: [
    {
      provide: PriceCacheService,
      useFactory: (configService: ConfigService) => new PriceCacheService(configService.getCacheConfig()),
      inject: [ConfigService],
    },
  ],
  exports: [PriceCacheService],
})
export class CacheModule {}
