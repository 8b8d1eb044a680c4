import { Module } from "@nestjs/common";
import { ConfigService } from "../config/config.service";
import { UnsupportedPairRegistry } from "./unsupported-pair.registry";

@Module({
  providers: [
    {
      provide: UnsupportedPairRegistry,
      useFactory: (configService: ConfigService) => new UnsupportedPairRegistry(configService.getRegistryConfig()),
      inject: [ConfigService],
    },
  ],
  exports: [UnsupportedPairRegistry],
})
export class RegistryModule {}
