import { Module } from "@nestjs/common";
import { ConfigService } from "../config/config.service";
import { createAxiosClientFactory } from "./http-client.factory";
import { ProxyPool } from "./proxy-pool.service";
import { RequestGatewayService } from "./request-gateway.service";

@Module({
  providers: [
    {
      provide: RequestGatewayService,
      useFactory: (configService: ConfigService) => {
        const gatewayConfig = configService.getGatewayConfig();
        const clientFactory = createAxiosClientFactory(gatewayConfig);
        const proxyPool = new ProxyPool(configService.getProxyConfig(), clientFactory);
        return new RequestGatewayService(gatewayConfig, clientFactory, proxyPool);
      },
      inject: [ConfigService],
    },
  ],
  exports: [RequestGatewayService],
})
export class GatewayModule {}
