import { Module } from "@nestjs/common";

// App controllers
import { AdminController } from "./controllers/admin.controller";
import { HealthController } from "./controllers/health.controller";
import { PricesController } from "./controllers/prices.controller";

// Core modules
import { ConfigModule } from "./config/config.module";
import { GatewayModule } from "./gateway/gateway.module";
import { AggregatorsModule } from "./aggregators/aggregators.module";

@Module({
  imports: [ConfigModule, GatewayModule, AggregatorsModule],
  controllers: [PricesController, AdminController, HealthController],
})
export class AppModule {}
