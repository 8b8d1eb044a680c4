import { Controller, Get } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";

import { PriceAggregatorService } from "../aggregators/price-aggregator.service";
import { BaseController } from "../common/base/base.controller";

export interface LivenessResponse {
  status: "ok";
  timestamp: number;
  uptime: number;
  sources: number;
}

@ApiTags("System Health")
@Controller("health")
export class HealthController extends BaseController {
  constructor(private readonly aggregator: PriceAggregatorService) {
    super();
  }

  @Get()
  @ApiOperation({ summary: "Liveness probe", description: "Reports uptime and the number of enabled price sources" })
  @ApiResponse({ status: 200, description: "Service is alive" })
  getHealth(): LivenessResponse {
    return {
      status: "ok",
      timestamp: Date.now(),
      uptime: Math.floor(this.getUptime() / 1000),
      sources: this.aggregator.getSourceCount(),
    };
  }
}
