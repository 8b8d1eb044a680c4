import { Body, Controller, Delete, Get, HttpCode, Param, Post } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";

import { PriceCacheService, type PriceCacheInfo } from "../cache/price-cache.service";
import { BaseController } from "../common/base/base.controller";
import type { GatewayStatus } from "../common/types/gateway";
import { RequestGatewayService } from "../gateway/request-gateway.service";
import { UnsupportedPairRegistry, type UnsupportedPairStats } from "../registry/unsupported-pair.registry";
import { CacheInfoDto, ChangedResponseDto, UnsupportedPairDto, UnsupportedPairStatsDto } from "./dto/admin.dto";
import { TickerParamDto } from "./dto/prices.dto";

@ApiTags("Administration")
@Controller("admin")
export class AdminController extends BaseController {
  constructor(
    private readonly unsupportedPairs: UnsupportedPairRegistry,
    private readonly cache: PriceCacheService,
    private readonly gateway: RequestGatewayService
  ) {
    super();
  }

  @Get("unsupported-pairs")
  @ApiOperation({ summary: "List pairs known to be unsupported, by provider" })
  @ApiResponse({ status: 200, type: UnsupportedPairStatsDto })
  getUnsupportedPairs(): UnsupportedPairStats {
    return this.unsupportedPairs.getStats();
  }

  @Post("unsupported-pairs")
  @HttpCode(200)
  @ApiOperation({ summary: "Blacklist a pair manually" })
  @ApiResponse({ status: 200, type: ChangedResponseDto })
  @ApiResponse({ status: 400, description: "Invalid provider or ticker" })
  blacklist(@Body() body: UnsupportedPairDto): ChangedResponseDto {
    return { changed: this.unsupportedPairs.blacklist(body.provider, body.ticker) };
  }

  @Post("unsupported-pairs/reload")
  @HttpCode(200)
  @ApiOperation({ summary: "Reload the unsupported pairs file, then reapply manual overrides" })
  @ApiResponse({ status: 200, type: UnsupportedPairStatsDto })
  async reloadUnsupportedPairs(): Promise<UnsupportedPairStats> {
    return this.executeOperation(() => this.unsupportedPairs.reload(), "reloadUnsupportedPairs");
  }

  @Delete("unsupported-pairs/:provider/:ticker")
  @ApiOperation({ summary: "Remove a pair from the blacklist" })
  @ApiResponse({ status: 200, type: ChangedResponseDto })
  unblacklist(@Param() params: UnsupportedPairDto): ChangedResponseDto {
    return { changed: this.unsupportedPairs.unblacklist(params.provider, params.ticker) };
  }

  @Get("cache")
  @ApiOperation({ summary: "Price cache statistics" })
  @ApiResponse({ status: 200, type: CacheInfoDto })
  getCacheInfo(): PriceCacheInfo {
    return this.cache.getInfo();
  }

  @Delete("cache")
  @ApiOperation({ summary: "Drop every cached envelope" })
  clearCache(): { cleared: number } {
    return { cleared: this.cache.clear() };
  }

  @Delete("cache/:ticker")
  @ApiOperation({ summary: "Drop the cached envelope of one ticker" })
  @ApiResponse({ status: 200, type: ChangedResponseDto })
  invalidateCache(@Param() params: TickerParamDto): ChangedResponseDto {
    return { changed: this.cache.invalidate(params.ticker) };
  }

  @Get("gateway")
  @ApiOperation({ summary: "Rate-limited domains and proxy pool state" })
  getGatewayStatus(): GatewayStatus {
    return this.gateway.getStatus();
  }
}
