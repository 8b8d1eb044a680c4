import { Controller, Get, Param, Query, Res } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import type { Response } from "express";

import { PriceSourceRegistry } from "../adapters/base/price-source.registry";
import { PriceAggregatorService } from "../aggregators/price-aggregator.service";
import { BaseController } from "../common/base/base.controller";
import { serializeAggregatedResult, type SerializedAggregatedResult } from "../common/types/prices";
import { renderEnvelope, renderSummary } from "../formatting/price-text.formatter";
import { AggregatedPriceResponseDto, MultiPriceQueryDto, PriceQueryDto, TickerParamDto } from "./dto/prices.dto";

@ApiTags("Prices")
@Controller("prices")
export class PricesController extends BaseController {
  constructor(
    private readonly aggregator: PriceAggregatorService,
    private readonly sources: PriceSourceRegistry
  ) {
    super();
  }

  @Get(":ticker")
  @ApiOperation({
    summary: "Get the aggregated price for one ticker",
    description: "Queries every enabled source not known to lack the pair, unless a fresh cached envelope exists",
  })
  @ApiResponse({ status: 200, description: "Aggregated envelope", type: AggregatedPriceResponseDto })
  @ApiResponse({ status: 400, description: "Invalid ticker or query" })
  async getPrice(
    @Param() params: TickerParamDto,
    @Query() query: PriceQueryDto,
    @Res({ passthrough: true }) res: Response
  ): Promise<SerializedAggregatedResult | string> {
    return this.executeOperation(async () => {
      const result = await this.aggregator.getAggregatedPrice(params.ticker, query.useCache ?? true);

      if (query.format === "text") {
        res.type("text/plain");
        return renderEnvelope(result, id => this.sources.getDisplayName(id));
      }
      return serializeAggregatedResult(result);
    }, "getPrice");
  }

  @Get()
  @ApiOperation({ summary: "Get aggregated prices for several tickers" })
  @ApiResponse({ status: 200, description: "Envelopes in request order", type: [AggregatedPriceResponseDto] })
  @ApiResponse({ status: 400, description: "Invalid ticker list" })
  async getPrices(
    @Query() query: MultiPriceQueryDto,
    @Res({ passthrough: true }) res: Response
  ): Promise<SerializedAggregatedResult[] | string> {
    return this.executeOperation(async () => {
      const tickers = query.tickers.split(",");
      const results = await this.aggregator.getAggregatedPrices(tickers, query.useCache ?? true);

      if (query.format === "text") {
        res.type("text/plain");
        return renderSummary(results);
      }
      return results.map(serializeAggregatedResult);
    }, "getPrices");
  }
}
