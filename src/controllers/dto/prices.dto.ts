import { ApiProperty } from "@nestjs/swagger";
import { Transform } from "class-transformer";
import { IsBoolean, IsIn, IsNumber, IsOptional, IsString, Matches } from "class-validator";

export const TICKER_PATTERN = /^[A-Za-z0-9]{1,20}$/;
export const TICKER_LIST_PATTERN = /^[A-Za-z0-9]{1,20}(,[A-Za-z0-9]{1,20}){0,49}$/;

export type ResponseFormat = "json" | "text";
const RESPONSE_FORMATS: ResponseFormat[] = ["json", "text"];

function toBoolean({ value }: { value: unknown }): unknown {
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  return value;
}

export class TickerParamDto {
  @ApiProperty({ description: "Ticker symbol", example: "BTC" })
  @Matches(TICKER_PATTERN, { message: "ticker must be 1-20 letters or digits" })
  ticker!: string;
}

export class PriceQueryDto {
  @ApiProperty({
    description: "Serve a fresh cached envelope when one exists",
    example: true,
    required: false,
    default: true,
  })
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  useCache?: boolean;

  @ApiProperty({ description: "Response format", enum: RESPONSE_FORMATS, required: false, default: "json" })
  @IsOptional()
  @IsIn(RESPONSE_FORMATS)
  format?: ResponseFormat;
}

export class MultiPriceQueryDto extends PriceQueryDto {
  @ApiProperty({ description: "Comma separated ticker symbols", example: "BTC,ETH,SOL" })
  @Matches(TICKER_LIST_PATTERN, { message: "tickers must be a comma separated list of up to 50 symbols" })
  tickers!: string;
}

export class PriceQuoteDto {
  @ApiProperty({ description: "Adapter id", example: "binance" })
  @IsString()
  provider!: string;

  @ApiProperty({ description: "Last price in USD", example: 64250.12 })
  @IsNumber()
  price!: number;

  @ApiProperty({ description: "24h volume in quote currency", example: 1250000000, required: false })
  @IsOptional()
  @IsNumber()
  volume24h?: number;

  @ApiProperty({ description: "24h change in percent", example: 2.35, required: false })
  @IsOptional()
  @IsNumber()
  change24hPercent?: number;

  @ApiProperty({ description: "Epoch ms the quote was fetched", example: 1703123456789 })
  @IsNumber()
  fetchedAt!: number;
}

export class AggregatedPriceResponseDto {
  @ApiProperty({ example: "BTC" })
  ticker!: string;

  @ApiProperty({
    description: "[provider, quote] entries in dispatch order",
    example: [["binance", { provider: "binance", price: 64250.12, fetchedAt: 1703123456789 }]],
    type: "array",
    items: { type: "array" },
  })
  sources!: Array<[string, PriceQuoteDto]>;

  @ApiProperty({ nullable: true, type: Number, example: 64251.3 })
  averagePrice!: number | null;

  @ApiProperty({ nullable: true, type: Number, example: 2.1 })
  averageChange24h!: number | null;

  @ApiProperty({ nullable: true, type: Number, example: 980000000 })
  averageVolume24h!: number | null;

  @ApiProperty({ example: 7 })
  activeSourceCount!: number;

  @ApiProperty({ description: "Sources skipped as known unsupported", example: 1 })
  skippedSourceCount!: number;

  @ApiProperty({ description: "Sources dispatched that returned nothing", example: 2 })
  failedSourceCount!: number;

  @ApiProperty({ example: 1703123456789 })
  computedAt!: number;
}
