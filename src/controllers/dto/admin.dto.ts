import { ApiProperty } from "@nestjs/swagger";
import { IsString, Matches } from "class-validator";
import { TICKER_PATTERN } from "./prices.dto";

export class UnsupportedPairDto {
  @ApiProperty({ description: "Adapter id", example: "binance" })
  @IsString()
  @Matches(/^[A-Za-z0-9]{1,30}$/, { message: "provider must be an adapter id" })
  provider!: string;

  @ApiProperty({ description: "Ticker symbol", example: "XMR" })
  @Matches(TICKER_PATTERN, { message: "ticker must be 1-20 letters or digits" })
  ticker!: string;
}

export class ChangedResponseDto {
  @ApiProperty({ description: "Whether the call changed any state", example: true })
  changed!: boolean;
}

export class UnsupportedPairStatsDto {
  @ApiProperty({ example: 3 })
  totalEntries!: number;

  @ApiProperty({ example: 2 })
  providerCount!: number;

  @ApiProperty({
    description: "provider id -> tickers",
    example: { binance: ["XMR"], kraken: ["MAJOR", "NOT"] },
    additionalProperties: { type: "array", items: { type: "string" } },
  })
  providers!: Record<string, string[]>;
}

export class CacheInfoDto {
  @ApiProperty({ example: 12 })
  totalEntries!: number;

  @ApiProperty({ example: 10 })
  validEntries!: number;

  @ApiProperty({ example: 2 })
  expiredEntries!: number;

  @ApiProperty({ example: "data/markets_cache.json" })
  filePath!: string;

  @ApiProperty({ example: 60 })
  durationSeconds!: number;
}
