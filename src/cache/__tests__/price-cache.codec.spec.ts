import { decodePriceCache, encodePriceCache, type CachedEntry } from "@/cache/price-cache.codec";
import { TestDataBuilder } from "@/__tests__/utils";

describe("price cache codec", () => {
  it("should decode what it encodes", () => {
    const result = TestDataBuilder.createAggregatedResult({
      sources: new Map([
        ["kraken", TestDataBuilder.createPriceQuote({ provider: "kraken", price: 99, volume24h: 10 })],
        ["okx", TestDataBuilder.createPriceQuote({ provider: "okx", price: 101, change24hPercent: -1 })],
      ]),
      averagePrice: 100,
      averageChange24h: -1,
      averageVolume24h: 10,
    });
    const entries = new Map<string, CachedEntry>([["BTC", { timestamp: 42, result }]]);

    const decoded = decodePriceCache(JSON.parse(JSON.stringify(encodePriceCache(entries))));

    expect(decoded).toEqual({
      BTC: {
        timestamp: 42,
        data: {
          ticker: "BTC",
          sources: [
            ["kraken", { provider: "kraken", price: 99, volume24h: 10, fetchedAt: 1700000000000 }],
            ["okx", { provider: "okx", price: 101, change24hPercent: -1, fetchedAt: 1700000000000 }],
          ],
          averagePrice: 100,
          averageChange24h: -1,
          averageVolume24h: 10,
          activeSourceCount: 2,
          skippedSourceCount: 0,
          failedSourceCount: 0,
          computedAt: 1700000000000,
        },
      },
    });
  });

  it("should drop malformed entries and keep the rest", () => {
    const decoded = decodePriceCache({
      BTC: { timestamp: 1, data: { ticker: "BTC", sources: [["okx", { provider: "okx", price: 5 }]] } },
      ETH: { timestamp: "yesterday", data: { ticker: "ETH", sources: [] } },
      SOL: { timestamp: 1, data: { ticker: "SOL", sources: [["okx", { provider: "okx" }]] } },
    });

    expect(Object.keys(decoded ?? {})).toEqual(["BTC"]);
    expect(decoded?.BTC.data).toMatchObject({
      averagePrice: 5,
      activeSourceCount: 1,
      skippedSourceCount: 0,
      failedSourceCount: 0,
      computedAt: 0,
    });
  });

  it("should drop entries holding a non-positive price", () => {
    const decoded = decodePriceCache({
      BTC: { timestamp: 1, data: { ticker: "BTC", sources: [["okx", { provider: "okx", price: 0 }]] } },
      ETH: { timestamp: 1, data: { ticker: "ETH", sources: [["okx", { provider: "okx", price: -3 }]] } },
    });

    expect(decoded).toEqual({});
  });

  it("should recompute counts and means from the stored sources", () => {
    const decoded = decodePriceCache({
      BTC: {
        timestamp: 1,
        data: {
          ticker: "BTC",
          sources: [
            ["okx", { provider: "okx", price: 100, change24hPercent: 2, fetchedAt: 5 }],
            ["kraken", { provider: "kraken", price: 104, fetchedAt: 5 }],
          ],
          averagePrice: 999,
          averageChange24h: 50,
          activeSourceCount: 0,
          skippedSourceCount: 1,
          computedAt: 7,
        },
      },
      ETH: {
        timestamp: 1,
        data: { ticker: "ETH", sources: [], averagePrice: 3000, activeSourceCount: 4 },
      },
    });

    expect(decoded?.BTC.data).toMatchObject({
      averagePrice: 102,
      averageChange24h: 2,
      averageVolume24h: null,
      activeSourceCount: 2,
      skippedSourceCount: 1,
      failedSourceCount: 0,
      computedAt: 7,
    });
    expect(decoded?.ETH.data).toMatchObject({ averagePrice: null, activeSourceCount: 0 });
  });

  it("should reject a document that is not an object", () => {
    expect(decodePriceCache([])).toBeUndefined();
    expect(decodePriceCache("cache")).toBeUndefined();
  });
});
