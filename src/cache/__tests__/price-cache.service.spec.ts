import { PriceCacheService } from "@/cache/price-cache.service";
import type { PersistedPriceCache } from "@/cache/price-cache.codec";
import { InMemoryDocumentStore, TestDataBuilder } from "@/__tests__/utils";

describe("PriceCacheService", () => {
  let now: number;
  let store: InMemoryDocumentStore<PersistedPriceCache>;
  let cache: PriceCacheService;

  const createCache = (flushEvery = 10) =>
    new PriceCacheService(TestDataBuilder.createCacheConfig({ durationSeconds: 60, flushEvery }), store, () => now);

  beforeEach(() => {
    now = 1_700_000_000_000;
    store = new InMemoryDocumentStore<PersistedPriceCache>();
    cache = createCache();
  });

  describe("get", () => {
    it("should return a fresh entry unchanged, whatever the ticker case", () => {
      const result = TestDataBuilder.createAggregatedResult({ ticker: "BTC" });
      cache.set("btc", result);

      now += 59_999;

      expect(cache.get("BTC")).toBe(result);
    });

    it("should treat an entry as expired once its age reaches the duration", () => {
      cache.set("BTC", TestDataBuilder.createAggregatedResult());

      now += 60_000;

      expect(cache.get("BTC")).toBeUndefined();
    });

    it("should honour a per-call duration", () => {
      cache.set("BTC", TestDataBuilder.createAggregatedResult());

      now += 10_000;

      expect(cache.get("BTC", 5)).toBeUndefined();
      expect(cache.get("BTC", 300)).toBeDefined();
    });

    it("should miss on unknown tickers", () => {
      expect(cache.get("ETH")).toBeUndefined();
    });
  });

  describe("maintenance", () => {
    it("should invalidate single tickers", () => {
      cache.set("BTC", TestDataBuilder.createAggregatedResult());

      expect(cache.invalidate("btc")).toBe(true);
      expect(cache.invalidate("btc")).toBe(false);
      expect(cache.get("BTC")).toBeUndefined();
    });

    it("should clear everything and report the count", () => {
      cache.set("BTC", TestDataBuilder.createAggregatedResult());
      cache.set("ETH", TestDataBuilder.createAggregatedResult({ ticker: "ETH" }));

      expect(cache.clear()).toBe(2);
      expect(cache.getInfo().totalEntries).toBe(0);
    });

    it("should count valid and expired entries", () => {
      cache.set("BTC", TestDataBuilder.createAggregatedResult());
      now += 30_000;
      cache.set("ETH", TestDataBuilder.createAggregatedResult({ ticker: "ETH" }));
      now += 40_000;

      expect(cache.getInfo()).toEqual({
        totalEntries: 2,
        validEntries: 1,
        expiredEntries: 1,
        filePath: "test-data/markets_cache.json",
        durationSeconds: 60,
      });
    });
  });

  describe("persistence", () => {
    it("should write the whole cache after every flushEvery writes", () => {
      cache = createCache(2);

      cache.set("BTC", TestDataBuilder.createAggregatedResult());
      expect(store.saved).toHaveLength(0);

      cache.set("ETH", TestDataBuilder.createAggregatedResult({ ticker: "ETH" }));
      expect(store.saved).toHaveLength(1);
      expect(Object.keys(store.saved[0])).toEqual(["BTC", "ETH"]);
    });

    it("should persist envelopes with their sources as ordered entries", () => {
      cache = createCache(1);
      const sources = new Map([
        ["okx", TestDataBuilder.createPriceQuote({ provider: "okx", price: 101 })],
        ["binance", TestDataBuilder.createPriceQuote({ provider: "binance", price: 99 })],
      ]);

      cache.set("BTC", TestDataBuilder.createAggregatedResult({ sources, averagePrice: 100 }));

      expect(store.saved[0].BTC.timestamp).toBe(now);
      expect(store.saved[0].BTC.data.sources.map(([id]) => id)).toEqual(["okx", "binance"]);
    });

    it("should flush pending writes on shutdown only when something changed", async () => {
      await cache.onModuleInit();
      await cache.onModuleDestroy();
      expect(store.saved).toHaveLength(0);

      cache = createCache();
      await cache.onModuleInit();
      cache.set("BTC", TestDataBuilder.createAggregatedResult());
      await cache.onModuleDestroy();
      expect(store.saved).toHaveLength(1);
    });

    it("should load stored entries with their original timestamps", async () => {
      store.data = {
        btc: {
          timestamp: now - 30_000,
          data: {
            ticker: "BTC",
            sources: [["okx", TestDataBuilder.createPriceQuote({ provider: "okx", price: 101 })]],
            averagePrice: 101,
            averageChange24h: null,
            averageVolume24h: null,
            activeSourceCount: 1,
            skippedSourceCount: 0,
            failedSourceCount: 0,
            computedAt: now - 30_000,
          },
        },
      };

      await cache.load();

      const loaded = cache.get("BTC");
      expect(loaded?.sources.get("okx")?.price).toBe(101);

      now += 30_000;
      expect(cache.get("BTC")).toBeUndefined();
    });

    it("should keep serving from memory when a write fails", async () => {
      store.failSaves = true;
      cache.set("BTC", TestDataBuilder.createAggregatedResult());

      await cache.flush();

      expect(cache.getErrorCount("price_cache_flush")).toBe(1);
      expect(cache.get("BTC")).toBeDefined();
    });
  });
});
