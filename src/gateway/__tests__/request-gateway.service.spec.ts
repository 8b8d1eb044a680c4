import { GatewayErrorKind } from "@/common/types/error-handling";
import type { GatewayResult } from "@/common/types/gateway";
import { DomainRateLimitTracker } from "@/gateway/domain-rate-limit.tracker";
import { HttpTransportError } from "@/gateway/http-client.factory";
import { ProxyPool } from "@/gateway/proxy-pool.service";
import { RequestGatewayService, domainOf, parseRetryAfter } from "@/gateway/request-gateway.service";
import { FakeHttpClient, TestDataBuilder, createFakeClientFactory } from "@/__tests__/utils";

const TICKER_URL = "https://api.example.test/ticker?symbol=BTCUSDT";
const DOMAIN = "api.example.test";
const PROXY_A = "http://proxy-a.test:8080";
const PROXY_B = "http://proxy-b.test:8080";

function expectFailure(result: GatewayResult) {
  if (result.ok) {
    throw new Error(`Expected a failure, got HTTP ${result.response.status}`);
  }
  return result.error;
}

describe("RequestGatewayService", () => {
  let now: number;
  let direct: FakeHttpClient;
  let tracker: DomainRateLimitTracker;

  beforeEach(() => {
    now = 1_700_000_000_000;
    direct = new FakeHttpClient();
    tracker = new DomainRateLimitTracker(() => now);
  });

  function createGateway(proxies: Record<string, FakeHttpClient> = {}, maxProxyRetries = 3): RequestGatewayService {
    const clientFactory = createFakeClientFactory(direct, proxies);
    const pool = new ProxyPool(
      TestDataBuilder.createProxyConfig({ proxies: Object.keys(proxies), maxProxyRetries }),
      clientFactory,
      () => 0
    );
    return new RequestGatewayService(TestDataBuilder.createGatewayConfig(), clientFactory, pool, tracker);
  }

  describe("request", () => {
    it("should pass through any non-429 answer", async () => {
      direct.enqueue(TestDataBuilder.createHttpResponse(404, { msg: "not found" }));
      const gateway = createGateway();

      const result = await gateway.request(TICKER_URL);

      expect(result).toEqual(TestDataBuilder.createGatewayResponse(404, { msg: "not found" }));
      expect(direct.calls).toEqual([TICKER_URL]);
    });

    it("should retry a 429 and return the eventual answer", async () => {
      direct.enqueue(TestDataBuilder.createHttpResponse(429), TestDataBuilder.createHttpResponse(200, { price: 1 }));
      const gateway = createGateway();

      const result = await gateway.request(TICKER_URL);

      expect(result.ok).toBe(true);
      expect(direct.calls).toHaveLength(2);
    });

    it("should mark the domain for the Retry-After period after repeated 429s", async () => {
      direct.enqueue(
        TestDataBuilder.createHttpResponse(429),
        TestDataBuilder.createHttpResponse(429),
        TestDataBuilder.createHttpResponse(429, {}, { "retry-after": "30" })
      );
      const gateway = createGateway();

      const error = expectFailure(await gateway.request(TICKER_URL));

      expect(error.kind).toBe(GatewayErrorKind.RateLimited);
      expect(error.retryAfterSeconds).toBe(30);
      expect(direct.calls).toHaveLength(3);
      expect(gateway.getStatus().rateLimitedDomains).toEqual([{ domain: DOMAIN, limitedUntil: now + 30000 }]);
    });

    it("should fall back to the default window without a usable Retry-After", async () => {
      direct = new FakeHttpClient(TestDataBuilder.createHttpResponse(429, {}, { "retry-after": "soon" }));
      const gateway = createGateway();

      await gateway.request(TICKER_URL);

      expect(tracker.remainingSeconds(DOMAIN)).toBe(60);
    });

    it("should not call a domain while it is rate limited", async () => {
      tracker.markLimited(DOMAIN, 45);
      const gateway = createGateway();

      const error = expectFailure(await gateway.request(TICKER_URL));

      expect(error).toMatchObject({ kind: GatewayErrorKind.RateLimited, domain: DOMAIN, retryAfterSeconds: 45 });
      expect(direct.calls).toEqual([]);
    });

    it("should call the domain again once the window has passed", async () => {
      tracker.markLimited(DOMAIN, 45);
      const gateway = createGateway();
      now += 45000;

      const result = await gateway.request(TICKER_URL);

      expect(result.ok).toBe(true);
      expect(direct.calls).toEqual([TICKER_URL]);
    });

    it("should report timeouts without retrying", async () => {
      direct.enqueue(new HttpTransportError("timeout of 1000ms exceeded", true, "ECONNABORTED"));
      const gateway = createGateway();

      const error = expectFailure(await gateway.request(TICKER_URL));

      expect(error.kind).toBe(GatewayErrorKind.Timeout);
      expect(error.message).toBe(`Request to ${DOMAIN} failed: timeout of 1000ms exceeded`);
      expect(direct.calls).toHaveLength(1);
    });

    it("should report network failures", async () => {
      direct.enqueue(new HttpTransportError("getaddrinfo ENOTFOUND", false, "ENOTFOUND"));
      const gateway = createGateway();

      expect(expectFailure(await gateway.request(TICKER_URL)).kind).toBe(GatewayErrorKind.Network);
    });

    it("should reject malformed URLs", async () => {
      const gateway = createGateway();

      const error = expectFailure(await gateway.request("not a url"));

      expect(error.kind).toBe(GatewayErrorKind.Network);
      expect(direct.calls).toEqual([]);
    });
  });

  describe("requestWithProxy", () => {
    beforeEach(() => {
      direct = new FakeHttpClient(TestDataBuilder.createHttpResponse(429));
    });

    it("should return the direct answer when it is not rate limited", async () => {
      direct = new FakeHttpClient(TestDataBuilder.createHttpResponse(200, { price: 1 }));
      const proxyA = new FakeHttpClient();
      const gateway = createGateway({ [PROXY_A]: proxyA });

      const result = await gateway.requestWithProxy(TICKER_URL);

      expect(result.ok).toBe(true);
      expect(proxyA.calls).toEqual([]);
    });

    it("should retry a rate-limited request through a validated proxy", async () => {
      const proxyA = new FakeHttpClient(TestDataBuilder.createHttpResponse(200, { price: 2 }));
      const gateway = createGateway({ [PROXY_A]: proxyA });

      const result = await gateway.requestWithProxy(TICKER_URL);

      expect(result).toEqual(TestDataBuilder.createGatewayResponse(200, { price: 2 }));
      expect(proxyA.calls).toEqual(["https://proxy-check.test/ping", TICKER_URL]);
    });

    it("should go straight to the proxies while the domain is rate limited", async () => {
      tracker.markLimited(DOMAIN, 60);
      const proxyA = new FakeHttpClient(TestDataBuilder.createHttpResponse(200, { price: 2 }));
      const gateway = createGateway({ [PROXY_A]: proxyA });

      const result = await gateway.requestWithProxy(TICKER_URL);

      expect(result.ok).toBe(true);
      expect(direct.calls).toEqual([]);
    });

    it("should evict a proxy that fails and move on to the next", async () => {
      const proxyA = new FakeHttpClient().enqueue(
        TestDataBuilder.createHttpResponse(200),
        new HttpTransportError("socket hang up", false, "ECONNRESET")
      );
      const proxyB = new FakeHttpClient(TestDataBuilder.createHttpResponse(200, { price: 3 }));
      const gateway = createGateway({ [PROXY_A]: proxyA, [PROXY_B]: proxyB });

      const result = await gateway.requestWithProxy(TICKER_URL);

      expect(result).toEqual(TestDataBuilder.createGatewayResponse(200, { price: 3 }));
      expect(gateway.getStatus().proxies).toEqual({ enabled: true, total: 2, valid: 1, failed: 1, untested: 0 });
    });

    it("should keep a proxy that was itself rate limited", async () => {
      const proxyA = new FakeHttpClient().enqueue(TestDataBuilder.createHttpResponse(200));
      proxyA.enqueue(
        TestDataBuilder.createHttpResponse(429),
        TestDataBuilder.createHttpResponse(429),
        TestDataBuilder.createHttpResponse(429)
      );
      const gateway = createGateway({ [PROXY_A]: proxyA });

      const error = expectFailure(await gateway.requestWithProxy(TICKER_URL));

      expect(error).toMatchObject({ kind: GatewayErrorKind.RateLimited, proxy: PROXY_A });
      expect(gateway.getStatus().proxies.valid).toBe(1);
    });

    it("should stop after the configured number of proxy attempts", async () => {
      const failing = () => new FakeHttpClient().enqueue(TestDataBuilder.createHttpResponse(200), new Error("reset"));
      const proxyA = failing();
      const proxyB = failing();
      const gateway = createGateway({ [PROXY_A]: proxyA, [PROXY_B]: proxyB }, 1);

      const error = expectFailure(await gateway.requestWithProxy(TICKER_URL));

      expect(error.kind).toBe(GatewayErrorKind.Network);
      expect(proxyA.calls).toHaveLength(2);
      expect(proxyB.calls).toEqual(["https://proxy-check.test/ping"]);
    });

    it("should return the direct error when the pool is empty", async () => {
      const gateway = createGateway();

      const error = expectFailure(await gateway.requestWithProxy(TICKER_URL));

      expect(error.kind).toBe(GatewayErrorKind.RateLimited);
      expect(error.proxy).toBeUndefined();
    });
  });
});

describe("domainOf", () => {
  it("should extract the hostname", () => {
    expect(domainOf("https://api.kraken.com/0/public/Ticker?pair=XBTUSD")).toBe("api.kraken.com");
  });

  it("should return undefined for garbage", () => {
    expect(domainOf("::")).toBeUndefined();
  });
});

describe("parseRetryAfter", () => {
  it.each([
    ["30", 30],
    [" 5 ", 5],
    ["0", undefined],
    ["Wed, 21 Oct 2026 07:28:00 GMT", undefined],
    [undefined, undefined],
  ])("should parse %p as %p", (value, expected) => {
    expect(parseRetryAfter(value)).toBe(expected);
  });
});
