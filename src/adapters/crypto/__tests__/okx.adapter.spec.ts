import { OkxAdapter } from "@/adapters/crypto/okx.adapter";
import { SourceErrorKind } from "@/common/types/error-handling";
import { FakeRequestGateway } from "@/__tests__/utils";

describe("OkxAdapter", () => {
  let gateway: FakeRequestGateway;
  let adapter: OkxAdapter;

  beforeEach(() => {
    gateway = new FakeRequestGateway();
    adapter = new OkxAdapter(gateway);
  });

  it("should parse the ticker and derive the change from the 24h open", async () => {
    gateway.respond("instId=ETH-USDT", 200, {
      code: "0",
      msg: "",
      data: [{ instId: "ETH-USDT", last: "3000", open24h: "2400", volCcy24h: "5000000" }],
    });

    const result = await adapter.fetch("ETH");

    expect(result).toMatchObject({ ok: true, quote: { provider: "okx", price: 3000, volume24h: 5000000 } });
    if (result.ok) {
      expect(result.quote.change24hPercent).toBeCloseTo(25, 6);
    }
    expect(gateway.requests).toEqual(["https://www.okx.com/api/v5/market/ticker?instId=ETH-USDT"]);
  });

  it("should classify an unknown instrument as not supported", async () => {
    gateway.respond("instId=NOPE-USDT", 200, { code: "51001", msg: "Instrument ID does not exist", data: [] });

    const result = await adapter.fetch("NOPE");

    expect(result).toMatchObject({
      ok: false,
      error: { kind: SourceErrorKind.NotSupported, message: "Instrument ID does not exist" },
    });
  });

  it("should classify code 50011 as rate limited", async () => {
    gateway.respond("instId=ETH-USDT", 200, { code: "50011", msg: "", data: [] });

    const result = await adapter.fetch("ETH");

    expect(result).toMatchObject({ ok: false, error: { kind: SourceErrorKind.RateLimited, message: "Too many requests" } });
  });

  it("should classify other non-zero codes as provider errors", async () => {
    gateway.respond("instId=ETH-USDT", 200, { code: "50001", msg: "Service temporarily unavailable", data: [] });

    const result = await adapter.fetch("ETH");

    expect(result).toMatchObject({
      ok: false,
      error: { kind: SourceErrorKind.ProviderError, message: "OKX API error: Service temporarily unavailable" },
    });
  });
});
