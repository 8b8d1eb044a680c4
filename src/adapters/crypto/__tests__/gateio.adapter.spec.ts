import { GateIoAdapter } from "@/adapters/crypto/gateio.adapter";
import { SourceErrorKind } from "@/common/types/error-handling";
import { FakeRequestGateway } from "@/__tests__/utils";

describe("GateIoAdapter", () => {
  let gateway: FakeRequestGateway;
  let adapter: GateIoAdapter;

  beforeEach(() => {
    gateway = new FakeRequestGateway();
    adapter = new GateIoAdapter(gateway);
  });

  it("should parse the first ticker row", async () => {
    gateway.respond("currency_pair=SOL_USDT", 200, [
      { currency_pair: "SOL_USDT", last: "150.25", quote_volume: "98765.4", change_percentage: "-2.1" },
    ]);

    const result = await adapter.fetch("SOL");

    expect(result).toMatchObject({
      ok: true,
      quote: { provider: "gateio", price: 150.25, volume24h: 98765.4, change24hPercent: -2.1 },
    });
  });

  it("should classify an invalid currency pair as not supported", async () => {
    gateway.respond("currency_pair=NOPE_USDT", 400, { label: "INVALID_CURRENCY_PAIR", message: "Invalid currency pair" });

    const result = await adapter.fetch("NOPE");

    expect(result).toMatchObject({
      ok: false,
      error: { kind: SourceErrorKind.NotSupported, message: "Unknown currency pair NOPE_USDT" },
    });
  });

  it("should report an empty list as transient", async () => {
    gateway.respond("currency_pair=SOL_USDT", 200, []);

    const result = await adapter.fetch("SOL");

    expect(result).toMatchObject({
      ok: false,
      error: { kind: SourceErrorKind.TransientError, message: "No data found in response" },
    });
  });

  it("should classify other labelled rejections as provider errors", async () => {
    gateway.respond("currency_pair=SOL_USDT", 403, { label: "FORBIDDEN", message: "Forbidden" });

    const result = await adapter.fetch("SOL");

    expect(result).toMatchObject({ ok: false, error: { kind: SourceErrorKind.ProviderError, message: "HTTP 403: FORBIDDEN" } });
  });

  it("should classify a 429 that slipped through as rate limited", async () => {
    gateway.respond("currency_pair=SOL_USDT", 429, { label: "TOO_MANY_REQUESTS" });

    const result = await adapter.fetch("SOL");

    expect(result).toMatchObject({ ok: false, error: { kind: SourceErrorKind.RateLimited } });
  });
});
