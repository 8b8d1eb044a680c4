import { CryptoCompareAdapter } from "@/adapters/crypto/cryptocompare.adapter";
import { SourceErrorKind } from "@/common/types/error-handling";
import { FakeRequestGateway } from "@/__tests__/utils";

describe("CryptoCompareAdapter", () => {
  let gateway: FakeRequestGateway;
  let adapter: CryptoCompareAdapter;

  beforeEach(() => {
    gateway = new FakeRequestGateway();
    adapter = new CryptoCompareAdapter(gateway);
  });

  it("should read the RAW block", async () => {
    gateway.respond("fsyms=ETH", 200, {
      RAW: { ETH: { USD: { PRICE: 3010.5, VOLUME24HOURTO: 1200000, CHANGEPCT24HOUR: 0.75 } } },
    });

    const result = await adapter.fetch("ETH");

    expect(result).toMatchObject({
      ok: true,
      quote: { provider: "cryptocompare", price: 3010.5, volume24h: 1200000, change24hPercent: 0.75 },
    });
    expect(gateway.requests).toEqual(["https://min-api.cryptocompare.com/data/pricemultifull?fsyms=ETH&tsyms=USD"]);
  });

  it("should classify an unknown symbol as not supported", async () => {
    gateway.respond("fsyms=NOPE", 200, {
      Response: "Error",
      Message: "cccagg_or_exchange market does not exist for this coin pair (NOPE-USD)",
    });

    const result = await adapter.fetch("NOPE");

    expect(result).toMatchObject({ ok: false, error: { kind: SourceErrorKind.NotSupported } });
  });

  it("should classify a rate-limit error payload as rate limited", async () => {
    gateway.respond("fsyms=ETH", 200, { Response: "Error", Message: "You are over your rate limit please upgrade" });

    const result = await adapter.fetch("ETH");

    expect(result).toMatchObject({ ok: false, error: { kind: SourceErrorKind.RateLimited } });
  });

  it("should classify any other error payload as a provider error", async () => {
    gateway.respond("fsyms=ETH", 200, { Response: "Error", Message: "Maintenance window" });

    const result = await adapter.fetch("ETH");

    expect(result).toMatchObject({ ok: false, error: { kind: SourceErrorKind.ProviderError, message: "Maintenance window" } });
  });

  it("should report a body without RAW data as transient", async () => {
    gateway.respond("fsyms=ETH", 200, { DISPLAY: {} });

    const result = await adapter.fetch("ETH");

    expect(result).toMatchObject({
      ok: false,
      error: { kind: SourceErrorKind.TransientError, message: "Price not found in response" },
    });
  });
});
