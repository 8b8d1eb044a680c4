import { DomainRateLimitTracker } from "@/gateway/domain-rate-limit.tracker";

describe("DomainRateLimitTracker", () => {
  let now: number;
  let tracker: DomainRateLimitTracker;

  beforeEach(() => {
    now = 1000;
    tracker = new DomainRateLimitTracker(() => now);
  });

  it("should report no wait for unknown domains", () => {
    expect(tracker.remainingSeconds("api.binance.com")).toBe(0);
  });

  it("should count down in whole seconds and forget the domain once expired", () => {
    expect(tracker.markLimited("api.binance.com", 30)).toBe(31000);
    expect(tracker.remainingSeconds("api.binance.com")).toBe(30);

    now = 30500;
    expect(tracker.remainingSeconds("api.binance.com")).toBe(1);

    now = 31000;
    expect(tracker.remainingSeconds("api.binance.com")).toBe(0);
    expect(tracker.list()).toEqual([]);
  });

  it("should never shorten an existing window", () => {
    tracker.markLimited("api.okx.com", 60);
    tracker.markLimited("api.okx.com", 5);

    expect(tracker.remainingSeconds("api.okx.com")).toBe(60);
  });

  it("should list active windows and clear them", () => {
    tracker.markLimited("api.okx.com", 10);
    tracker.markLimited("api.kraken.com", 20);

    expect(tracker.list()).toEqual([
      { domain: "api.okx.com", limitedUntil: 11000 },
      { domain: "api.kraken.com", limitedUntil: 21000 },
    ]);

    tracker.clear("api.okx.com");
    expect(tracker.list()).toEqual([{ domain: "api.kraken.com", limitedUntil: 21000 }]);

    tracker.clear();
    expect(tracker.list()).toEqual([]);
  });
});
