import type { RateLimitedDomain } from "../common/types/gateway";

/**
 * Remembers which domains answered 429 and until when.
 * Expired entries are dropped lazily on lookup.
 */
export class DomainRateLimitTracker {
  private readonly limitedUntil = new Map<string, number>();

  constructor(private readonly now: () => number = Date.now) {}

  markLimited(domain: string, retryAfterSeconds: number): number {
    const until = this.now() + retryAfterSeconds * 1000;
    this.limitedUntil.set(domain, Math.max(until, this.limitedUntil.get(domain) ?? 0));
    return until;
  }

  /**
   * Whole seconds left before the domain may be called again; 0 when it is available.
   */
  remainingSeconds(domain: string): number {
    const until = this.limitedUntil.get(domain);
    if (until === undefined) return 0;

    const remainingMs = until - this.now();
    if (remainingMs <= 0) {
      this.limitedUntil.delete(domain);
      return 0;
    }
    return Math.ceil(remainingMs / 1000);
  }

  clear(domain?: string): void {
    if (domain) {
      this.limitedUntil.delete(domain);
    } else {
      this.limitedUntil.clear();
    }
  }

  list(): RateLimitedDomain[] {
    const now = this.now();
    return [...this.limitedUntil.entries()]
      .filter(([, until]) => until > now)
      .map(([domain, limitedUntil]) => ({ domain, limitedUntil }));
  }
}
