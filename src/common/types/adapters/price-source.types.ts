import type { AdapterResult } from "../prices";

/**
 * One external price venue. Implementations never throw from `fetch`.
 */
export interface IPriceSourceAdapter {
  /** Stable lower-case id, used as registry and envelope key */
  readonly id: string;
  /** Human-readable venue name */
  readonly displayName: string;
  fetch(ticker: string): Promise<AdapterResult>;
}

export interface PriceSourceAdapterOptions {
  /** Overrides the provider's public base URL */
  baseUrl?: string;
}
