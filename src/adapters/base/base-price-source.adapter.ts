import { BaseService } from "../../common/base/base.service";
import type { IPriceSourceAdapter, PriceSourceAdapterOptions } from "../../common/types/adapters";
import {
  GatewayErrorKind,
  SourceErrorKind,
  createSourceError,
  isRateLimitMessage,
  toError,
  type SourceError,
} from "../../common/types/error-handling";
import type { GatewayResponse, IRequestGateway } from "../../common/types/gateway";
import { createPriceQuote, type AdapterResult } from "../../common/types/prices";
import { isRecord } from "../../common/utils/guards.utils";

const TICKER_PATTERN = /^[A-Z0-9]+$/;

export type FetchOutcome = { ok: true; response: GatewayResponse } | { ok: false; error: SourceError };

/**
 * Base for every price source.
 *
 * Subclasses map a ticker to one or more provider pair ids and parse one pair's response.
 * Everything thrown while parsing is reported as a TransientError; `fetch` never rejects.
 */
export abstract class BasePriceSourceAdapter extends BaseService implements IPriceSourceAdapter {
  abstract readonly id: string;
  abstract readonly displayName: string;
  protected abstract readonly defaultBaseUrl: string;

  constructor(
    protected readonly gateway: IRequestGateway,
    protected readonly options: PriceSourceAdapterOptions = {}
  ) {
    super();
  }

  /**
   * Candidate pair ids in the order they should be tried. Empty means the ticker is not listed.
   */
  abstract getSymbolMapping(ticker: string): string[];

  protected abstract fetchPair(ticker: string, pair: string): Promise<AdapterResult>;

  protected get baseUrl(): string {
    return this.options.baseUrl ?? this.defaultBaseUrl;
  }

  async fetch(rawTicker: string): Promise<AdapterResult> {
    const ticker = rawTicker.trim().toUpperCase();
    if (!TICKER_PATTERN.test(ticker)) {
      return this.failure(SourceErrorKind.NotSupported, ticker, `Invalid ticker symbol "${rawTicker}"`);
    }

    const pairs = this.getSymbolMapping(ticker);
    if (pairs.length === 0) {
      return this.failure(SourceErrorKind.NotSupported, ticker, `Ticker ${ticker} not mapped for ${this.displayName}`);
    }

    try {
      return await this.tryCandidates(ticker, pairs);
    } catch (error) {
      return this.failure(SourceErrorKind.TransientError, ticker, `Unexpected response: ${toError(error).message}`);
    }
  }

  /**
   * First success wins. Once every candidate has failed, a rate limit seen on any of them is returned first,
   * so a throttled venue is never blacklisted; then a definitive "unknown pair"; then the last error.
   */
  protected async tryCandidates(ticker: string, pairs: string[]): Promise<AdapterResult> {
    const errors: SourceError[] = [];

    for (const pair of pairs) {
      const result = await this.fetchPair(ticker, pair);
      if (result.ok) {
        return result;
      }
      this.logDebug(`${pair}: ${result.error.kind} ${result.error.message}`);
      errors.push(result.error);
    }

    const rateLimited = errors.find(error => error.kind === SourceErrorKind.RateLimited);
    if (rateLimited) {
      return { ok: false, error: rateLimited };
    }

    const unknown = errors.filter(error => error.kind === SourceErrorKind.NotSupported);
    if (unknown.length === 1) {
      return { ok: false, error: unknown[0] };
    }
    if (unknown.length > 1) {
      return this.failure(SourceErrorKind.NotSupported, ticker, `No valid pair found for ${ticker} on ${this.displayName}`, {
        tried: pairs,
      });
    }

    return { ok: false, error: errors[errors.length - 1] };
  }

  /**
   * GET through the gateway. Transport failures, 429 and 5xx come back as errors;
   * other statuses are left for the adapter to classify.
   */
  protected async get(ticker: string, url: string): Promise<FetchOutcome> {
    const result = await this.gateway.requestWithProxy(url);
    if (!result.ok) {
      const kind =
        result.error.kind === GatewayErrorKind.RateLimited ? SourceErrorKind.RateLimited : SourceErrorKind.TransientError;
      return {
        ok: false,
        error: createSourceError(kind, this.id, ticker, result.error.message, {
          retryAfterSeconds: result.error.retryAfterSeconds,
        }),
      };
    }

    const { response } = result;
    if (response.status >= 500) {
      return {
        ok: false,
        error: createSourceError(SourceErrorKind.TransientError, this.id, ticker, `HTTP ${response.status}`),
      };
    }
    return { ok: true, response };
  }

  protected success(
    ticker: string,
    price: number,
    extras: { volume24h?: number; change24hPercent?: number } = {}
  ): AdapterResult {
    if (!Number.isFinite(price) || price <= 0) {
      return this.failure(SourceErrorKind.TransientError, ticker, `Invalid price ${price}`);
    }
    return { ok: true, quote: createPriceQuote(this.id, price, extras) };
  }

  protected failure(
    kind: SourceErrorKind,
    ticker: string,
    message: string,
    context?: Record<string, unknown>
  ): AdapterResult {
    return { ok: false, error: createSourceError(kind, this.id, ticker, message, { context }) };
  }

  /**
   * Non-success answer with no adapter-specific meaning
   */
  protected unexpectedResponse(ticker: string, response: GatewayResponse, detail?: string): AdapterResult {
    const message = detail ?? describeBody(response.data) ?? `HTTP ${response.status}`;
    if (response.status === 429 || isRateLimitMessage(message)) {
      return this.failure(SourceErrorKind.RateLimited, ticker, message);
    }
    if (response.status >= 200 && response.status < 300) {
      return this.failure(SourceErrorKind.TransientError, ticker, `Unexpected response shape: ${message}`);
    }
    return this.failure(SourceErrorKind.ProviderError, ticker, `HTTP ${response.status}: ${message}`);
  }

  /**
   * Utility method to safely parse numeric values
   */
  protected parseNumber(value: unknown): number {
    if (typeof value === "number") {
      return value;
    }

    if (typeof value === "string") {
      const parsed = parseFloat(value);
      if (isNaN(parsed)) {
        throw new Error(`Invalid numeric value: ${value}`);
      }
      return parsed;
    }

    throw new Error(`Cannot parse number from: ${typeof value}`);
  }

  /**
   * Like parseNumber, but absent or unparsable values become undefined
   */
  protected parseOptionalNumber(value: unknown): number | undefined {
    if (value === null || value === undefined || value === "") return undefined;
    const parsed = typeof value === "number" ? value : typeof value === "string" ? parseFloat(value) : NaN;
    return Number.isFinite(parsed) ? parsed : undefined;
  }

  /**
   * Percent change from the 24h open; undefined when there is no usable open
   */
  protected changeFromOpen(last: number, open: number | undefined): number | undefined {
    if (open === undefined || open <= 0) return undefined;
    return ((last - open) / open) * 100;
  }
}

function describeBody(data: unknown): string | undefined {
  if (typeof data === "string") return data.slice(0, 200) || undefined;
  if (!isRecord(data)) return undefined;

  for (const key of ["msg", "message", "Message", "retMsg", "err-msg", "error"]) {
    const value = data[key];
    if (typeof value === "string" && value) return value;
    if (Array.isArray(value) && value.length > 0) return value.join(", ");
  }
  return undefined;
}
