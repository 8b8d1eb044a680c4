import axios, { type AxiosRequestConfig } from "axios";
import { HttpsProxyAgent } from "https-proxy-agent";
import type { GatewayResponse } from "../common/types/gateway";
import type { RequestGatewayConfig } from "../config/interfaces/service-config.types";

/**
 * Thrown by an HttpClient when no HTTP answer was received at all.
 */
export class HttpTransportError extends Error {
  constructor(
    message: string,
    readonly timedOut: boolean,
    readonly code?: string
  ) {
    super(message);
    this.name = "HttpTransportError";
  }
}

/**
 * Minimal GET client. Every HTTP status resolves; only transport failures reject (with HttpTransportError).
 */
export interface HttpClient {
  get(url: string, options?: { timeoutMs?: number }): Promise<GatewayResponse>;
}

export type HttpClientFactory = (proxyUrl?: string) => HttpClient;

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT", "ESOCKETTIMEDOUT"]);

/**
 * Axios-backed clients; a proxy URL routes both http and https through an HttpsProxyAgent.
 */
export function createAxiosClientFactory(config: RequestGatewayConfig): HttpClientFactory {
  return (proxyUrl?: string): HttpClient => {
    const axiosConfig: AxiosRequestConfig = {
      timeout: config.httpTimeoutMs,
      headers: {
        "User-Agent": config.userAgent,
        Accept: "application/json",
      },
      validateStatus: () => true,
    };

    if (proxyUrl) {
      const agent = new HttpsProxyAgent(proxyUrl);
      axiosConfig.httpsAgent = agent;
      axiosConfig.httpAgent = agent;
      axiosConfig.proxy = false; // agent handles the tunnel
    }

    const client = axios.create(axiosConfig);

    return {
      async get(url: string, options: { timeoutMs?: number } = {}): Promise<GatewayResponse> {
        try {
          const response = await client.get<unknown>(url, {
            ...(options.timeoutMs !== undefined && { timeout: options.timeoutMs }),
          });
          return {
            status: response.status,
            data: response.data,
            headers: normalizeHeaders(response.headers),
          };
        } catch (error) {
          if (axios.isAxiosError(error)) {
            const timedOut = error.code !== undefined && TIMEOUT_CODES.has(error.code);
            throw new HttpTransportError(error.message, timedOut, error.code);
          }
          throw new HttpTransportError(error instanceof Error ? error.message : String(error), false);
        }
      },
    };
  };
}

function normalizeHeaders(headers: object): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === "string") {
      normalized[key.toLowerCase()] = value;
    } else if (typeof value === "number") {
      normalized[key.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      normalized[key.toLowerCase()] = value.join(", ");
    }
  }
  return normalized;
}
