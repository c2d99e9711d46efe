import type { ExchangeSettings } from "@tradewarden/shared";

export type BinanceClientOptions = {
  baseUrl: string;
  timeoutMs?: number;
};

/** Raw kline row: [openTime, open, high, low, close, volume, closeTime, quoteVolume, trades, ...]. */
export type KlineRow = [number, string, string, string, string, string, number, ...unknown[]];

export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, "");
}

export function resolveFuturesBaseUrl(exchange: Pick<ExchangeSettings, "environment" | "baseUrlOverride">): string {
  const override = exchange.baseUrlOverride?.trim();
  if (override) return normalizeBaseUrl(override);

  if (exchange.environment === "TESTNET") {
    return "https://testnet.binancefuture.com";
  }

  const env = (process.env.BINANCE_BASE_URL ?? "").trim();
  if (env) return normalizeBaseUrl(env);

  return "https://fapi.binance.com";
}

/**
 * Public USDⓈ-M futures REST endpoints. Orders go through ccxt; this client only reads market data.
 */
export class BinanceClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: BinanceClientOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.timeoutMs = options.timeoutMs ?? 7000;
  }

  async ping(): Promise<void> {
    await this.request("/fapi/v1/ping");
  }

  async time(): Promise<{ serverTime: number }> {
    return await this.request("/fapi/v1/time");
  }

  async klines(params: { symbol: string; interval: string; limit: number; startTime?: number; endTime?: number }): Promise<unknown> {
    return await this.request("/fapi/v1/klines", { query: params });
  }

  private async request<T>(path: string, options?: { query?: Record<string, string | number | boolean | undefined> }): Promise<T> {
    const url = new URL(`${this.baseUrl}${path}`);
    const query = new URLSearchParams();

    for (const [key, value] of Object.entries(options?.query ?? {})) {
      if (value === undefined) continue;
      query.set(key, String(value));
    }

    if (query.size > 0) {
      url.search = query.toString();
    }

    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const res = await fetch(url, { method: "GET", signal: controller.signal });

      if (!res.ok) {
        const text = await res.text().catch(() => "");
        throw new Error(`Binance HTTP ${res.status}: ${text.slice(0, 250)}`);
      }

      return (await res.json()) as T;
    } finally {
      clearTimeout(t);
    }
  }
}
