import fs from "node:fs";
import path from "node:path";

import { Injectable } from "@nestjs/common";
import type { AppConfig } from "@tradewarden/shared";
import { ConfigurationInvalidError, defaultAppConfig, errorMessage, parseAppConfig } from "@tradewarden/shared";

type Env = Record<string, string | undefined>;

function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function numbers(env: Env, mapping: Record<string, string>): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [key, name] of Object.entries(mapping)) {
    const raw = read(env, name);
    if (raw !== undefined) out[key] = Number(raw);
  }
  return out;
}

/**
 * Environment variables win over the file. Numbers that fail to parse come through as NaN and are
 * reported by schema validation.
 */
export function withEnvOverrides(base: AppConfig, env: Env): unknown {
  const symbols = read(env, "TRADING_SYMBOLS")
    ?.split(",")
    .map((s) => s.trim().toUpperCase())
    .filter(Boolean);
  const openAiKey = read(env, "OPENAI_API_KEY");
  const testnet = read(env, "BINANCE_TESTNET");

  return {
    ...base,
    trading: {
      ...base.trading,
      ...numbers(env, {
        aiDailyLimit: "AI_DAILY_LIMIT",
        maxTradesPerDay: "MAX_TRADES_PER_DAY",
        positionSizeUSD: "POSITION_SIZE_USD",
        maxPositionSizeUSD: "MAX_POSITION_SIZE_USD",
        riskPerTradePercent: "RISK_PER_TRADE_PERCENT",
        stopLossPercent: "STOP_LOSS_PERCENT",
        takeProfitPercent: "TAKE_PROFIT_PERCENT"
      })
    },
    advisor: {
      ...base.advisor,
      ...(openAiKey ? { apiKey: openAiKey, enabled: true } : {}),
      ...(read(env, "OPENAI_MODEL") ? { model: read(env, "OPENAI_MODEL") } : {}),
      ...(read(env, "OPENAI_BASE_URL") ? { baseUrl: read(env, "OPENAI_BASE_URL") } : {})
    },
    engine: {
      ...base.engine,
      ...(symbols ? { symbols } : {}),
      ...(read(env, "TRADING_TIMEFRAME") ? { timeframe: read(env, "TRADING_TIMEFRAME") } : {}),
      ...(read(env, "EXECUTION_MODE") ? { executionMode: read(env, "EXECUTION_MODE")?.toUpperCase() } : {}),
      ...numbers(env, { paperBalance: "PAPER_TRADING_INITIAL_BALANCE" })
    },
    exchange: {
      ...base.exchange,
      ...(read(env, "BINANCE_API_KEY") ? { apiKey: read(env, "BINANCE_API_KEY") } : {}),
      ...(read(env, "BINANCE_API_SECRET") ? { apiSecret: read(env, "BINANCE_API_SECRET") } : {}),
      ...(testnet ? { environment: testnet === "true" || testnet === "1" ? "TESTNET" : "MAINNET" } : {})
    },
    server: {
      ...base.server,
      ...(read(env, "API_KEY") ? { apiKey: read(env, "API_KEY") } : {}),
      ...numbers(env, { port: "PORT" })
    }
  };
}

@Injectable()
export class ConfigService {
  private cached: { config: AppConfig; mtimeMs: number | null } | null = null;

  constructor(private readonly env: Env = process.env) {}

  get dataDir(): string {
    return this.env.DATA_DIR ?? path.resolve(process.cwd(), "../../data");
  }

  private get configPath(): string {
    return path.join(this.dataDir, "config.json");
  }

  /** Throws ConfigurationInvalidError when the file or the environment breaks a rule. */
  load(): AppConfig {
    const mtimeMs = fs.existsSync(this.configPath) ? fs.statSync(this.configPath).mtimeMs : null;
    if (this.cached && this.cached.mtimeMs === mtimeMs) {
      return this.cached.config;
    }

    const base = mtimeMs === null ? defaultAppConfig() : parseAppConfig(this.readFile());
    const config = parseAppConfig(withEnvOverrides(base, this.env));
    this.cached = { config, mtimeMs };
    return config;
  }

  private readFile(): unknown {
    try {
      return JSON.parse(fs.readFileSync(this.configPath, "utf-8"));
    } catch (err) {
      throw new ConfigurationInvalidError([`${this.configPath} is not valid JSON: ${errorMessage(err)}`]);
    }
  }
}
