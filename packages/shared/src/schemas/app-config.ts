import { z } from "zod";

import { ConfigurationInvalidError } from "../errors";
import { TimeframeSchema } from "./market";

export const CONFIG_VERSION = 1 as const;

export const ExecutionModeSchema = z.enum(["PAPER", "LIVE"]);
export type ExecutionMode = z.infer<typeof ExecutionModeSchema>;

export const ExchangeEnvironmentSchema = z.enum(["MAINNET", "TESTNET"]);
export type ExchangeEnvironment = z.infer<typeof ExchangeEnvironmentSchema>;

export const TradingConfigSchema = z.object({
  minimumSignalStrength: z.number().min(0).max(1).default(0.7),
  validationThreshold: z.number().min(0).max(100).default(80),
  aiDailyLimit: z.number().int().default(50),
  aiCacheDurationMinutes: z.number().default(15),
  maxTradesPerDay: z.number().int().default(3),
  positionSizeUSD: z.number().default(100),
  maxPositionSizeUSD: z.number().default(500),
  riskPerTradePercent: z.number().default(1.5),
  stopLossPercent: z.number().default(2),
  takeProfitPercent: z.number().default(3)
});
export type TradingConfig = z.infer<typeof TradingConfigSchema>;

export const StrategySettingsSchema = z.object({
  fastPeriod: z.number().int().min(2).default(12),
  slowPeriod: z.number().int().min(3).default(26),
  adxPeriod: z.number().int().min(2).default(14),
  adxThreshold: z.number().min(0).max(100).default(25),
  rsiPeriod: z.number().int().min(2).default(14),
  rsiOverbought: z.number().min(50).max(100).default(70),
  rsiOversold: z.number().min(0).max(50).default(30),
  atrPeriod: z.number().int().min(2).default(14),
  volumePeriod: z.number().int().min(1).default(20),
  stopAtrMultiplier: z.number().positive().default(2),
  takeProfitAtrMultiplier: z.number().positive().default(3)
});
export type StrategySettings = z.infer<typeof StrategySettingsSchema>;

export const AdvisorSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).default("gpt-4o-mini"),
  baseUrl: z.string().url().default("https://api.openai.com/v1"),
  timeoutMs: z.number().int().min(500).max(120_000).default(15_000)
});
export type AdvisorSettings = z.infer<typeof AdvisorSettingsSchema>;

export const EngineSettingsSchema = z.object({
  symbols: z
    .array(
      z
        .string()
        .trim()
        .min(1)
        .transform((s) => s.toUpperCase())
    )
    .default(["BTCUSDT"]),
  timeframe: TimeframeSchema.default("15m"),
  pollIntervalMs: z.number().int().min(1_000).max(3_600_000).default(30_000),
  windowSize: z.number().int().min(10).max(1_000).default(100),
  executionMode: ExecutionModeSchema.default("PAPER"),
  paperBalance: z.number().positive().default(10_000),
  executionTimeoutMs: z.number().int().min(500).max(120_000).default(10_000),
  reversalStrength: z.number().min(0).max(1).default(0.7)
});
export type EngineSettings = z.infer<typeof EngineSettingsSchema>;

export const ExchangeSettingsSchema = z.object({
  apiKey: z.string().min(1).optional(),
  apiSecret: z.string().min(1).optional(),
  environment: ExchangeEnvironmentSchema.default("TESTNET"),
  baseUrlOverride: z.string().url().optional()
});
export type ExchangeSettings = z.infer<typeof ExchangeSettingsSchema>;

export const ServerSettingsSchema = z.object({
  apiKey: z.string().min(16).optional(),
  port: z.number().int().min(1).max(65535).default(8148)
});
export type ServerSettings = z.infer<typeof ServerSettingsSchema>;

export const AppConfigSchema = z.object({
  version: z.literal(CONFIG_VERSION),
  createdAt: z.string().min(1),
  updatedAt: z.string().min(1),
  trading: TradingConfigSchema.default({}),
  strategy: StrategySettingsSchema.default({}),
  advisor: AdvisorSettingsSchema.default({}),
  engine: EngineSettingsSchema.default({}),
  exchange: ExchangeSettingsSchema.default({}),
  server: ServerSettingsSchema.default({})
});
export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Cross-field rules the field schemas cannot express. Collected rather than thrown one by one so a
 * startup failure lists everything wrong with the file.
 */
export function collectConfigIssues(config: Pick<AppConfig, "trading" | "strategy" | "advisor" | "engine" | "exchange">): string[] {
  const { trading, strategy, advisor, engine, exchange } = config;
  const issues: string[] = [];

  if (trading.aiDailyLimit < 0) issues.push("trading.aiDailyLimit must be >= 0");
  if (trading.aiCacheDurationMinutes <= 0) issues.push("trading.aiCacheDurationMinutes must be > 0");
  if (trading.maxTradesPerDay <= 0) issues.push("trading.maxTradesPerDay must be > 0");
  if (trading.positionSizeUSD <= 0) issues.push("trading.positionSizeUSD must be > 0");
  if (trading.maxPositionSizeUSD <= 0) issues.push("trading.maxPositionSizeUSD must be > 0");
  if (trading.positionSizeUSD > trading.maxPositionSizeUSD) {
    issues.push("trading.positionSizeUSD must not exceed trading.maxPositionSizeUSD");
  }
  if (trading.riskPerTradePercent <= 0 || trading.riskPerTradePercent > 100) {
    issues.push("trading.riskPerTradePercent must be in (0, 100]");
  }
  if (trading.stopLossPercent <= 0) issues.push("trading.stopLossPercent must be > 0");
  if (trading.takeProfitPercent <= 0) issues.push("trading.takeProfitPercent must be > 0");
  if (trading.stopLossPercent >= trading.takeProfitPercent) {
    issues.push("trading.stopLossPercent must be below trading.takeProfitPercent");
  }
  if (trading.stopLossPercent >= 100) issues.push("trading.stopLossPercent must be below 100");

  if (strategy.fastPeriod >= strategy.slowPeriod) issues.push("strategy.fastPeriod must be below strategy.slowPeriod");
  if (strategy.rsiOversold >= strategy.rsiOverbought) issues.push("strategy.rsiOversold must be below strategy.rsiOverbought");
  if (strategy.stopAtrMultiplier >= strategy.takeProfitAtrMultiplier) {
    issues.push("strategy.stopAtrMultiplier must be below strategy.takeProfitAtrMultiplier");
  }

  if (advisor.enabled && !advisor.apiKey) issues.push("advisor.apiKey is required when advisor.enabled=true");
  if (engine.symbols.length === 0) issues.push("engine.symbols must list at least one symbol");
  if (engine.executionMode === "LIVE" && (!exchange.apiKey || !exchange.apiSecret)) {
    issues.push("exchange.apiKey and exchange.apiSecret are required when engine.executionMode=LIVE");
  }

  return issues;
}

export function parseAppConfig(raw: unknown): AppConfig {
  const parsed = AppConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationInvalidError(parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`));
  }
  const issues = collectConfigIssues(parsed.data);
  if (issues.length > 0) {
    throw new ConfigurationInvalidError(issues);
  }
  return parsed.data;
}

export function defaultAppConfig(now = new Date()): AppConfig {
  const ts = now.toISOString();
  return AppConfigSchema.parse({ version: CONFIG_VERSION, createdAt: ts, updatedAt: ts });
}
