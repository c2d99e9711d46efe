import type { AppConfig, Bar, BacktestConfigInput, BacktestOverrides, BacktestResult, EquityPoint } from "@tradewarden/shared";
import {
  BacktestConfigSchema,
  ConfigurationInvalidError,
  InsufficientDataError,
  assertOrderedBars,
  collectConfigIssues,
  computePnl,
  defaultAppConfig
} from "@tradewarden/shared";
import pino from "pino";
import type { Logger } from "pino";

import { AdvisoryCache } from "../advisory/advisory-cache";
import { AdvisoryService } from "../advisory/advisory.service";
import { QuotaGuard } from "../advisory/quota-guard";
import { PaperExecutionAdapter } from "../execution/paper-execution.adapter";
import { SymbolExecutor } from "../execution/symbol-executor";
import { IndicatorEngine } from "../indicators/indicator-engine";
import { RiskManager, riskParametersFrom } from "../risk/risk-manager";
import { InMemoryTradeStore } from "../store/in-memory-trade-store";
import { computePerformance } from "./performance";

/** Backtests never wait on anything real; the timeout only bounds the simulated port. */
const SIMULATED_TIMEOUT_MS = 60_000;

/** The running configuration's trading and strategy settings with request overrides on top. */
export function backtestConfigFrom(config: Pick<AppConfig, "trading" | "strategy" | "engine">, overrides: BacktestOverrides = {}): BacktestConfigInput {
  return {
    initialBalance: overrides.initialBalance ?? config.engine.paperBalance,
    feePercent: overrides.feePercent,
    windowSize: overrides.windowSize ?? config.engine.windowSize,
    reversalStrength: overrides.reversalStrength ?? config.engine.reversalStrength,
    trading: { ...config.trading, ...overrides.trading },
    strategy: { ...config.strategy, ...overrides.strategy }
  };
}

/**
 * Replays `bars` through the same indicator, advisory, risk and execution path as live trading. The
 * advisor is disabled, fills happen at the bar close and exits at their trigger level, and every
 * clock reading comes from the bars, so identical input gives an identical result.
 */
export async function runBacktest(symbol: string, bars: readonly Bar[], input: BacktestConfigInput = {}, logger?: Logger): Promise<BacktestResult> {
  const config = BacktestConfigSchema.parse(input);
  const defaults = defaultAppConfig();
  const issues = collectConfigIssues({ ...defaults, trading: config.trading, strategy: config.strategy });
  if (issues.length > 0) {
    throw new ConfigurationInvalidError(issues);
  }

  const indicators = new IndicatorEngine(config.strategy);
  const first = bars[0];
  if (!first) {
    throw new InsufficientDataError(0, indicators.lookback);
  }
  assertOrderedBars(bars);
  const foreign = bars.find((b) => b.symbol !== symbol);
  if (foreign) {
    throw new Error(`Bar at ${foreign.openTime} belongs to ${foreign.symbol}, expected ${symbol}`);
  }

  const log = logger ?? pino({ level: "silent" });
  let now = first.openTime;
  const clock = () => now;

  const advisory = new AdvisoryService(
    {
      minimumSignalStrength: config.trading.minimumSignalStrength,
      validationThreshold: config.trading.validationThreshold,
      cacheWindowMs: config.trading.aiCacheDurationMinutes * 60_000,
      advisorTimeoutMs: SIMULATED_TIMEOUT_MS
    },
    new QuotaGuard(0, clock),
    new AdvisoryCache(config.trading.aiCacheDurationMinutes * 60_000, clock),
    null,
    log,
    clock
  );
  const execution = new PaperExecutionAdapter({ name: "simulated", initialBalance: config.initialBalance, feePercent: config.feePercent, idPrefix: "sim" });
  const store = new InMemoryTradeStore("bt");
  const executor = new SymbolExecutor({
    symbol,
    indicators,
    advisory,
    risk: new RiskManager(riskParametersFrom(config)),
    execution,
    store,
    settings: {
      maxTradesPerDay: config.trading.maxTradesPerDay,
      reversalStrength: config.reversalStrength,
      executionTimeoutMs: SIMULATED_TIMEOUT_MS
    },
    logger: log
  });

  const equityCurve: EquityPoint[] = [];
  let rejectedSignals = 0;

  for (let i = 0; i < bars.length; i += 1) {
    const bar = bars[i];
    now = bar.openTime;
    const window = bars.slice(Math.max(0, i + 1 - config.windowSize), i + 1);
    const decision = await executor.onBar(window);
    if (decision.action === "REJECTED") rejectedSignals += 1;

    if (i === bars.length - 1) {
      await executor.forceClose("END_OF_DATA", bar.close, bar.openTime);
    }

    const balance = await execution.getBalance();
    const position = executor.position;
    const unrealized = position
      ? computePnl({ direction: position.direction, entryPrice: position.entryPrice, exitPrice: bar.close, sizeUSD: position.sizeUSD }) - position.fees
      : 0;
    equityCurve.push({ time: bar.openTime, equity: balance + unrealized, balance });
  }

  const trades = store.snapshot();
  const finalBalance = await execution.getBalance();
  const metrics = computePerformance(trades, equityCurve, config.initialBalance);

  log.info({ msg: "Backtest finished", symbol, bars: bars.length, trades: trades.length, finalBalance });

  freezeEach(trades);
  freezeEach(equityCurve);
  return Object.freeze({
    symbol,
    timeframe: first.timeframe,
    initialBalance: config.initialBalance,
    finalBalance,
    totalReturnPercent: ((finalBalance - config.initialBalance) / config.initialBalance) * 100,
    trades,
    winRate: metrics.winRate,
    profitFactor: metrics.profitFactor,
    sharpeRatio: metrics.sharpeRatio,
    maxDrawdownPercent: metrics.maxDrawdownPercent,
    equityCurve,
    stats: Object.freeze({ ...metrics.stats, rejectedSignals })
  });
}

function freezeEach<T extends object>(items: T[]): void {
  for (const item of items) Object.freeze(item);
  Object.freeze(items);
}
