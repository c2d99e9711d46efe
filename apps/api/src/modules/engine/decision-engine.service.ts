import crypto from "node:crypto";

import { NotFoundException, type OnModuleDestroy, type OnModuleInit } from "@nestjs/common";
import type { AdvisoryVerdict, AppConfig, Bar, Direction, Signal, Trade } from "@tradewarden/shared";
import { InsufficientDataError, errorMessage, utcDateKey } from "@tradewarden/shared";
import type { Logger } from "pino";

import type { AdvisoryService } from "../advisory/advisory.service";
import type { ExecutionState } from "../execution/execution-state-machine";
import type { ExecutionPort } from "../execution/execution.port";
import { type Decision, type DecisionAction, SymbolExecutor } from "../execution/symbol-executor";
import { IndicatorEngine } from "../indicators/indicator-engine";
import type { MarketDataPort } from "../market-data/market-data.port";
import { RiskManager, riskParametersFrom } from "../risk/risk-manager";
import { type Clock, systemClock } from "../runtime/clock";
import type { TradeQuery, TradeStore } from "../store/trade-store";

const MAX_DECISIONS = 500;
const QUIET_ACTIONS: ReadonlySet<DecisionAction> = new Set(["HELD", "NO_SIGNAL", "SKIPPED"]);

export type EngineDeps = {
  config: AppConfig;
  marketData: MarketDataPort;
  execution: ExecutionPort;
  store: TradeStore;
  advisory: AdvisoryService;
  logger: Logger;
  clock?: Clock;
};

export type DecisionRecord = {
  id: string;
  ts: string;
  symbol: string;
  barTime: number;
  action: DecisionAction;
  state: ExecutionState;
  reason: string | null;
  direction: Direction | null;
  strength: number | null;
  verdict: AdvisoryVerdict | null;
  tradeId: string | null;
};

export type SymbolStatus = {
  symbol: string;
  state: ExecutionState;
  position: Trade | null;
  tradesToday: number;
  lastBarTime: number | null;
};

export type EngineStatus = {
  running: boolean;
  executionMode: AppConfig["engine"]["executionMode"];
  execution: string;
  timeframe: AppConfig["engine"]["timeframe"];
  pollIntervalMs: number;
  symbols: SymbolStatus[];
};

type CycleResult = {
  /** Null when the latest closed bar was already processed. */
  decision: Decision | null;
  signal: Signal | null;
};

/**
 * Polls market data for every tracked symbol and feeds each newly closed bar to that symbol's
 * executor. Symbols run independently; one symbol never has two cycles in flight.
 */
export class DecisionEngineService implements OnModuleInit, OnModuleDestroy {
  private readonly executors: Map<string, SymbolExecutor>;
  private readonly indicators: IndicatorEngine;
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly inFlight = new Map<string, Promise<CycleResult>>();
  private readonly lastBarTime = new Map<string, number>();
  private readonly clock: Clock;
  private decisions: DecisionRecord[] = [];
  private running = false;

  constructor(private readonly deps: EngineDeps) {
    const { config } = deps;
    this.clock = deps.clock ?? systemClock;
    this.indicators = new IndicatorEngine(config.strategy);
    const risk = new RiskManager(riskParametersFrom(config));

    this.executors = new Map(
      config.engine.symbols.map((symbol) => [
        symbol,
        new SymbolExecutor({
          symbol,
          indicators: this.indicators,
          advisory: deps.advisory,
          risk,
          execution: deps.execution,
          store: deps.store,
          settings: {
            maxTradesPerDay: config.trading.maxTradesPerDay,
            reversalStrength: config.engine.reversalStrength,
            executionTimeoutMs: config.engine.executionTimeoutMs
          },
          logger: deps.logger.child({ symbol })
        })
      ])
    );
  }

  async onModuleInit(): Promise<void> {
    await this.restore();
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  async restore(): Promise<Trade[]> {
    const restored: Trade[] = [];
    for (const executor of this.executors.values()) {
      const trade = await executor.restore();
      if (trade) restored.push(trade);
    }
    return restored;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): boolean {
    if (this.running) return false;
    this.running = true;

    const { pollIntervalMs } = this.deps.config.engine;
    for (const symbol of this.executors.keys()) {
      this.timers.set(
        symbol,
        setInterval(() => {
          void this.scheduledTick(symbol);
        }, pollIntervalMs)
      );
    }
    this.deps.logger.info({ msg: "Engine started", symbols: [...this.executors.keys()], pollIntervalMs });
    return true;
  }

  /** Stops polling and waits for cycles already in flight. Open positions stay open. */
  async stop(): Promise<void> {
    for (const timer of this.timers.values()) clearInterval(timer);
    this.timers.clear();
    const wasRunning = this.running;
    this.running = false;

    await Promise.allSettled(this.inFlight.values());
    if (wasRunning) {
      this.deps.logger.info({ msg: "Engine stopped" });
    }
  }

  /**
   * Runs one cycle for `symbol` now. When the latest closed bar was already processed nothing is
   * executed and the signal for that bar is returned as is.
   */
  async evaluateOnce(symbol: string): Promise<Signal | null> {
    const result = await this.tick(this.executorFor(symbol));
    return result.signal;
  }

  requestClose(symbol: string): boolean {
    return this.executorFor(symbol).requestClose();
  }

  getStatus(): EngineStatus {
    const { engine } = this.deps.config;
    const today = utcDateKey(this.clock());
    return {
      running: this.running,
      executionMode: engine.executionMode,
      execution: this.deps.execution.name,
      timeframe: engine.timeframe,
      pollIntervalMs: engine.pollIntervalMs,
      symbols: [...this.executors.values()].map((executor) => ({
        symbol: executor.symbol,
        state: executor.currentState,
        position: executor.position,
        tradesToday: executor.tradesOn(today),
        lastBarTime: this.lastBarTime.get(executor.symbol) ?? null
      }))
    };
  }

  /** Newest first. */
  getDecisions(query: { symbol?: string; limit?: number } = {}): DecisionRecord[] {
    const matching = query.symbol ? this.decisions.filter((d) => d.symbol === query.symbol) : this.decisions;
    return matching.slice(0, query.limit ?? 100);
  }

  async listTrades(query?: TradeQuery): Promise<Trade[]> {
    return await this.deps.store.listTrades(query);
  }

  private executorFor(symbol: string): SymbolExecutor {
    const executor = this.executors.get(symbol.trim().toUpperCase());
    if (!executor) {
      throw new NotFoundException(`Symbol ${symbol} is not tracked`);
    }
    return executor;
  }

  private async scheduledTick(symbol: string): Promise<void> {
    const executor = this.executors.get(symbol);
    if (!executor || this.inFlight.has(symbol)) return;
    try {
      await this.tick(executor);
    } catch (err) {
      this.deps.logger.error({ msg: "Engine cycle failed", symbol, error: errorMessage(err) });
    }
  }

  private tick(executor: SymbolExecutor): Promise<CycleResult> {
    const pending = this.inFlight.get(executor.symbol);
    if (pending) return pending;

    const run = this.runCycle(executor).finally(() => {
      this.inFlight.delete(executor.symbol);
    });
    this.inFlight.set(executor.symbol, run);
    return run;
  }

  private async runCycle(executor: SymbolExecutor): Promise<CycleResult> {
    const { engine } = this.deps.config;
    const window = await this.deps.marketData.fetchWindow(executor.symbol, engine.timeframe, engine.windowSize);
    const bar = window.at(-1);
    if (bar && this.lastBarTime.get(executor.symbol) === bar.openTime) {
      return { decision: null, signal: this.peekSignal(window) };
    }

    const decision = await executor.onBar(window);
    if (bar) this.lastBarTime.set(executor.symbol, bar.openTime);
    this.record(decision);
    return { decision, signal: decision.signal };
  }

  private peekSignal(window: readonly Bar[]): Signal | null {
    try {
      return this.indicators.evaluate(window);
    } catch (err) {
      if (err instanceof InsufficientDataError) return null;
      throw err;
    }
  }

  private record(decision: Decision): void {
    const record: DecisionRecord = {
      id: crypto.randomUUID(),
      ts: new Date(this.clock()).toISOString(),
      symbol: decision.symbol,
      barTime: decision.barTime,
      action: decision.action,
      state: decision.state,
      reason: decision.reason,
      direction: decision.signal?.direction ?? null,
      strength: decision.signal?.strength ?? null,
      verdict: decision.verdict,
      tradeId: decision.trade?.id ?? null
    };
    this.decisions = [record, ...this.decisions].slice(0, MAX_DECISIONS);

    const level = QUIET_ACTIONS.has(decision.action) ? "debug" : "info";
    this.deps.logger[level]({ msg: "Decision", symbol: decision.symbol, action: decision.action, reason: decision.reason, state: decision.state });
  }
}
