import type { AdvisoryVerdict, Bar, ExitReason, OrderIntent, Signal, Trade } from "@tradewarden/shared";
import { InsufficientDataError, RejectedByRiskError, computePnl, errorMessage, utcDateKey } from "@tradewarden/shared";
import type { Logger } from "pino";

import type { AdvisoryService } from "../advisory/advisory.service";
import type { IndicatorEngine } from "../indicators/indicator-engine";
import type { RiskManager } from "../risk/risk-manager";
import { withTimeout } from "../runtime/with-timeout";
import type { NewTrade, TradePatch, TradeStore } from "../store/trade-store";
import type { ExecutionEffect, ExecutionEvent, ExecutionState } from "./execution-state-machine";
import { transition } from "./execution-state-machine";
import type { ExecutionPort, ExitRequest } from "./execution.port";

export type DecisionAction = "OPENED" | "CLOSED" | "HELD" | "NO_SIGNAL" | "SKIPPED" | "REJECTED" | "FILL_FAILED" | "CLOSE_FAILED";

export type Decision = {
  symbol: string;
  barTime: number;
  action: DecisionAction;
  state: ExecutionState;
  reason: string | null;
  signal: Signal | null;
  verdict: AdvisoryVerdict | null;
  trade: Trade | null;
};

export type ExecutorSettings = {
  maxTradesPerDay: number;
  reversalStrength: number;
  executionTimeoutMs: number;
};

export type SymbolExecutorDeps = {
  symbol: string;
  indicators: IndicatorEngine;
  advisory: AdvisoryService;
  risk: RiskManager;
  execution: ExecutionPort;
  store: TradeStore;
  settings: ExecutorSettings;
  logger: Logger;
};

type Outcome = {
  action: DecisionAction;
  reason: string | null;
  trade: Trade | null;
};

type EntryPlan =
  | { kind: "ACCEPT"; intent: OrderIntent; signal: Signal; verdict: AdvisoryVerdict }
  | { kind: "DECLINE"; action: DecisionAction; reason: string; signal: Signal | null; verdict: AdvisoryVerdict | null };

/**
 * Drives one symbol through the execution state machine, one bar at a time. The live engine and the
 * backtest both feed it trailing windows; everything it does to the outside world goes through the
 * execution port and the trade store.
 */
export class SymbolExecutor {
  private state: ExecutionState = "IDLE";
  private openTrade: Trade | null = null;
  private manualCloseRequested = false;
  private lastExitBarTime: number | null = null;
  private barTime = 0;
  /** Set while the open position exists only in memory because the store refused it. */
  private unsaved: NewTrade | null = null;
  private readonly daily = new Map<string, number>();

  constructor(private readonly deps: SymbolExecutorDeps) {}

  get symbol(): string {
    return this.deps.symbol;
  }

  get currentState(): ExecutionState {
    return this.state;
  }

  get position(): Trade | null {
    return this.openTrade ? { ...this.openTrade } : null;
  }

  tradesOn(date: string): number {
    return this.daily.get(date) ?? 0;
  }

  /** Picks up a position left open by a previous run, and the trades already opened per UTC day. */
  async restore(): Promise<Trade | null> {
    const history = await this.deps.store.listTrades({ symbol: this.deps.symbol });
    this.daily.clear();
    for (const trade of history) {
      const date = utcDateKey(Date.parse(trade.openedAt));
      this.daily.set(date, (this.daily.get(date) ?? 0) + 1);
    }

    const [open] = await this.deps.store.getOpenTrades(this.deps.symbol);
    if (open && this.state === "IDLE") {
      this.openTrade = open;
      this.state = "OPEN";
      this.deps.logger.info({ msg: "Restored open position", symbol: this.deps.symbol, tradeId: open.id });
    }
    return this.position;
  }

  /** Flags the open position for closing on the next bar. */
  requestClose(): boolean {
    if (this.state !== "OPEN") return false;
    this.manualCloseRequested = true;
    return true;
  }

  async onBar(window: readonly Bar[]): Promise<Decision> {
    const bar = window[window.length - 1];
    if (!bar) {
      throw new InsufficientDataError(0, this.deps.indicators.lookback);
    }
    this.barTime = bar.openTime;
    if (this.state === "OPEN") {
      return await this.manageOpen(window, bar);
    }
    return await this.seekEntry(window, bar);
  }

  /** Closes the open position outside the bar loop (end of a backtest, shutdown). */
  async forceClose(reason: ExitReason, price: number, time: number): Promise<Decision | null> {
    if (this.state !== "OPEN") return null;
    this.barTime = time;
    const outcome = await this.run({ type: "EXIT_TRIGGERED", exit: { reason, price, time } });
    return this.decision(time, outcome, null, null);
  }

  private async manageOpen(window: readonly Bar[], bar: Bar): Promise<Decision> {
    if (this.unsaved) {
      await this.persistOpen(this.unsaved);
    }
    const trade = this.openTrade;
    if (!trade) {
      throw new Error(`${this.deps.symbol}: state OPEN without a position`);
    }
    await this.run({ type: "BAR_RECEIVED" });

    const signal = this.trySignal(window);
    const exit = this.exitFor(trade, bar, signal);
    if (!exit) {
      return this.decision(bar.openTime, { action: "HELD", reason: null, trade: this.position }, signal, null);
    }
    const outcome = await this.run({ type: "EXIT_TRIGGERED", exit });
    return this.decision(bar.openTime, outcome, signal, null);
  }

  /**
   * Stop before target when one bar spans both levels, so the simulation never books the optimistic
   * outcome of an ambiguous bar.
   */
  private exitFor(trade: Trade, bar: Bar, signal: Signal | null): ExitRequest | null {
    const long = trade.direction === "LONG";
    const stopHit = long ? bar.low <= trade.stopLossPrice : bar.high >= trade.stopLossPrice;
    if (stopHit) {
      return { reason: "STOP_LOSS", price: trade.stopLossPrice, time: bar.openTime };
    }
    const targetHit = long ? bar.high >= trade.takeProfitPrice : bar.low <= trade.takeProfitPrice;
    if (targetHit) {
      return { reason: "TAKE_PROFIT", price: trade.takeProfitPrice, time: bar.openTime };
    }
    if (
      signal &&
      signal.direction !== "NONE" &&
      signal.direction !== trade.direction &&
      signal.strength >= this.deps.settings.reversalStrength
    ) {
      return { reason: "SIGNAL_REVERSAL", price: bar.close, time: bar.openTime };
    }
    if (this.manualCloseRequested) {
      return { reason: "MANUAL", price: bar.close, time: bar.openTime };
    }
    return null;
  }

  private async seekEntry(window: readonly Bar[], bar: Bar): Promise<Decision> {
    await this.run({ type: "BAR_RECEIVED" });

    let plan: EntryPlan;
    try {
      plan = await this.planEntry(window, bar);
    } catch (err) {
      await this.run({ type: "INTENT_REJECTED", reason: errorMessage(err) });
      throw err;
    }

    if (plan.kind === "DECLINE") {
      await this.run({ type: "INTENT_REJECTED", reason: plan.reason });
      return this.decision(bar.openTime, { action: plan.action, reason: plan.reason, trade: null }, plan.signal, plan.verdict);
    }

    this.countTrade(utcDateKey(bar.openTime));
    const outcome = await this.run({ type: "INTENT_ACCEPTED", intent: plan.intent });
    return this.decision(bar.openTime, outcome, plan.signal, plan.verdict);
  }

  private async planEntry(window: readonly Bar[], bar: Bar): Promise<EntryPlan> {
    const { advisory, risk, execution, settings } = this.deps;

    if (this.lastExitBarTime === bar.openTime) {
      return { kind: "DECLINE", action: "SKIPPED", reason: "Position closed on this bar", signal: null, verdict: null };
    }

    let signal: Signal;
    try {
      signal = this.deps.indicators.evaluate(window);
    } catch (err) {
      if (err instanceof InsufficientDataError) {
        return { kind: "DECLINE", action: "SKIPPED", reason: err.message, signal: null, verdict: null };
      }
      throw err;
    }

    if (signal.direction === "NONE") {
      return { kind: "DECLINE", action: "NO_SIGNAL", reason: `No direction: ${signal.reasons.join("; ")}`, signal, verdict: null };
    }

    const date = utcDateKey(bar.openTime);
    const used = this.tradesOn(date);
    if (used >= settings.maxTradesPerDay) {
      return { kind: "DECLINE", action: "REJECTED", reason: `Daily trade limit reached (${used}/${settings.maxTradesPerDay})`, signal, verdict: null };
    }

    const verdict = await advisory.evaluate(signal);
    const balance = await withTimeout(`${execution.name}.getBalance`, settings.executionTimeoutMs, (abort) => execution.getBalance(abort));

    let intent: OrderIntent;
    try {
      intent = risk.size(signal, verdict, balance);
    } catch (err) {
      if (err instanceof RejectedByRiskError) {
        return { kind: "DECLINE", action: "REJECTED", reason: `${err.reason}: ${err.message}`, signal, verdict };
      }
      throw err;
    }

    const validation = await advisory.validate(intent, signal);
    if (validation?.recommendation === "REJECT") {
      return {
        kind: "DECLINE",
        action: "REJECTED",
        reason: `ADVISOR_REJECTED: validation ${validation.source} confidence ${validation.confidence}`,
        signal,
        verdict: validation
      };
    }

    return { kind: "ACCEPT", intent, signal, verdict };
  }

  private countTrade(date: string): void {
    for (const key of this.daily.keys()) {
      if (key < date) this.daily.delete(key);
    }
    this.daily.set(date, this.tradesOn(date) + 1);
  }

  /**
   * Records the open position. When the store fails the filled position is kept in memory, so exits keep
   * running, and the write is retried on the next bar.
   */
  private async persistOpen(record: NewTrade): Promise<Trade> {
    const { store, logger, symbol } = this.deps;
    try {
      const trade = await store.createTrade(record);
      if (this.unsaved) {
        logger.info({ msg: "Open position persisted after retry", symbol, tradeId: trade.id });
      }
      this.unsaved = null;
      this.openTrade = trade;
      return trade;
    } catch (err) {
      logger.error({ msg: "Failed to persist open position, retrying next bar", symbol, externalOrderId: record.externalOrderId, error: errorMessage(err) });
      this.unsaved = record;
      const trade: Trade = { ...record, id: `unsaved-${record.externalOrderId ?? this.barTime}` };
      this.openTrade = trade;
      return trade;
    }
  }

  private async persistClose(trade: Trade, patch: TradePatch): Promise<Trade> {
    const { store, logger, symbol } = this.deps;
    const closed: Trade = { ...trade, ...patch };
    const pending = this.unsaved;
    try {
      if (pending) {
        const created = await store.createTrade({ ...pending, ...patch });
        this.unsaved = null;
        return created;
      }
      return await store.updateTrade(trade.id, patch);
    } catch (err) {
      // The exchange position is already flat.
      logger.error({ msg: "Failed to persist closed position", symbol, tradeId: trade.id, exitReason: patch.exitReason, pnl: patch.pnl, error: errorMessage(err) });
      this.unsaved = null;
      return closed;
    }
  }

  private trySignal(window: readonly Bar[]): Signal | null {
    try {
      return this.deps.indicators.evaluate(window);
    } catch (err) {
      if (err instanceof InsufficientDataError) return null;
      throw err;
    }
  }

  /** Feeds events through the machine and performs its effects until it settles. */
  private async run(event: ExecutionEvent): Promise<Outcome> {
    let next: ExecutionEvent | null = event;
    let outcome: Outcome = { action: "HELD", reason: null, trade: this.position };
    while (next) {
      const step = transition(this.state, next);
      this.state = step.state;
      next = null;
      for (const effect of step.effects) {
        const result = await this.perform(effect);
        if (result.outcome) outcome = result.outcome;
        if (result.next) next = result.next;
      }
    }
    return outcome;
  }

  private async perform(effect: ExecutionEffect): Promise<{ next?: ExecutionEvent; outcome?: Outcome }> {
    const { execution, settings, logger, symbol } = this.deps;

    switch (effect.type) {
      case "PLACE_ORDER": {
        try {
          const fill = await withTimeout(`${execution.name}.placeOrder`, settings.executionTimeoutMs, (signal) =>
            execution.placeOrder(effect.intent, { time: this.barTime, signal })
          );
          return { next: { type: "FILL_CONFIRMED", intent: effect.intent, fill } };
        } catch (err) {
          logger.warn({ msg: "Entry order failed", symbol, error: errorMessage(err) });
          return { next: { type: "FILL_FAILED", reason: errorMessage(err) }, outcome: { action: "FILL_FAILED", reason: errorMessage(err), trade: null } };
        }
      }
      case "RECORD_OPEN_TRADE": {
        const record: NewTrade = {
          symbol,
          direction: effect.intent.direction,
          entryPrice: effect.fill.fillPrice,
          sizeUSD: effect.intent.sizeUSD,
          stopLossPrice: effect.intent.stopLossPrice,
          takeProfitPrice: effect.intent.takeProfitPrice,
          openedAt: new Date(effect.fill.filledAt).toISOString(),
          fees: effect.fill.fees,
          status: "OPEN",
          externalOrderId: effect.fill.orderId
        };
        if (effect.fill.quantity !== undefined) {
          record.quantity = effect.fill.quantity;
        }
        const trade = await this.persistOpen(record);
        this.manualCloseRequested = false;
        logger.info({ msg: "Position opened", symbol, tradeId: trade.id, direction: trade.direction, entryPrice: trade.entryPrice, sizeUSD: trade.sizeUSD });
        return { outcome: { action: "OPENED", reason: null, trade: { ...trade } } };
      }
      case "CLOSE_POSITION": {
        const trade = this.openTrade;
        if (!trade) {
          throw new Error(`${symbol}: close requested without a position`);
        }
        try {
          const close = await withTimeout(`${execution.name}.closePosition`, settings.executionTimeoutMs, (signal) =>
            execution.closePosition(trade, effect.exit, signal)
          );
          return { next: { type: "CLOSE_CONFIRMED", exit: effect.exit, close } };
        } catch (err) {
          logger.warn({ msg: "Close order failed, retrying next bar", symbol, tradeId: trade.id, error: errorMessage(err) });
          return { next: { type: "CLOSE_FAILED", reason: errorMessage(err) }, outcome: { action: "CLOSE_FAILED", reason: errorMessage(err), trade: { ...trade } } };
        }
      }
      case "RECORD_CLOSED_TRADE": {
        const trade = this.openTrade;
        if (!trade) {
          throw new Error(`${symbol}: close confirmed without a position`);
        }
        const fees = trade.fees + effect.close.fees;
        const pnl =
          computePnl({
            direction: trade.direction,
            entryPrice: trade.entryPrice,
            exitPrice: effect.close.exitPrice,
            sizeUSD: trade.sizeUSD,
            quantity: trade.quantity
          }) - fees;
        const closed = await this.persistClose(trade, {
          status: "CLOSED",
          exitPrice: effect.close.exitPrice,
          closedAt: new Date(effect.close.closedAt).toISOString(),
          pnl,
          fees,
          exitReason: effect.exit.reason
        });
        this.openTrade = null;
        this.manualCloseRequested = false;
        this.lastExitBarTime = effect.exit.time;
        logger.info({ msg: "Position closed", symbol, tradeId: closed.id, exitReason: effect.exit.reason, exitPrice: closed.exitPrice, pnl });
        return { outcome: { action: "CLOSED", reason: effect.exit.reason, trade: closed } };
      }
      case "LOG_REJECTION":
        logger.debug({ msg: "Entry declined", symbol, reason: effect.reason });
        return {};
    }
  }

  private decision(barTime: number, outcome: Outcome, signal: Signal | null, verdict: AdvisoryVerdict | null): Decision {
    return {
      symbol: this.deps.symbol,
      barTime,
      action: outcome.action,
      state: this.state,
      reason: outcome.reason,
      signal,
      verdict,
      trade: outcome.trade
    };
  }
}
