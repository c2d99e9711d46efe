import type { AppConfig } from "@tradewarden/shared";
import { ConfigurationInvalidError } from "@tradewarden/shared";

import type { TradeStore } from "../store/trade-store";
import { CcxtFuturesExecutionAdapter } from "./ccxt-futures-execution.adapter";
import type { ExecutionPort } from "./execution.port";
import { PaperExecutionAdapter } from "./paper-execution.adapter";

/**
 * Picks the execution port for the configured mode. The paper balance carries the realized pnl of
 * trades already closed in the store so it survives restarts.
 */
export async function createExecutionPort(config: Pick<AppConfig, "engine" | "exchange">, store: TradeStore): Promise<ExecutionPort> {
  const { engine, exchange } = config;
  if (engine.executionMode === "LIVE") {
    if (!exchange.apiKey || !exchange.apiSecret) {
      throw new ConfigurationInvalidError(["exchange.apiKey and exchange.apiSecret are required when engine.executionMode=LIVE"]);
    }
    return new CcxtFuturesExecutionAdapter({
      environment: exchange.environment,
      apiKey: exchange.apiKey,
      apiSecret: exchange.apiSecret,
      timeoutMs: engine.executionTimeoutMs
    });
  }

  const closed = await store.listTrades({ status: "CLOSED" });
  const realized = closed.reduce((sum, trade) => sum + (trade.pnl ?? 0), 0);
  return new PaperExecutionAdapter({ initialBalance: engine.paperBalance + realized });
}
