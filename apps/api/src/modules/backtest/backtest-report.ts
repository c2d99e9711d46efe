import type { BacktestResult } from "@tradewarden/shared";

function fixed(value: number, digits = 2): string {
  return Number.isFinite(value) ? value.toFixed(digits) : value > 0 ? "inf" : "-inf";
}

function signed(value: number, digits = 2): string {
  return `${value >= 0 ? "+" : ""}${fixed(value, digits)}`;
}

/** Plain-text summary for the CLI and logs. */
export function formatBacktestReport(result: BacktestResult): string {
  const s = result.stats;
  const lines = [
    `Backtest ${result.symbol} ${result.timeframe}`,
    `Balance        ${fixed(result.initialBalance)} -> ${fixed(result.finalBalance)} (${signed(result.totalReturnPercent)}%)`,
    `Trades         ${s.totalTrades} (${s.winningTrades} won, ${s.losingTrades} lost, ${s.rejectedSignals} signals rejected)`,
    `Win rate       ${fixed(result.winRate * 100, 1)}%`,
    `Profit factor  ${fixed(result.profitFactor)}`,
    `Sharpe         ${fixed(result.sharpeRatio, 3)}`,
    `Max drawdown   ${fixed(result.maxDrawdownPercent, 3)}%`,
    `PnL            total ${signed(s.totalPnl)}, avg ${signed(s.averagePnl)}, best ${signed(s.bestTrade)}, worst ${signed(s.worstTrade)}`
  ];
  if (result.trades.length > 0) {
    lines.push("", "Trades:");
    for (const t of result.trades) {
      lines.push(
        `  ${t.id.padEnd(6)} ${t.direction.padEnd(5)} ${fixed(t.entryPrice, 4)} -> ${t.exitPrice !== undefined ? fixed(t.exitPrice, 4) : "open"}  ${signed(t.pnl ?? 0, 4).padStart(9)}  ${t.exitReason ?? ""}`
      );
    }
  }
  return lines.join("\n");
}
