import type { BacktestStats, EquityPoint, Trade } from "@tradewarden/shared";

export type PerformanceMetrics = {
  winRate: number;
  profitFactor: number;
  sharpeRatio: number;
  maxDrawdownPercent: number;
  stats: Omit<BacktestStats, "rejectedSignals">;
};

function sum(values: number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

/** Per-trade Sharpe: mean over population standard deviation of pnl / sizeUSD. */
export function sharpeRatio(trades: readonly Trade[]): number {
  if (trades.length === 0) return 0;
  const returns = trades.map((t) => (t.pnl ?? 0) / t.sizeUSD);
  const mean = sum(returns) / returns.length;
  const variance = sum(returns.map((r) => (r - mean) ** 2)) / returns.length;
  const std = Math.sqrt(variance);
  return std > 0 ? mean / std : 0;
}

/** Largest peak-to-trough fall of the curve, in percent of the peak. The peak starts at `initialBalance`. */
export function maxDrawdownPercent(curve: readonly EquityPoint[], initialBalance: number): number {
  let peak = initialBalance;
  let worst = 0;
  for (const point of curve) {
    if (point.equity > peak) peak = point.equity;
    if (peak > 0) worst = Math.max(worst, ((peak - point.equity) / peak) * 100);
  }
  return worst;
}

export function computePerformance(closedTrades: readonly Trade[], curve: readonly EquityPoint[], initialBalance: number): PerformanceMetrics {
  const pnls = closedTrades.map((t) => t.pnl ?? 0);
  const wins = pnls.filter((p) => p > 0);
  const losses = pnls.filter((p) => p < 0);
  const grossProfit = sum(wins);
  const grossLoss = -sum(losses);
  const totalPnl = sum(pnls);

  let profitFactor = 0;
  if (grossLoss > 0) profitFactor = grossProfit / grossLoss;
  else if (grossProfit > 0) profitFactor = Number.POSITIVE_INFINITY;

  return {
    winRate: pnls.length > 0 ? wins.length / pnls.length : 0,
    profitFactor,
    sharpeRatio: sharpeRatio(closedTrades),
    maxDrawdownPercent: maxDrawdownPercent(curve, initialBalance),
    stats: {
      totalTrades: pnls.length,
      winningTrades: wins.length,
      losingTrades: losses.length,
      grossProfit,
      grossLoss,
      totalPnl,
      averagePnl: pnls.length > 0 ? totalPnl / pnls.length : 0,
      bestTrade: pnls.length > 0 ? Math.max(...pnls) : 0,
      worstTrade: pnls.length > 0 ? Math.min(...pnls) : 0
    }
  };
}
