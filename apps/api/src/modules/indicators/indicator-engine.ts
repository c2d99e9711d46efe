import type { Bar, Direction, IndicatorSnapshot, Signal, SignalScores, StrategySettings } from "@tradewarden/shared";
import { InsufficientDataError, StrategySettingsSchema } from "@tradewarden/shared";

import { clamp, computeAdx, computeAtr, computeEma, computeRsi, computeVolumeRatio } from "./technical";

export type IndicatorSettings = Pick<
  StrategySettings,
  "fastPeriod" | "slowPeriod" | "adxPeriod" | "adxThreshold" | "rsiPeriod" | "rsiOverbought" | "rsiOversold" | "atrPeriod" | "volumePeriod"
>;

/** ADX at which the strength sub-score saturates. */
const ADX_SATURATION = 50;

export function requiredBars(settings: IndicatorSettings): number {
  return Math.max(settings.slowPeriod, settings.adxPeriod * 2 + 2, settings.rsiPeriod + 1, settings.atrPeriod + 1, settings.volumePeriod);
}

function round(value: number, decimals: number): number {
  const pow = 10 ** decimals;
  return Math.round(value * pow) / pow;
}

export class IndicatorEngine {
  readonly settings: IndicatorSettings;

  constructor(settings: Partial<IndicatorSettings> = {}) {
    this.settings = StrategySettingsSchema.parse(settings);
  }

  get lookback(): number {
    return requiredBars(this.settings);
  }

  compute(window: readonly Bar[]): IndicatorSnapshot {
    const needed = this.lookback;
    if (window.length < needed) {
      throw new InsufficientDataError(window.length, needed);
    }

    const s = this.settings;
    const closes = window.map((b) => b.close);
    const highs = window.map((b) => b.high);
    const lows = window.map((b) => b.low);
    const volumes = window.map((b) => b.volume);
    const last = window[window.length - 1];

    const fastAvg = computeEma(closes, s.fastPeriod);
    const slowAvg = computeEma(closes, s.slowPeriod);
    const adx = computeAdx(highs, lows, closes, s.adxPeriod);
    const rsi = computeRsi(closes, s.rsiPeriod);
    const atr = computeAtr(highs, lows, closes, s.atrPeriod);
    const volumeRatio = computeVolumeRatio(volumes, s.volumePeriod);

    // A flat window can leave ADX without any directional movement to measure.
    if (fastAvg === null || slowAvg === null || rsi === null || atr === null || volumeRatio === null) {
      throw new InsufficientDataError(window.length, needed);
    }

    return Object.freeze({
      symbol: last.symbol,
      timeframe: last.timeframe,
      barTime: last.openTime,
      close: last.close,
      fastAvg,
      slowAvg,
      trendStrength: clamp(adx ?? 0, 0, 100),
      momentum: clamp(rsi, 0, 100),
      volatility: atr,
      volatilityPct: last.close > 0 ? (atr / last.close) * 100 : 0,
      volumeRatio
    });
  }

  deriveSignal(snapshot: IndicatorSnapshot): Signal {
    const s = this.settings;
    const reasons: string[] = [];

    const spread = snapshot.fastAvg - snapshot.slowAvg;
    const trendDirection: Direction = spread > 0 ? "LONG" : spread < 0 ? "SHORT" : "NONE";
    reasons.push(
      trendDirection === "NONE"
        ? "Averages flat"
        : `${trendDirection === "LONG" ? "Bullish" : "Bearish"} trend (fast ${round(snapshot.fastAvg, 4)} vs slow ${round(snapshot.slowAvg, 4)})`
    );

    const strengthOk = snapshot.trendStrength > s.adxThreshold;
    reasons.push(`${strengthOk ? "Strong" : "Weak"} trend (ADX ${snapshot.trendStrength.toFixed(1)})`);

    const rsi = snapshot.momentum;
    let momentumOk = false;
    let momentumScore = 0;
    if (trendDirection === "LONG") {
      momentumOk = rsi <= s.rsiOverbought;
      momentumScore = clamp((rsi - 50) / (s.rsiOverbought - 50), 0, 1);
      reasons.push(momentumOk ? `RSI ${rsi.toFixed(1)} below overbought` : `RSI ${rsi.toFixed(1)} overbought`);
    } else if (trendDirection === "SHORT") {
      momentumOk = rsi >= s.rsiOversold;
      momentumScore = clamp((50 - rsi) / (50 - s.rsiOversold), 0, 1);
      reasons.push(momentumOk ? `RSI ${rsi.toFixed(1)} above oversold` : `RSI ${rsi.toFixed(1)} oversold`);
    }

    const scores: SignalScores = {
      trend: snapshot.volatility > 0 ? clamp(Math.abs(spread) / snapshot.volatility, 0, 1) : trendDirection === "NONE" ? 0 : 1,
      strength: clamp(snapshot.trendStrength / ADX_SATURATION, 0, 1),
      momentum: momentumScore
    };
    const strength = clamp((scores.trend + scores.strength + scores.momentum) / 3, 0, 1);
    const direction: Direction = trendDirection !== "NONE" && strengthOk && momentumOk ? trendDirection : "NONE";

    return Object.freeze({
      symbol: snapshot.symbol,
      direction,
      strength,
      scores,
      reasons,
      snapshot,
      timestamp: snapshot.barTime
    });
  }

  evaluate(window: readonly Bar[]): Signal {
    return this.deriveSignal(this.compute(window));
  }
}
