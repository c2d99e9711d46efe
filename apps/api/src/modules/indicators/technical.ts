/**
 * Indicator math over plain number series. Every function returns null when the series is too short
 * for its lookback instead of producing a partially seeded value.
 */

export function computeEma(values: number[], period: number): number | null {
  if (values.length < period) return null;
  const alpha = 2 / (period + 1);
  let ema = 0;
  for (let i = 0; i < period; i += 1) ema += values[i];
  ema /= period;
  for (let i = period; i < values.length; i += 1) {
    ema = alpha * values[i] + (1 - alpha) * ema;
  }
  return ema;
}

export function computeRsi(closes: number[], period = 14): number | null {
  if (closes.length < period + 1) return null;
  let gain = 0;
  let loss = 0;
  for (let i = 1; i <= period; i += 1) {
    const diff = closes[i] - closes[i - 1];
    if (diff >= 0) gain += diff;
    else loss -= diff;
  }
  let avgGain = gain / period;
  let avgLoss = loss / period;

  for (let i = period + 1; i < closes.length; i += 1) {
    const diff = closes[i] - closes[i - 1];
    const g = diff > 0 ? diff : 0;
    const l = diff < 0 ? -diff : 0;
    avgGain = (avgGain * (period - 1) + g) / period;
    avgLoss = (avgLoss * (period - 1) + l) / period;
  }

  if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

function trueRange(highs: number[], lows: number[], closes: number[], i: number): number {
  return Math.max(highs[i] - lows[i], Math.abs(highs[i] - closes[i - 1]), Math.abs(lows[i] - closes[i - 1]));
}

export function computeAtr(highs: number[], lows: number[], closes: number[], period = 14): number | null {
  if (closes.length < period + 1) return null;
  let atr = 0;
  for (let i = 1; i < closes.length; i += 1) {
    const tr = trueRange(highs, lows, closes, i);
    if (i <= period) {
      atr += tr;
      if (i === period) atr /= period;
      continue;
    }
    atr = (atr * (period - 1) + tr) / period;
  }
  return atr;
}

export function computeAdx(highs: number[], lows: number[], closes: number[], period = 14): number | null {
  if (closes.length < period * 2 + 2) return null;
  const plusDM: number[] = [];
  const minusDM: number[] = [];
  const trArr: number[] = [];
  for (let i = 1; i < closes.length; i += 1) {
    const upMove = highs[i] - highs[i - 1];
    const downMove = lows[i - 1] - lows[i];
    plusDM.push(upMove > downMove && upMove > 0 ? upMove : 0);
    minusDM.push(downMove > upMove && downMove > 0 ? downMove : 0);
    trArr.push(trueRange(highs, lows, closes, i));
  }

  const smooth = (values: number[]): number[] => {
    const out: number[] = [];
    let sum = 0;
    for (let i = 0; i < values.length; i += 1) {
      sum += values[i];
      if (i === period - 1) {
        out.push(sum);
        continue;
      }
      if (i >= period) {
        sum = out[out.length - 1] - out[out.length - 1] / period + values[i];
        out.push(sum);
      }
    }
    return out;
  };

  const trSmooth = smooth(trArr);
  const plusSmooth = smooth(plusDM);
  const minusSmooth = smooth(minusDM);
  const len = Math.min(trSmooth.length, plusSmooth.length, minusSmooth.length);

  const dx: number[] = [];
  for (let i = 0; i < len; i += 1) {
    const tr = trSmooth[i];
    if (tr === 0) continue;
    const plusDI = (100 * plusSmooth[i]) / tr;
    const minusDI = (100 * minusSmooth[i]) / tr;
    const denom = plusDI + minusDI;
    if (denom === 0) continue;
    dx.push((100 * Math.abs(plusDI - minusDI)) / denom);
  }
  if (dx.length < period) return null;

  // Wilder smoothing for ADX
  let adx = dx.slice(0, period).reduce((a, b) => a + b, 0) / period;
  for (let i = period; i < dx.length; i += 1) {
    adx = (adx * (period - 1) + dx[i]) / period;
  }
  return adx;
}

export function computeVolumeRatio(volumes: number[], period = 20): number | null {
  if (volumes.length < period) return null;
  const tail = volumes.slice(-period);
  const mean = tail.reduce((a, b) => a + b, 0) / period;
  if (mean <= 0) return 0;
  return volumes[volumes.length - 1] / mean;
}

export function clamp(v: number, min: number, max: number): number {
  if (!Number.isFinite(v)) return min;
  if (v < min) return min;
  if (v > max) return max;
  return v;
}
