import type { PriceSeries } from "../lib/types/bar.ts";
import type { StrengthClass, TrendStrength } from "./types.ts";

const PERIOD = 14;
const MIN_BARS = 20;

type Value = number | null;

/**
 * Trailing simple mean over `period` entries. An output is null until the
 * window is full, and whenever the window holds a null or non-finite value.
 */
export function rollingMean(values: readonly Value[], period: number): Value[] {
  return values.map((_, i) => {
    if (i < period - 1) return null;
    let sum = 0;
    for (let j = i - period + 1; j <= i; j++) {
      const v = values[j];
      if (v === null || !Number.isFinite(v)) return null;
      sum += v;
    }
    return sum / period;
  });
}

export function classifyStrength(score: number): StrengthClass {
  if (score > 50) return "Very Strong";
  if (score > 25) return "Strong";
  if (score > 15) return "Moderate";
  return "Weak";
}

/**
 * ADX-style trend strength: true range, +DM/-DM and DX smoothed with
 * 14-bar simple means (not Wilder smoothing). The score is the last
 * value of the DX mean, or 0 while that mean is still undefined.
 */
export function trendStrength(series: PriceSeries): TrendStrength {
  if (series.length < MIN_BARS) {
    return { score: 0, classification: "Insufficient data" };
  }

  const trueRange: Value[] = [];
  const plusDm: Value[] = [];
  const minusDm: Value[] = [];

  series.forEach((bar, i) => {
    if (i === 0) {
      trueRange.push(bar.high - bar.low);
      plusDm.push(0);
      minusDm.push(0);
      return;
    }
    const prev = series[i - 1];
    trueRange.push(Math.max(
      bar.high - bar.low,
      Math.abs(bar.high - prev.close),
      Math.abs(bar.low - prev.close),
    ));

    const upMove = bar.high - prev.high;
    const downMove = prev.low - bar.low;
    plusDm.push(upMove > downMove && upMove > 0 ? upMove : 0);
    minusDm.push(downMove > upMove && downMove > 0 ? downMove : 0);
  });

  const atr = rollingMean(trueRange, PERIOD);
  const plusMean = rollingMean(plusDm, PERIOD);
  const minusMean = rollingMean(minusDm, PERIOD);

  const dx: Value[] = atr.map((range, i) => {
    const p = plusMean[i];
    const m = minusMean[i];
    if (range === null || p === null || m === null || range === 0) return null;
    const plusDi = (100 * p) / range;
    const minusDi = (100 * m) / range;
    const total = plusDi + minusDi;
    if (total === 0) return null;
    return (100 * Math.abs(plusDi - minusDi)) / total;
  });

  const adx = rollingMean(dx, PERIOD);
  const score = adx[adx.length - 1] ?? 0;

  return { score, classification: classifyStrength(score) };
}
