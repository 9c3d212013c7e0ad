import type { PriceSeries } from "../lib/types/bar.ts";
import type {
  AccelerationDirection,
  MomentumLabel,
  MomentumReading,
  VolumeTrend,
} from "./types.ts";

/** Percentage change of the last close against the close `bars` back; 0 without enough history */
export function periodReturn(closes: readonly number[], bars: number): number {
  const n = closes.length;
  if (n < bars + 1) return 0;
  const base = closes[n - 1 - bars];
  if (base === 0) return 0;
  return ((closes[n - 1] - base) / base) * 100;
}

export function classifyMomentum(pct: number): MomentumLabel {
  const side = pct > 0 ? "Bullish" : "Bearish";
  if (Math.abs(pct) > 5) return `Strong ${side}`;
  if (Math.abs(pct) > 2) return `Moderate ${side}`;
  return "Weak";
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Mean volume of the last 5 bars against every earlier bar.
 * The baseline spans the whole remaining history, not a fixed lookback.
 */
export function volumeMomentum(volumes: readonly number[]): { trend: VolumeTrend; ratio: number } {
  if (volumes.length < 10) {
    return { trend: "Insufficient data", ratio: 1 };
  }

  const recent = mean(volumes.slice(-5));
  const historical = volumes.length > 10 ? mean(volumes.slice(0, -5)) : recent;
  const ratio = historical > 0 ? recent / historical : 1;

  const trend: VolumeTrend = ratio > 1.5 ? "Increasing" : ratio < 0.7 ? "Decreasing" : "Stable";
  return { trend, ratio };
}

/** Second finite difference at the last close */
export function acceleration(closes: readonly number[]): { value: number; direction: AccelerationDirection } {
  const n = closes.length;
  if (n < 3) {
    return { value: 0, direction: "Insufficient data" };
  }

  const value = (closes[n - 1] - closes[n - 2]) - (closes[n - 2] - closes[n - 3]);
  const direction: AccelerationDirection = value > 0
    ? "Accelerating Up"
    : value < 0
    ? "Accelerating Down"
    : "Constant Velocity";
  return { value, direction };
}

export function analyzeMomentum(series: PriceSeries): MomentumReading {
  const closes = series.map((b) => b.close);
  const volumes = series.map((b) => b.volume);

  const periodReturns = {
    1: periodReturn(closes, 1),
    5: periodReturn(closes, 5),
    10: periodReturn(closes, 10),
  };
  const volume = volumeMomentum(volumes);
  const accel = acceleration(closes);

  return {
    periodReturns,
    label: classifyMomentum(periodReturns[5]),
    volumeTrend: volume.trend,
    volumeRatio: volume.ratio,
    acceleration: accel.value,
    accelerationDirection: accel.direction,
  };
}
