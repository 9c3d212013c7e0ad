import { type Bar, parsePriceSeries, type PriceSeries } from "../src/lib/types/bar.ts";

export const MINUTE_MS = 60_000;

export function near(actual: number, expected: number, epsilon = 1e-9): boolean {
  return Math.abs(actual - expected) <= epsilon;
}

/** Bars at one-minute spacing with high/low `spread` around each close */
export function barsFromCloses(
  closes: readonly number[],
  options: { spread?: number; volume?: number | readonly number[] } = {},
): Bar[] {
  const spread = options.spread ?? 1;
  return closes.map((close, i) => ({
    timestamp: (i + 1) * MINUTE_MS,
    open: close,
    high: close + spread,
    low: close - spread,
    close,
    volume: typeof options.volume === "number" || options.volume === undefined
      ? options.volume ?? 1000
      : options.volume[i],
  }));
}

export function seriesFromCloses(
  closes: readonly number[],
  options: { spread?: number; volume?: number | readonly number[] } = {},
): PriceSeries {
  return parsePriceSeries(barsFromCloses(closes, options));
}

/** close = start + i for i in 0..n-1 */
export function risingCloses(n: number, start = 100): number[] {
  return Array.from({ length: n }, (_, i) => start + i);
}

/** Deterministic pseudo-random walk */
export function randomWalk(n: number, seed: number): PriceSeries {
  let state = seed >>> 0;
  const next = () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };

  let price = 100;
  const bars: Bar[] = [];
  for (let i = 0; i < n; i++) {
    price = Math.max(1, price * (1 + (next() - 0.5) * 0.1));
    const high = price * (1 + next() * 0.02);
    const low = price * (1 - next() * 0.02);
    bars.push({
      timestamp: (i + 1) * MINUTE_MS,
      open: price,
      high,
      low,
      close: price,
      volume: Math.floor(next() * 5000),
    });
  }
  return parsePriceSeries(bars);
}
