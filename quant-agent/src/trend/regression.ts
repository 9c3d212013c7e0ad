import type { StrengthLabel, TrendReading } from "./types.ts";

export interface LinearFit {
  slope: number;
  intercept: number;
  rSquared: number;
}

const SLOPE_THRESHOLD = 0.01;

/**
 * Ordinary least squares of y against its index (0..n-1).
 * rSquared is 0 when either axis has no variance.
 */
export function linearFit(values: readonly number[]): LinearFit {
  const n = values.length;
  const meanX = (n - 1) / 2;
  const meanY = values.reduce((sum, v) => sum + v, 0) / n;

  let sxx = 0;
  let syy = 0;
  let sxy = 0;
  for (let i = 0; i < n; i++) {
    const dx = i - meanX;
    const dy = values[i] - meanY;
    sxx += dx * dx;
    syy += dy * dy;
    sxy += dx * dy;
  }

  const slope = sxx > 0 ? sxy / sxx : 0;
  const denom = Math.sqrt(sxx * syy);
  const r = denom > 0 ? Math.max(-1, Math.min(1, sxy / denom)) : 0;

  return { slope, intercept: meanY - slope * meanX, rSquared: r * r };
}

export function classifyFit(rSquared: number): StrengthLabel {
  if (rSquared < 0.3) return "Weak";
  if (rSquared < 0.6) return "Moderate";
  return "Strong";
}

/** Linear trend over one window of closing prices */
export function computeTrend(closes: readonly number[]): TrendReading {
  if (closes.length < 3) {
    return { direction: "Insufficient", slope: 0, fitQuality: 0, strengthLabel: "Weak" };
  }

  const { slope, rSquared } = linearFit(closes);
  const direction = slope > SLOPE_THRESHOLD
    ? "Bullish"
    : slope < -SLOPE_THRESHOLD
    ? "Bearish"
    : "Neutral";

  return { direction, slope, fitQuality: rSquared, strengthLabel: classifyFit(rSquared) };
}
