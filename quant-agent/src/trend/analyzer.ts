import type { Analyzer } from "../lib/types/analyzer.ts";
import type { PriceSeries } from "../lib/types/bar.ts";
import { detectBreakout } from "./breakout.ts";
import { analyzeMomentum } from "./momentum.ts";
import { computeTrend } from "./regression.ts";
import { trendStrength } from "./strength.ts";
import type {
  BreakoutState,
  ConfidenceFactors,
  MomentumReading,
  OverallDirection,
  Timeframe,
  TrendReading,
  TrendReport,
  TrendStrength,
} from "./types.ts";

export const TIMEFRAME_WEIGHTS: Record<Timeframe, number> = {
  short: 0.5,
  medium: 0.3,
  long: 0.2,
};

const MOMENTUM_BONUS = 0.2;

export function analyzeTimeframes(series: PriceSeries): Record<Timeframe, TrendReading> {
  const closes = series.map((b) => b.close);
  return {
    short: computeTrend(closes.slice(-10)),
    medium: computeTrend(closes.slice(-20)),
    long: computeTrend(closes),
  };
}

/**
 * Weighted vote of the timeframe directions plus a flat bonus for the
 * side the 5-bar momentum label names. Ties resolve to Neutral.
 */
export function overallDirection(
  timeframes: Record<Timeframe, TrendReading>,
  momentum: MomentumReading,
): OverallDirection {
  let bullish = 0;
  let bearish = 0;

  for (const tf of ["short", "medium", "long"] as const) {
    const direction = timeframes[tf].direction;
    if (direction === "Bullish") bullish += TIMEFRAME_WEIGHTS[tf];
    else if (direction === "Bearish") bearish += TIMEFRAME_WEIGHTS[tf];
  }

  if (momentum.label.endsWith("Bullish")) bullish += MOMENTUM_BONUS;
  else if (momentum.label.endsWith("Bearish")) bearish += MOMENTUM_BONUS;

  if (bullish > bearish) return "Bullish";
  if (bearish > bullish) return "Bearish";
  return "Neutral";
}

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.max(min, Math.min(max, value));
}

export function confidenceFactors(
  timeframes: Record<Timeframe, TrendReading>,
  momentum: MomentumReading,
  strength: TrendStrength,
): ConfidenceFactors {
  const distinct = new Set([
    timeframes.short.direction,
    timeframes.medium.direction,
    timeframes.long.direction,
  ]).size;
  const agreement = distinct === 1 ? 0.4 : distinct === 2 ? 0.2 : 0;

  const strengthTerm = clamp((strength.score / 100) * 0.3, 0, 0.3);

  const drift = Math.abs(momentum.periodReturns[1] - momentum.periodReturns[5]);
  const momentumTerm = clamp(Math.max(0, 1 - drift / 10) * 0.3, 0, 0.3);

  return { agreement, strength: strengthTerm, momentum: momentumTerm };
}

export function trendConfidence(factors: ConfidenceFactors): number {
  return clamp(factors.agreement + factors.strength + factors.momentum, 0, 1);
}

export function formatTrendSummary(
  timeframes: Record<Timeframe, TrendReading>,
  momentum: MomentumReading,
  strength: TrendStrength,
  breakout: BreakoutState,
): string {
  const lines = [
    "Trend Analysis Summary:",
    `- Short-term trend: ${timeframes.short.direction} (${timeframes.short.strengthLabel})`,
    `- Medium-term trend: ${timeframes.medium.direction} (${timeframes.medium.strengthLabel})`,
    `- Long-term trend: ${timeframes.long.direction} (${timeframes.long.strengthLabel})`,
    `- Price momentum: ${momentum.label}`,
    `- Volume momentum: ${momentum.volumeTrend}`,
    `- Price acceleration: ${momentum.accelerationDirection}`,
    `- Trend strength: ${strength.classification} (Score: ${strength.score.toFixed(1)})`,
  ];

  let breakoutLine = `- Breakout status: ${breakout.status}`;
  if (breakout.status === "ResistanceBreakout" || breakout.status === "SupportBreakdown") {
    breakoutLine += ` (Strength: ${breakout.strengthPct.toFixed(2)}%)`;
  }
  lines.push(breakoutLine);

  return lines.join("\n");
}

/**
 * Multi-timeframe trend, momentum, strength and breakout read of a
 * series. Pure: short input degrades to "Insufficient" sub-results.
 */
export class TrendAnalyzer implements Analyzer<PriceSeries, TrendReport> {
  readonly name = "trend";

  analyze(series: PriceSeries): TrendReport {
    const timeframes = analyzeTimeframes(series);
    const momentum = analyzeMomentum(series);
    const strength = trendStrength(series);
    const breakout = detectBreakout(series);
    const factors = confidenceFactors(timeframes, momentum, strength);

    return {
      timeframes,
      momentum,
      strength,
      breakout,
      direction: overallDirection(timeframes, momentum),
      confidence: trendConfidence(factors),
      confidenceFactors: factors,
      summary: formatTrendSummary(timeframes, momentum, strength, breakout),
    };
  }
}
