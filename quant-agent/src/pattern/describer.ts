import type { Analyzer } from "../lib/types/analyzer.ts";
import type { PriceSeries } from "../lib/types/bar.ts";

export type ChartTrend = "Uptrend" | "Downtrend" | "Sideways" | "Insufficient data";

export type PriceActionPattern =
  | "Strong Bullish"
  | "Strong Bearish"
  | "Bullish"
  | "Bearish"
  | "Neutral"
  | "Insufficient data";

export interface PriceAction {
  pattern: PriceActionPattern;
  /** Percent change across the last 5 closes */
  priceChange: number;
}

export interface SupportResistance {
  support: number | null;
  resistance: number | null;
}

/** Text-only visual/pattern report consumed by the decision synthesizer */
export interface VisualReport {
  trend: ChartTrend;
  volatility: number;
  priceAction: PriceAction;
  supportResistance: SupportResistance;
  patternDescription: string;
  visualSummary: string;
  chartAnalysis: string;
}

export function identifyTrend(series: PriceSeries): ChartTrend {
  if (series.length < 20) return "Insufficient data";

  const recent = series.slice(-10);
  const earlier = series.slice(0, 10);
  const recentHigh = Math.max(...recent.map((b) => b.high));
  const recentLow = Math.min(...recent.map((b) => b.low));
  const earlierHigh = Math.max(...earlier.map((b) => b.high));
  const earlierLow = Math.min(...earlier.map((b) => b.low));

  if (recentHigh > earlierHigh && recentLow > earlierLow) return "Uptrend";
  if (recentHigh < earlierHigh && recentLow < earlierLow) return "Downtrend";
  return "Sideways";
}

/** Sample standard deviation of bar-to-bar close returns, in percent */
export function volatility(series: PriceSeries): number {
  const returns: number[] = [];
  for (let i = 1; i < series.length; i++) {
    returns.push((series[i].close - series[i - 1].close) / series[i - 1].close);
  }
  if (returns.length < 2) return 0;

  const mean = returns.reduce((s, r) => s + r, 0) / returns.length;
  const variance = returns.reduce((s, r) => s + (r - mean) ** 2, 0) / (returns.length - 1);
  return Math.sqrt(variance) * 100;
}

export function priceAction(series: PriceSeries): PriceAction {
  if (series.length < 5) return { pattern: "Insufficient data", priceChange: 0 };

  const closes = series.slice(-5).map((b) => b.close);
  const first = closes[0];
  const lastClose = closes[closes.length - 1];
  const rising = closes.every((c, i) => i === 0 || c > closes[i - 1]);
  const falling = closes.every((c, i) => i === 0 || c < closes[i - 1]);

  let pattern: PriceActionPattern;
  if (rising) pattern = "Strong Bullish";
  else if (falling) pattern = "Strong Bearish";
  else if (lastClose > first) pattern = "Bullish";
  else if (lastClose < first) pattern = "Bearish";
  else pattern = "Neutral";

  return { pattern, priceChange: ((lastClose - first) / first) * 100 };
}

/** Lowest low and highest high of the last 20 bars, current bar included */
export function supportResistance(series: PriceSeries): SupportResistance {
  if (series.length < 20) return { support: null, resistance: null };
  const recent = series.slice(-20);
  return {
    support: Math.min(...recent.map((b) => b.low)),
    resistance: Math.max(...recent.map((b) => b.high)),
  };
}

function volatilityBand(pct: number): string {
  if (pct > 3) return "high";
  if (pct > 1.5) return "moderate";
  return "low";
}

/**
 * Describes the chart a trader would look at: swing trend, volatility,
 * recent price action and the support/resistance range.
 */
export class PatternDescriber implements Analyzer<PriceSeries, VisualReport> {
  readonly name = "pattern";

  analyze(series: PriceSeries): VisualReport {
    const trend = identifyTrend(series);
    const vol = volatility(series);
    const action = priceAction(series);
    const sr = supportResistance(series);
    const current = series.length > 0 ? series[series.length - 1].close : 0;

    const description = [
      "Chart Pattern Analysis:",
      `- Overall Trend: ${trend}`,
      `- Volatility: ${vol.toFixed(2)}%`,
      `- Recent Price Action: ${action.pattern}`,
    ];
    if (sr.support !== null) description.push(`- Support Level: ${sr.support.toFixed(2)}`);
    if (sr.resistance !== null) description.push(`- Resistance Level: ${sr.resistance.toFixed(2)}`);
    if (sr.support !== null && sr.resistance !== null && sr.resistance > sr.support) {
      const position = ((current - sr.support) / (sr.resistance - sr.support)) * 100;
      description.push(`- Current price is ${position.toFixed(1)}% within the support-resistance range`);
    }

    const visualSummary = `Visual Chart Summary: The chart shows a ${trend.toLowerCase()} pattern with ` +
      `${vol.toFixed(1)}% volatility. Recent price action indicates ${action.pattern.toLowerCase()} momentum.`;

    let chartAnalysis = "Detailed Chart Analysis: " +
      `Recent price action shows ${action.pattern.toLowerCase()} momentum with ${action.priceChange.toFixed(2)}% change. ` +
      `Overall trend direction is ${trend.toLowerCase()}. ` +
      `Market volatility is ${volatilityBand(vol)} at ${vol.toFixed(2)}%. `;
    if (sr.support !== null && sr.resistance !== null) {
      const aboveSupport = ((current - sr.support) / sr.support) * 100;
      const belowResistance = ((sr.resistance - current) / current) * 100;
      chartAnalysis += `Current price is ${aboveSupport.toFixed(1)}% above support and ` +
        `${belowResistance.toFixed(1)}% below resistance.`;
    }

    return {
      trend,
      volatility: vol,
      priceAction: action,
      supportResistance: sr,
      patternDescription: description.join("\n"),
      visualSummary,
      chartAnalysis: chartAnalysis.trimEnd(),
    };
  }
}
