import type { DecisionRecord, SynthesizedDecision } from "../decision/types.ts";
import type { IndicatorReport } from "../indicators/classifier.ts";
import type { PriceSeries } from "../lib/types/bar.ts";
import type { VisualReport } from "../pattern/describer.ts";
import type { TrendReport } from "../trend/types.ts";

export type Sentiment = "Bullish" | "Bearish" | "Neutral";

export interface ReportSummary {
  overallSentiment: Sentiment;
  overallConfidence: number;
  indicatorForecast: string;
  trendDirection: string;
  finalDecision: string;
  keyInsights: string[];
  riskAssessment: string;
}

export interface AnalysisResult {
  success: true;
  symbol: string;
  intervalMinutes: number;
  dataPoints: number;
  currentPrice: number;
  /** Percent change of the last close against the one before it */
  priceChange: number;
  analyzedAt: string;
  indicator: IndicatorReport;
  pattern: VisualReport;
  trend: TrendReport;
  decision: SynthesizedDecision;
  summary: ReportSummary;
}

export interface AnalysisFailure {
  success: false;
  symbol: string;
  error: string;
}

export type AnalysisOutcome = AnalysisResult | AnalysisFailure;

function pct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

export function summarize(
  indicator: IndicatorReport,
  trend: TrendReport,
  record: DecisionRecord,
): ReportSummary {
  let bullish = 0;
  let bearish = 0;

  if (indicator.forecast === "Bullish") bullish++;
  else if (indicator.forecast === "Bearish") bearish++;

  if (trend.direction === "Bullish") bullish++;
  else if (trend.direction === "Bearish") bearish++;

  if (record.decision === "LONG") bullish++;
  else if (record.decision === "SHORT") bearish++;

  const overallSentiment: Sentiment = bullish > bearish ? "Bullish" : bearish > bullish ? "Bearish" : "Neutral";

  return {
    overallSentiment,
    overallConfidence: (trend.confidence + record.confidence) / 2,
    indicatorForecast: indicator.forecast,
    trendDirection: trend.direction,
    finalDecision: record.decision,
    keyInsights: [
      `Technical indicators suggest ${indicator.forecast.toLowerCase()} momentum`,
      `Trend analysis shows ${trend.direction.toLowerCase()} direction with ${pct(trend.confidence)} confidence`,
      `Final recommendation: ${record.decision} with ${pct(record.confidence)} confidence`,
    ],
    riskAssessment: record.riskLevel,
  };
}

export interface AssembleInput {
  symbol: string;
  intervalMinutes: number;
  series: PriceSeries;
  indicator: IndicatorReport;
  pattern: VisualReport;
  trend: TrendReport;
  decision: SynthesizedDecision;
  now?: Date;
}

export function assembleReport(input: AssembleInput): AnalysisResult {
  const { series } = input;
  const n = series.length;
  const currentPrice = n > 0 ? series[n - 1].close : 0;
  const priceChange = n > 1 ? ((series[n - 1].close - series[n - 2].close) / series[n - 2].close) * 100 : 0;

  return {
    success: true,
    symbol: input.symbol,
    intervalMinutes: input.intervalMinutes,
    dataPoints: n,
    currentPrice,
    priceChange,
    analyzedAt: (input.now ?? new Date()).toISOString(),
    indicator: input.indicator,
    pattern: input.pattern,
    trend: input.trend,
    decision: input.decision,
    summary: summarize(input.indicator, input.trend, input.decision.record),
  };
}

/** Human-readable block for one decision record */
export function formatDecisionSummary(record: DecisionRecord): string {
  const lines = [
    `Trading Decision: ${record.decision}`,
    `Confidence: ${pct(record.confidence)}`,
    `Risk Level: ${record.riskLevel}`,
    `Justification: ${record.justification}`,
  ];
  if (record.keyFactors.length > 0) {
    lines.push(`Key Factors: ${record.keyFactors.join(", ")}`);
  }
  if (record.stopLoss > 0) {
    lines.push(`Suggested Stop Loss: ${record.stopLoss.toFixed(2)}`);
  }
  if (record.takeProfit > 0) {
    lines.push(`Suggested Take Profit: ${record.takeProfit.toFixed(2)}`);
  }
  return lines.join("\n");
}
