import { MACD, ROC, RSI, Stochastic, WilliamsR } from "technicalindicators";
import type { Analyzer, SignalTag } from "../lib/types/analyzer.ts";
import type { PriceSeries } from "../lib/types/bar.ts";

export interface IndicatorValues {
  rsi: number;
  macdLine: number;
  macdSignal: number;
  macdHistogram: number;
  roc: number;
  stochK: number;
  stochD: number;
  willr: number;
}

export type IndicatorName = "rsi" | "macd" | "roc" | "stoch" | "willr";

export type IndicatorSignals = Record<IndicatorName, SignalTag>;

export interface IndicatorReport {
  indicators: IndicatorValues;
  signals: IndicatorSignals;
  summary: string;
  forecast: SignalTag;
  evidence: string;
  trigger: string;
}

export interface ClassifierThresholds {
  rsiOverbought: number;
  rsiOversold: number;
  rocBullish: number;
  rocBearish: number;
  stochOverbought: number;
  stochOversold: number;
  willrOverbought: number;
  willrOversold: number;
}

export const DEFAULT_THRESHOLDS: ClassifierThresholds = {
  rsiOverbought: 70,
  rsiOversold: 30,
  rocBullish: 2,
  rocBearish: -2,
  stochOverbought: 80,
  stochOversold: 20,
  willrOverbought: -20,
  willrOversold: -80,
};

/** Values used when the series is too short for an indicator */
export const NEUTRAL_INDICATORS: IndicatorValues = {
  rsi: 50,
  macdLine: 0,
  macdSignal: 0,
  macdHistogram: 0,
  roc: 0,
  stochK: 50,
  stochD: 50,
  willr: -50,
};

const ORDER: IndicatorName[] = ["rsi", "macd", "roc", "stoch", "willr"];

function last<T>(values: T[]): T | undefined {
  return values[values.length - 1];
}

export function computeIndicators(series: PriceSeries): IndicatorValues {
  const close = series.map((b) => b.close);
  const high = series.map((b) => b.high);
  const low = series.map((b) => b.low);

  const macd = last(MACD.calculate({
    values: close,
    fastPeriod: 12,
    slowPeriod: 26,
    signalPeriod: 9,
    SimpleMAOscillator: false,
    SimpleMASignal: false,
  }));
  const stoch = last(Stochastic.calculate({ high, low, close, period: 14, signalPeriod: 3 }));

  return {
    rsi: last(RSI.calculate({ values: close, period: 14 })) ?? NEUTRAL_INDICATORS.rsi,
    macdLine: macd?.MACD ?? NEUTRAL_INDICATORS.macdLine,
    macdSignal: macd?.signal ?? NEUTRAL_INDICATORS.macdSignal,
    macdHistogram: macd?.histogram ?? NEUTRAL_INDICATORS.macdHistogram,
    roc: last(ROC.calculate({ values: close, period: 10 })) ?? NEUTRAL_INDICATORS.roc,
    stochK: stoch?.k ?? NEUTRAL_INDICATORS.stochK,
    stochD: stoch?.d ?? NEUTRAL_INDICATORS.stochD,
    willr: last(WilliamsR.calculate({ high, low, close, period: 14 })) ?? NEUTRAL_INDICATORS.willr,
  };
}

function band(value: number, bearishAbove: number, bullishBelow: number): SignalTag {
  if (value > bearishAbove) return "Bearish";
  if (value < bullishBelow) return "Bullish";
  return "Neutral";
}

export function classifySignals(
  v: IndicatorValues,
  t: ClassifierThresholds = DEFAULT_THRESHOLDS,
): IndicatorSignals {
  return {
    rsi: band(v.rsi, t.rsiOverbought, t.rsiOversold),
    macd: v.macdLine > v.macdSignal ? "Bullish" : v.macdLine < v.macdSignal ? "Bearish" : "Neutral",
    roc: v.roc > t.rocBullish ? "Bullish" : v.roc < t.rocBearish ? "Bearish" : "Neutral",
    stoch: band(v.stochK, t.stochOverbought, t.stochOversold),
    willr: band(v.willr, t.willrOverbought, t.willrOversold),
  };
}

function headlineValue(name: IndicatorName, v: IndicatorValues): number {
  switch (name) {
    case "rsi":
      return v.rsi;
    case "macd":
      return v.macdLine;
    case "roc":
      return v.roc;
    case "stoch":
      return v.stochK;
    case "willr":
      return v.willr;
  }
}

function count(signals: IndicatorSignals, tag: SignalTag): number {
  return ORDER.filter((name) => signals[name] === tag).length;
}

export function forecast(signals: IndicatorSignals): SignalTag {
  const bullish = count(signals, "Bullish");
  const bearish = count(signals, "Bearish");
  if (bullish > bearish) return "Bullish";
  if (bearish > bullish) return "Bearish";
  return "Neutral";
}

export function evidence(values: IndicatorValues, signals: IndicatorSignals): string {
  const points = ORDER
    .filter((name) => signals[name] !== "Neutral")
    .map((name) => `${name.toUpperCase()}: ${signals[name]} (${headlineValue(name, values).toFixed(2)})`);
  return points.length > 0 ? points.join("; ") : "Mixed signals with no clear direction";
}

export function trigger(signals: IndicatorSignals): string {
  const triggers: string[] = [];
  if (signals.rsi !== "Neutral") triggers.push(`RSI ${signals.rsi.toLowerCase()} condition`);
  if (signals.macd !== "Neutral") triggers.push(`MACD ${signals.macd.toLowerCase()} crossover`);
  return triggers.length > 0 ? triggers.join("; ") : "No clear trigger identified";
}

export function formatIndicatorSummary(v: IndicatorValues, signals: IndicatorSignals): string {
  return [
    "Technical Analysis Summary:",
    `- RSI (${v.rsi.toFixed(2)}): ${signals.rsi}`,
    `- MACD (${v.macdLine.toFixed(4)}): ${signals.macd}`,
    `- Rate of Change (${v.roc.toFixed(2)}%): ${signals.roc}`,
    `- Stochastic (${v.stochK.toFixed(2)}): ${signals.stoch}`,
    `- Williams %R (${v.willr.toFixed(2)}): ${signals.willr}`,
    "",
    `Signal Distribution: ${count(signals, "Bullish")} Bullish, ${count(signals, "Bearish")} Bearish, ${count(signals, "Neutral")} Neutral`,
  ].join("\n");
}

/** Oscillator readings tagged Bullish/Bearish/Neutral by fixed thresholds */
export class IndicatorClassifier implements Analyzer<PriceSeries, IndicatorReport> {
  readonly name = "indicators";
  private readonly thresholds: ClassifierThresholds;

  constructor(thresholds: Partial<ClassifierThresholds> = {}) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };
  }

  analyze(series: PriceSeries): IndicatorReport {
    const indicators = computeIndicators(series);
    const signals = classifySignals(indicators, this.thresholds);

    return {
      indicators,
      signals,
      summary: formatIndicatorSummary(indicators, signals),
      forecast: forecast(signals),
      evidence: evidence(indicators, signals),
      trigger: trigger(signals),
    };
  }
}
