/**
 * Shared contract of every analysis stage: the indicator classifier,
 * trend analyzer and pattern describer take a PriceSeries, the decision
 * synthesizer takes the three upstream reports.
 */
export interface Analyzer<TInput, TOutput> {
  readonly name: string;
  analyze(input: TInput): TOutput;
}

/** Categorical read of a single signal */
export type SignalTag = "Bullish" | "Bearish" | "Neutral";
