// quant-agent/src/agent.ts
import { notConfiguredDecision, type DecisionSynthesizer } from "./decision/synthesizer.ts";
import { IndicatorClassifier } from "./indicators/classifier.ts";
import type { PriceSeries } from "./lib/types/bar.ts";
import { CachedDataSource, type CacheInfo, type MarketDataSource } from "./lib/data/sources.ts";
import { PatternDescriber } from "./pattern/describer.ts";
import { type AnalysisOutcome, assembleReport } from "./report/assembler.ts";
import { TrendAnalyzer } from "./trend/analyzer.ts";

export interface QuantAgentOptions {
  dataSource: MarketDataSource;
  /** null when no reasoning service is configured */
  synthesizer: DecisionSynthesizer | null;
  minBars?: number;
  indicators?: IndicatorClassifier;
  trend?: TrendAnalyzer;
  pattern?: PatternDescriber;
}

export interface AgentStatus {
  dataSource: string;
  cache: CacheInfo | null;
  reasoningService: boolean;
}

/**
 * Runs the analyzers over one symbol's bars and synthesizes the final
 * decision. analyzeSymbol never rejects; failures come back as
 * `{ success: false }` outcomes.
 */
export class QuantAgent {
  private readonly dataSource: MarketDataSource;
  private readonly synthesizer: DecisionSynthesizer | null;
  private readonly minBars: number;
  private readonly indicators: IndicatorClassifier;
  private readonly trend: TrendAnalyzer;
  private readonly pattern: PatternDescriber;

  constructor(options: QuantAgentOptions) {
    this.dataSource = options.dataSource;
    this.synthesizer = options.synthesizer;
    this.minBars = options.minBars ?? 10;
    this.indicators = options.indicators ?? new IndicatorClassifier();
    this.trend = options.trend ?? new TrendAnalyzer();
    this.pattern = options.pattern ?? new PatternDescriber();
  }

  async analyzeSymbol(symbol: string, intervalMinutes: number): Promise<AnalysisOutcome> {
    let series: PriceSeries;
    try {
      console.log(`[data] Fetching ${symbol} (${intervalMinutes}m) from ${this.dataSource.name}`);
      series = await this.dataSource.fetchBars(symbol, intervalMinutes);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[data] ${symbol}: ${message}`);
      return { success: false, symbol, error: `Analysis failed: ${message}` };
    }

    return this.analyzeSeries(symbol, series, intervalMinutes);
  }

  async analyzeSeries(symbol: string, series: PriceSeries, intervalMinutes = 0): Promise<AnalysisOutcome> {
    if (series.length < this.minBars) {
      return {
        success: false,
        symbol,
        error: `Insufficient data for ${symbol}: ${series.length} bars, need at least ${this.minBars}.`,
      };
    }

    const indicator = this.indicators.analyze(series);
    const trend = this.trend.analyze(series);
    const pattern = this.pattern.analyze(series);

    const inputs = { indicator, visual: pattern, trend, symbol };
    const decision = this.synthesizer
      ? await this.synthesizer.analyze(inputs)
      : notConfiguredDecision(inputs);

    return assembleReport({ symbol, intervalMinutes, series, indicator, pattern, trend, decision });
  }

  status(): AgentStatus {
    return {
      dataSource: this.dataSource.name,
      cache: this.dataSource instanceof CachedDataSource ? this.dataSource.info() : null,
      reasoningService: this.synthesizer !== null,
    };
  }
}
