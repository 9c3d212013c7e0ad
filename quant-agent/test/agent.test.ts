import assert from "node:assert/strict";
import { test } from "node:test";
import { QuantAgent } from "../src/agent.ts";
import { LlmConfigSchema } from "../src/config.ts";
import type { ReasoningRequest, ReasoningService } from "../src/decision/reasoning.ts";
import { DecisionSynthesizer } from "../src/decision/synthesizer.ts";
import { CachedDataSource, type MarketDataSource } from "../src/lib/data/sources.ts";
import type { PriceSeries } from "../src/lib/types/bar.ts";
import { risingCloses, seriesFromCloses } from "./helpers.ts";

class FixedSource implements MarketDataSource {
  readonly name = "fixed";
  private readonly series: PriceSeries;

  constructor(series: PriceSeries) {
    this.series = series;
  }

  fetchBars(): Promise<PriceSeries> {
    return Promise.resolve(this.series);
  }
}

class FailingSource implements MarketDataSource {
  readonly name = "failing";

  fetchBars(): Promise<PriceSeries> {
    return Promise.reject(new Error("Kraken OHLC API error: 502"));
  }
}

const longService: ReasoningService = {
  complete: (_request: ReasoningRequest) =>
    Promise.resolve(JSON.stringify({
      decision: "LONG",
      confidence: 0.7,
      justification: "Uptrend on every timeframe",
      riskLevel: "MEDIUM",
      keyFactors: ["alignment"],
      stopLoss: 120,
      takeProfit: 140,
    })),
};

test("analyzeSymbol runs every analyzer and the synthesizer", async () => {
  const agent = new QuantAgent({
    dataSource: new FixedSource(seriesFromCloses(risingCloses(30))),
    synthesizer: new DecisionSynthesizer({ llm: LlmConfigSchema.parse({}), service: longService }),
  });

  const outcome = await agent.analyzeSymbol("XBTUSD", 60);

  assert.ok(outcome.success);
  assert.equal(outcome.symbol, "XBTUSD");
  assert.equal(outcome.intervalMinutes, 60);
  assert.equal(outcome.dataPoints, 30);
  assert.equal(outcome.trend.direction, "Bullish");
  assert.equal(outcome.pattern.trend, "Uptrend");
  assert.equal(outcome.decision.record.decision, "LONG");
  assert.equal(outcome.decision.record.takeProfit, 140);
  assert.equal(outcome.summary.finalDecision, "LONG");
});

test("short series is reported as insufficient data", async () => {
  const agent = new QuantAgent({
    dataSource: new FixedSource(seriesFromCloses(risingCloses(5))),
    synthesizer: null,
  });

  assert.deepEqual(await agent.analyzeSymbol("XBTUSD", 60), {
    success: false,
    symbol: "XBTUSD",
    error: "Insufficient data for XBTUSD: 5 bars, need at least 10.",
  });
});

test("minBars is configurable", async () => {
  const agent = new QuantAgent({
    dataSource: new FixedSource(seriesFromCloses(risingCloses(5))),
    synthesizer: null,
    minBars: 5,
  });

  const outcome = await agent.analyzeSymbol("XBTUSD", 60);
  assert.equal(outcome.success, true);
});

test("fetch failure becomes an unsuccessful outcome", async () => {
  const agent = new QuantAgent({ dataSource: new FailingSource(), synthesizer: null });

  assert.deepEqual(await agent.analyzeSymbol("XBTUSD", 60), {
    success: false,
    symbol: "XBTUSD",
    error: "Analysis failed: Kraken OHLC API error: 502",
  });
});

test("without a reasoning service the decision is a NOT_CONFIGURED hold", async () => {
  const agent = new QuantAgent({
    dataSource: new FixedSource(seriesFromCloses(risingCloses(30))),
    synthesizer: null,
  });

  const outcome = await agent.analyzeSeries("XBTUSD", seriesFromCloses(risingCloses(30)));

  assert.ok(outcome.success);
  assert.equal(outcome.intervalMinutes, 0);
  assert.equal(outcome.decision.fallback, "not_configured");
  assert.deepEqual(outcome.decision.record.keyFactors, ["NOT_CONFIGURED"]);
  assert.equal(outcome.summary.finalDecision, "HOLD");
});

test("status reports the source, cache and reasoning service", async () => {
  const cached = new CachedDataSource(new FixedSource(seriesFromCloses(risingCloses(30))), 300);
  const agent = new QuantAgent({ dataSource: cached, synthesizer: null });
  await agent.analyzeSymbol("ETHUSD", 1440);

  assert.deepEqual(agent.status(), {
    dataSource: "cached-fixed",
    cache: { enabled: true, ttlSec: 300, entries: 1, keys: ["ETHUSD:1440"] },
    reasoningService: false,
  });

  const plain = new QuantAgent({ dataSource: new FailingSource(), synthesizer: null });
  assert.deepEqual(plain.status(), { dataSource: "failing", cache: null, reasoningService: false });
});
