import assert from "node:assert/strict";
import { test } from "node:test";
import {
  confidenceFactors,
  formatTrendSummary,
  overallDirection,
  TrendAnalyzer,
} from "../../src/trend/analyzer.ts";
import { analyzeMomentum } from "../../src/trend/momentum.ts";
import type { Timeframe, TrendReading } from "../../src/trend/types.ts";
import { near, randomWalk, risingCloses, seriesFromCloses } from "../helpers.ts";

const analyzer = new TrendAnalyzer();

function reading(direction: TrendReading["direction"]): TrendReading {
  return { direction, slope: 0, fitQuality: 0, strengthLabel: "Weak" };
}

test("steady 30-bar climb is Bullish on every timeframe", () => {
  const report = analyzer.analyze(seriesFromCloses(risingCloses(30)));

  for (const tf of ["short", "medium", "long"] as const) {
    assert.equal(report.timeframes[tf].direction, "Bullish");
    assert.ok(near(report.timeframes[tf].slope, 1));
    assert.ok(near(report.timeframes[tf].fitQuality, 1));
    assert.equal(report.timeframes[tf].strengthLabel, "Strong");
  }
  assert.equal(report.direction, "Bullish");
  assert.deepEqual(report.strength, { score: 100, classification: "Very Strong" });
  assert.equal(report.breakout.status, "None");
});

test("steady climb confidence sums agreement, strength and momentum terms", () => {
  const report = analyzer.analyze(seriesFromCloses(risingCloses(30)));
  const drift = Math.abs(0.78125 - (5 / 124) * 100);
  const momentum = (1 - drift / 10) * 0.3;

  assert.equal(report.confidenceFactors.agreement, 0.4);
  assert.equal(report.confidenceFactors.strength, 0.3);
  assert.ok(near(report.confidenceFactors.momentum, momentum));
  assert.ok(near(report.confidence, 0.4 + 0.3 + momentum));
});

test("two bars give Insufficient timeframes that still agree", () => {
  const report = analyzer.analyze(seriesFromCloses([100, 100]));

  assert.equal(report.timeframes.short.direction, "Insufficient");
  assert.equal(report.timeframes.medium.direction, "Insufficient");
  assert.equal(report.timeframes.long.direction, "Insufficient");
  assert.equal(report.confidenceFactors.agreement, 0.4);
  assert.equal(report.confidenceFactors.strength, 0);
  assert.equal(report.confidenceFactors.momentum, 0.3);
  assert.ok(near(report.confidence, 0.7));
  assert.equal(report.direction, "Neutral");
  assert.equal(report.breakout.status, "Insufficient data");
  assert.equal(report.strength.classification, "Insufficient data");
});

test("empty series does not throw", () => {
  const report = analyzer.analyze([]);
  assert.equal(report.direction, "Neutral");
  assert.equal(report.breakout.currentPrice, 0);
});

test("analysis is deterministic", () => {
  const series = randomWalk(60, 7);
  assert.deepEqual(analyzer.analyze(series), analyzer.analyze(series));
});

test("confidence stays within [0, 1] over random walks", () => {
  for (let seed = 1; seed <= 50; seed++) {
    const { confidence, confidenceFactors: f } = analyzer.analyze(randomWalk(15 + seed, seed));
    assert.ok(confidence >= 0 && confidence <= 1, `seed ${seed}: ${confidence}`);
    assert.ok(f.strength >= 0 && f.strength <= 0.3);
    assert.ok(f.momentum >= 0 && f.momentum <= 0.3);
  }
});

test("momentum term bottoms out at 0 on a large return gap", () => {
  // +20% over 1 bar, flat over 5
  const series = seriesFromCloses([120, 100, 100, 100, 100, 120]);
  const factors = confidenceFactors(
    analyzer.analyze(series).timeframes,
    analyzeMomentum(series),
    { score: 0, classification: "Weak" },
  );
  assert.equal(factors.momentum, 0);
});

test("three distinct directions give no agreement credit", () => {
  const timeframes: Record<Timeframe, TrendReading> = {
    short: reading("Bullish"),
    medium: reading("Bearish"),
    long: reading("Neutral"),
  };
  const factors = confidenceFactors(timeframes, analyzeMomentum([]), { score: 0, classification: "Weak" });
  assert.equal(factors.agreement, 0);
});

test("overallDirection ties resolve to Neutral", () => {
  const timeframes: Record<Timeframe, TrendReading> = {
    short: reading("Bearish"),
    medium: reading("Bullish"),
    long: reading("Bullish"),
  };
  assert.equal(overallDirection(timeframes, analyzeMomentum([])), "Neutral");
});

test("overallDirection counts the momentum bonus", () => {
  const timeframes: Record<Timeframe, TrendReading> = {
    short: reading("Neutral"),
    medium: reading("Bearish"),
    long: reading("Neutral"),
  };
  const momentum = { ...analyzeMomentum([]), label: "Strong Bullish" as const };
  // 0.3 bearish against 0.2 bullish
  assert.equal(overallDirection(timeframes, momentum), "Bearish");
  timeframes.medium = reading("Neutral");
  assert.equal(overallDirection(timeframes, momentum), "Bullish");
});

test("summary reports breakout strength only when a level broke", () => {
  const timeframes: Record<Timeframe, TrendReading> = {
    short: reading("Bullish"),
    medium: reading("Bullish"),
    long: reading("Neutral"),
  };
  const momentum = analyzeMomentum([]);
  const strength = { score: 30, classification: "Strong" as const };
  const levels = { supportLevel: 95, resistanceLevel: 105, currentPrice: 105.2 };

  const broke = formatTrendSummary(timeframes, momentum, strength, {
    status: "ResistanceBreakout",
    strengthPct: 0.1905,
    ...levels,
  }).split("\n");
  assert.equal(broke[0], "Trend Analysis Summary:");
  assert.equal(broke[7], "- Trend strength: Strong (Score: 30.0)");
  assert.equal(broke[8], "- Breakout status: ResistanceBreakout (Strength: 0.19%)");

  const quiet = formatTrendSummary(timeframes, momentum, strength, { status: "None", strengthPct: 0, ...levels });
  assert.equal(quiet.split("\n")[8], "- Breakout status: None");
});
