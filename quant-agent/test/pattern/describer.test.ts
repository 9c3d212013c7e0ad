import assert from "node:assert/strict";
import { test } from "node:test";
import {
  identifyTrend,
  PatternDescriber,
  priceAction,
  supportResistance,
  volatility,
} from "../../src/pattern/describer.ts";
import { near, risingCloses, seriesFromCloses } from "../helpers.ts";

test("identifyTrend needs twenty bars", () => {
  assert.equal(identifyTrend(seriesFromCloses(risingCloses(19))), "Insufficient data");
});

test("identifyTrend compares the first and last ten bars", () => {
  assert.equal(identifyTrend(seriesFromCloses(risingCloses(30))), "Uptrend");
  assert.equal(identifyTrend(seriesFromCloses(risingCloses(30).reverse())), "Downtrend");
  assert.equal(identifyTrend(seriesFromCloses(Array<number>(30).fill(100))), "Sideways");
});

test("volatility is the sample deviation of returns in percent", () => {
  assert.ok(near(volatility(seriesFromCloses([100, 110, 99])), Math.sqrt(0.02) * 100));
  assert.equal(volatility(seriesFromCloses([100, 110])), 0);
});

test("priceAction classifies the last five closes", () => {
  assert.deepEqual(priceAction(seriesFromCloses([100, 101, 102, 103])), { pattern: "Insufficient data", priceChange: 0 });
  assert.deepEqual(priceAction(seriesFromCloses([100, 101, 100, 102, 103])), { pattern: "Bullish", priceChange: 3 });
  assert.deepEqual(priceAction(seriesFromCloses([100, 99, 98, 97, 96])), { pattern: "Strong Bearish", priceChange: -4 });
  assert.deepEqual(priceAction(seriesFromCloses([100, 101, 99, 102, 100])), { pattern: "Neutral", priceChange: 0 });
});

test("supportResistance spans the last twenty bars including the current one", () => {
  assert.deepEqual(supportResistance(seriesFromCloses(risingCloses(19))), { support: null, resistance: null });
  assert.deepEqual(supportResistance(seriesFromCloses(risingCloses(30))), { support: 109, resistance: 130 });
});

test("PatternDescriber describes a steady climb", () => {
  const report = new PatternDescriber().analyze(seriesFromCloses(risingCloses(30)));

  assert.equal(report.trend, "Uptrend");
  assert.equal(report.priceAction.pattern, "Strong Bullish");
  assert.ok(near(report.priceAction.priceChange, 3.2));

  const lines = report.patternDescription.split("\n");
  assert.equal(lines[0], "Chart Pattern Analysis:");
  assert.equal(lines[1], "- Overall Trend: Uptrend");
  assert.equal(lines[3], "- Recent Price Action: Strong Bullish");
  assert.equal(lines[4], "- Support Level: 109.00");
  assert.equal(lines[5], "- Resistance Level: 130.00");
  assert.equal(lines[6], "- Current price is 95.2% within the support-resistance range");
  assert.ok(report.chartAnalysis.endsWith("Current price is 18.3% above support and 0.8% below resistance."));
});
