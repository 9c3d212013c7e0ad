import assert from "node:assert/strict";
import { test } from "node:test";
import { buildDecisionPrompt } from "../../src/decision/prompt.ts";
import { IndicatorClassifier } from "../../src/indicators/classifier.ts";
import { PatternDescriber } from "../../src/pattern/describer.ts";
import { TrendAnalyzer } from "../../src/trend/analyzer.ts";
import { risingCloses, seriesFromCloses } from "../helpers.ts";

const series = seriesFromCloses(risingCloses(30));
const prompt = buildDecisionPrompt({
  indicator: new IndicatorClassifier().analyze(series),
  visual: new PatternDescriber().analyze(series),
  trend: new TrendAnalyzer().analyze(series),
  symbol: "XBTUSD",
});
const lines = prompt.split("\n");

test("prompt names the symbol and all three report sections", () => {
  assert.ok(prompt.includes("Analyze the following market data for XBTUSD"));
  assert.ok(lines.includes("=== TECHNICAL INDICATORS ANALYSIS ==="));
  assert.ok(lines.includes("=== CHART PATTERN ANALYSIS ==="));
  assert.ok(lines.includes("=== TREND ANALYSIS ==="));
  assert.ok(lines.includes("Chart Pattern Analysis:"));
  assert.ok(lines.includes("Trend Analysis Summary:"));
});

test("prompt carries the trend verdict and source weights", () => {
  assert.ok(lines.includes("Overall Direction: Bullish"));
  assert.ok(lines.includes("Confidence: 0.90"));
  assert.ok(lines.includes("   - Technical Indicators: 30%"));
  assert.ok(lines.includes("   - Chart Patterns: 25%"));
  assert.ok(lines.includes("   - Trend Analysis: 45%"));
});

test("prompt spells out the response schema", () => {
  assert.ok(lines.includes("    \"decision\": \"LONG\" | \"SHORT\" | \"HOLD\","));
  assert.ok(lines.includes("    \"riskLevel\": \"LOW\" | \"MEDIUM\" | \"HIGH\","));
  assert.ok(lines.includes("    \"stopLoss\": number,"));
});
