import assert from "node:assert/strict";
import { test } from "node:test";
import { classifyStrength, rollingMean, trendStrength } from "../../src/trend/strength.ts";
import { risingCloses, seriesFromCloses } from "../helpers.ts";

test("rollingMean is null until the window fills", () => {
  assert.deepEqual(rollingMean([1, 2, 3, 4], 2), [null, 1.5, 2.5, 3.5]);
});

test("rollingMean is null while the window holds a null", () => {
  assert.deepEqual(rollingMean([1, null, 3, 5], 2), [null, null, null, 4]);
});

test("classifyStrength boundaries", () => {
  assert.equal(classifyStrength(51), "Very Strong");
  assert.equal(classifyStrength(50), "Strong");
  assert.equal(classifyStrength(25), "Moderate");
  assert.equal(classifyStrength(15), "Weak");
});

test("trendStrength needs twenty bars", () => {
  assert.deepEqual(trendStrength(seriesFromCloses(risingCloses(19))), {
    score: 0,
    classification: "Insufficient data",
  });
});

test("trendStrength scores 0 while the DX mean is still undefined", () => {
  // DX is defined from bar 14, its 14-bar mean from bar 27
  assert.deepEqual(trendStrength(seriesFromCloses(risingCloses(26))), { score: 0, classification: "Weak" });
});

test("trendStrength of a one-directional climb is 100", () => {
  assert.deepEqual(trendStrength(seriesFromCloses(risingCloses(30))), {
    score: 100,
    classification: "Very Strong",
  });
});

test("trendStrength of a flat series with zero range is 0", () => {
  const flat = seriesFromCloses(Array<number>(30).fill(100), { spread: 0 });
  assert.deepEqual(trendStrength(flat), { score: 0, classification: "Weak" });
});
