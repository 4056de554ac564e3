/**
 * Monte Carlo Aggregation — Tests
 *
 * Uses node:test + node:assert/strict.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { buildHistogram, percentile, sortAscending, summarize } from "../monteCarlo/statistics";

describe("percentile", () => {
  it("interpolates between closest ranks", () => {
    const sorted = [10, 20, 30, 40, 50];
    assert.equal(percentile(sorted, 0), 10);
    assert.equal(percentile(sorted, 0.5), 30);
    assert.equal(percentile(sorted, 1), 50);
    assert.equal(percentile([1, 2, 3, 4], 0.5), 2.5);
  });

  it("single value is every percentile", () => {
    assert.equal(percentile([7], 0.05), 7);
    assert.equal(percentile([7], 0.95), 7);
  });

  it("empty input is NaN", () => {
    assert.ok(Number.isNaN(percentile([], 0.5)));
  });
});

describe("summarize", () => {
  it("mean, population sd, extremes", () => {
    const stats = summarize([1, 2, 3, 4, 5]);
    assert.equal(stats.mean, 3);
    assert.equal(stats.median, 3);
    assert.equal(stats.stdDev, Math.sqrt(2));
    assert.equal(stats.min, 1);
    assert.equal(stats.max, 5);
    assert.equal(stats.p25, 2);
    assert.equal(stats.p75, 4);
    assert.deepEqual(stats.confidence50, [2, 4]);
  });

  it("probability of a negative value", () => {
    const stats = summarize([-2, -1, 0, 1, 2]);
    assert.equal(stats.probabilityNegative, 0.4);
    assert.equal(stats.mean, 0);
  });

  it("identical values collapse exactly", () => {
    const value = 226.22878077350262;
    const stats = summarize(new Array<number>(1_000).fill(value));
    assert.equal(stats.mean, value);
    assert.equal(stats.stdDev, 0);
    assert.equal(stats.p5, value);
    assert.equal(stats.p95, value);
  });

  it("percentiles are ordered", () => {
    const stats = summarize(sortAscending([5, 3, 9, 1, 7, 2, 8, 6, 4, 10]));
    assert.ok(stats.p5 <= stats.p10);
    assert.ok(stats.p10 <= stats.p25);
    assert.ok(stats.p25 <= stats.median);
    assert.ok(stats.median <= stats.p75);
    assert.ok(stats.p75 <= stats.p90);
    assert.ok(stats.p90 <= stats.p95);
  });
});

describe("buildHistogram", () => {
  it("equal-width bins, last bin includes the maximum", () => {
    const bins = buildHistogram([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10], 5);
    assert.deepEqual(
      bins.map((b) => b.count),
      [2, 2, 2, 2, 3],
    );
    assert.deepEqual(
      bins.map((b) => b.lower),
      [0, 2, 4, 6, 8],
    );
    assert.equal(bins[4].upper, 10);
  });

  it("no spread gives one bin", () => {
    assert.deepEqual(buildHistogram([4, 4, 4], 20), [{ lower: 4, upper: 4, count: 3 }]);
  });

  it("counts sum to the sample size", () => {
    const sorted = sortAscending([0.3, 1.7, 2.2, 2.9, 3.1, 4.4, 5.0, 5.5, 9.9]);
    const bins = buildHistogram(sorted, 4);
    assert.equal(
      bins.reduce((acc, b) => acc + b.count, 0),
      sorted.length,
    );
  });

  it("empty input has no bins", () => {
    assert.deepEqual(buildHistogram([], 10), []);
  });
});

describe("sortAscending", () => {
  it("sorts numerically without mutating", () => {
    const input = [10, 9, 100, 1];
    assert.deepEqual(sortAscending(input), [1, 9, 10, 100]);
    assert.deepEqual(input, [10, 9, 100, 1]);
  });
});
