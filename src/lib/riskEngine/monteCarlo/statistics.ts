/**
 * Monte Carlo — Aggregation
 *
 * Runs once, single-threaded, on the sorted sample. Depends only on the
 * multiset of values, never on the order workers produced them.
 *
 * The mean is taken as min + mean(x - min) and the variance in two passes,
 * so a sample of identical values reports that value and zero spread
 * exactly.
 */

import type { HistogramBin, SummaryStatistics } from "../types";

export function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/**
 * Linear interpolation between closest ranks: h = (n - 1) * q.
 *
 * @param sorted - ascending, non-empty
 * @param q - quantile in [0, 1]
 */
export function percentile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) return Number.NaN;
  const h = (sorted.length - 1) * q;
  const lo = Math.floor(h);
  const hi = Math.min(lo + 1, sorted.length - 1);
  const frac = h - lo;
  const a = sorted[lo];
  const b = sorted[hi];
  return frac === 0 || a === b ? a : a + (b - a) * frac;
}

export function summarize(sorted: readonly number[]): SummaryStatistics {
  const n = sorted.length;
  const min = sorted[0];
  const max = sorted[n - 1];

  let shiftedSum = 0;
  let negatives = 0;
  for (const v of sorted) {
    shiftedSum += v - min;
    if (v < 0) negatives++;
  }
  const mean = min + shiftedSum / n;

  let squares = 0;
  for (const v of sorted) {
    const d = v - mean;
    squares += d * d;
  }

  const p5 = percentile(sorted, 0.05);
  const p25 = percentile(sorted, 0.25);
  const p75 = percentile(sorted, 0.75);
  const p95 = percentile(sorted, 0.95);

  return {
    mean,
    median: percentile(sorted, 0.5),
    stdDev: Math.sqrt(squares / n),
    min,
    max,
    p5,
    p10: percentile(sorted, 0.1),
    p25,
    p75,
    p90: percentile(sorted, 0.9),
    p95,
    confidence90: [p5, p95],
    confidence50: [p25, p75],
    probabilityNegative: negatives / n,
  };
}

/**
 * Equal-width bins between min and max; the last bin includes max.
 * A sample with no spread gets a single bin.
 */
export function buildHistogram(sorted: readonly number[], binCount: number): HistogramBin[] {
  if (sorted.length === 0) return [];
  const min = sorted[0];
  const max = sorted[sorted.length - 1];
  if (max === min) return [{ lower: min, upper: max, count: sorted.length }];

  const width = (max - min) / binCount;
  const bins: HistogramBin[] = Array.from({ length: binCount }, (_, i) => ({
    lower: min + i * width,
    upper: i === binCount - 1 ? max : min + (i + 1) * width,
    count: 0,
  }));

  for (const v of sorted) {
    const idx = Math.min(Math.floor((v - min) / width), binCount - 1);
    bins[idx].count++;
  }
  return bins;
}
