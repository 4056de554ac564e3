/**
 * Monte Carlo Correlation — Tests
 *
 * Cholesky factoring, matrix construction, and recovery of the declared
 * correlation from sampled parameter series.
 * Uses node:test + node:assert/strict.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { isValuationError } from "@/lib/dcfEngine";
import type { VariableParameter } from "@/lib/dcfEngine";
import {
  choleskyDecompose,
  createCorrelationMatrix,
  createCorrelationMatrixFromValues,
  expandCorrelation,
} from "../monteCarlo/correlation";
import { SeededRandom } from "../monteCarlo/random";
import { createCorrelatedSampler } from "../monteCarlo/sampler";

function approx(actual: number, expected: number, tol = 1e-12) {
  assert.ok(
    Math.abs(actual - expected) <= tol,
    `Expected ${expected} ± ${tol}, got ${actual}`,
  );
}

function pearson(xs: readonly number[], ys: readonly number[]): number {
  const n = xs.length;
  let mx = 0;
  let my = 0;
  for (let i = 0; i < n; i++) {
    mx += xs[i];
    my += ys[i];
  }
  mx /= n;
  my /= n;
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx;
    const dy = ys[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }
  return sxy / Math.sqrt(sxx * syy);
}

// ---------------------------------------------------------------------------
// Cholesky
// ---------------------------------------------------------------------------

describe("choleskyDecompose", () => {
  it("factors the 2x2 case to [[1, 0], [ρ, √(1 - ρ²)]]", () => {
    const lower = choleskyDecompose([
      [1, 0.6],
      [0.6, 1],
    ]);
    assert.equal(lower[0][0], 1);
    assert.equal(lower[0][1], 0);
    approx(lower[1][0], 0.6);
    approx(lower[1][1], 0.8);
  });

  it("L·Lᵀ reproduces a 3x3 matrix", () => {
    const matrix = [
      [1, 0.3, -0.2],
      [0.3, 1, 0.4],
      [-0.2, 0.4, 1],
    ];
    const lower = choleskyDecompose(matrix);
    for (let i = 0; i < 3; i++) {
      for (let j = 0; j < 3; j++) {
        let sum = 0;
        for (let k = 0; k < 3; k++) sum += lower[i][k] * lower[j][k];
        approx(sum, matrix[i][j]);
      }
    }
  });

  it("accepts perfect correlation (semi-definite)", () => {
    const lower = choleskyDecompose([
      [1, 1],
      [1, 1],
    ]);
    assert.deepEqual(lower, [
      [1, 0],
      [1, 0],
    ]);
  });

  it("rejects a matrix that is not positive semi-definite", () => {
    assert.throws(
      () =>
        choleskyDecompose([
          [1, 0.9, 0.9],
          [0.9, 1, -0.9],
          [0.9, -0.9, 1],
        ]),
      (err: unknown) => isValuationError(err, "SingularCorrelationMatrix"),
    );
  });
});

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

describe("createCorrelationMatrix", () => {
  const names: VariableParameter[] = ["discountRate", "terminalGrowthRate", "highGrowthRate"];

  it("builds a symmetric unit-diagonal matrix from pairs", () => {
    const matrix = createCorrelationMatrix(names, [
      { between: ["discountRate", "terminalGrowthRate"], rho: 0.5 },
    ]);
    assert.deepEqual(matrix.values, [
      [1, 0.5, 0],
      [0.5, 1, 0],
      [0, 0, 1],
    ]);
    assert.equal(matrix.cholesky[2][2], 1);
  });

  it("rejects an inconsistent set of pairs", () => {
    assert.throws(
      () =>
        createCorrelationMatrix(names, [
          { between: ["discountRate", "terminalGrowthRate"], rho: 0.9 },
          { between: ["discountRate", "highGrowthRate"], rho: 0.9 },
          { between: ["terminalGrowthRate", "highGrowthRate"], rho: -0.9 },
        ]),
      (err: unknown) => isValuationError(err, "SingularCorrelationMatrix"),
    );
  });

  it("rejects ρ outside [-1, 1]", () => {
    assert.throws(
      () =>
        createCorrelationMatrix(names, [
          { between: ["discountRate", "highGrowthRate"], rho: 1.2 },
        ]),
      (err: unknown) =>
        isValuationError(err, "InvalidParameter") && err.field === "correlation.pairs[0].rho",
    );
  });

  it("rejects conflicting duplicate pairs", () => {
    assert.throws(
      () =>
        createCorrelationMatrix(names, [
          { between: ["discountRate", "highGrowthRate"], rho: 0.2 },
          { between: ["highGrowthRate", "discountRate"], rho: 0.3 },
        ]),
      (err: unknown) =>
        isValuationError(err, "InvalidParameter") && err.field === "correlation.pairs[1].rho",
    );
  });

  it("rejects a pair naming an unlisted parameter", () => {
    assert.throws(
      () => createCorrelationMatrix(names, [{ between: ["discountRate", "netDebt"], rho: 0.1 }]),
      (err: unknown) =>
        isValuationError(err, "InvalidParameter") && err.field === "correlation.pairs[0].between",
    );
  });

  it("rejects repeated names", () => {
    assert.throws(
      () => createCorrelationMatrix(["discountRate", "discountRate"], []),
      (err: unknown) => isValuationError(err, "InvalidParameter") && err.field === "correlation.names",
    );
  });
});

describe("createCorrelationMatrixFromValues", () => {
  it("rejects an asymmetric matrix", () => {
    assert.throws(
      () =>
        createCorrelationMatrixFromValues(
          ["discountRate", "terminalGrowthRate"],
          [
            [1, 0.2],
            [0.3, 1],
          ],
        ),
      (err: unknown) =>
        isValuationError(err, "InvalidParameter") && err.field === "correlation.values[0][1]",
    );
  });

  it("rejects a non-unit diagonal", () => {
    assert.throws(
      () =>
        createCorrelationMatrixFromValues(
          ["discountRate", "terminalGrowthRate"],
          [
            [2, 0],
            [0, 1],
          ],
        ),
      (err: unknown) =>
        isValuationError(err, "InvalidParameter") && err.field === "correlation.values[0][0]",
    );
  });
});

describe("expandCorrelation", () => {
  it("leaves unmentioned parameters independent", () => {
    const correlation = createCorrelationMatrix(
      ["discountRate", "terminalGrowthRate"],
      [{ between: ["discountRate", "terminalGrowthRate"], rho: 0.6 }],
    );
    const lower = expandCorrelation(correlation, ["baseCashFlow", "discountRate", "terminalGrowthRate"]);
    assert.deepEqual(lower[0], [1, 0, 0]);
    assert.equal(lower[1][0], 0);
    approx(lower[2][1], 0.6);
    approx(lower[2][2], 0.8);
  });

  it("identity without a correlation matrix", () => {
    assert.deepEqual(expandCorrelation(undefined, ["discountRate", "netDebt"]), [
      [1, 0],
      [0, 1],
    ]);
  });

  it("rejects a correlated parameter that has no distribution", () => {
    const correlation = createCorrelationMatrix(["discountRate", "netDebt"], []);
    assert.throws(
      () => expandCorrelation(correlation, ["discountRate"]),
      (err: unknown) => isValuationError(err, "InvalidParameter") && err.value === "netDebt",
    );
  });
});

// ---------------------------------------------------------------------------
// Recovery
// ---------------------------------------------------------------------------

describe("correlated sampling", () => {
  const DRAWS = 20_000;

  it("recovers ρ = 0.6 between normal marginals", () => {
    const sampler = createCorrelatedSampler(
      {
        discountRate: { kind: "normal", mean: 0.09, stdDev: 0.01 },
        terminalGrowthRate: { kind: "normal", mean: 0.025, stdDev: 0.005 },
      },
      createCorrelationMatrix(
        ["discountRate", "terminalGrowthRate"],
        [{ between: ["discountRate", "terminalGrowthRate"], rho: 0.6 }],
      ),
    );
    const random = new SeededRandom(11);
    const xs: number[] = [];
    const ys: number[] = [];
    for (let i = 0; i < DRAWS; i++) {
      const draw = sampler.draw(random);
      xs.push(draw.discountRate ?? Number.NaN);
      ys.push(draw.terminalGrowthRate ?? Number.NaN);
    }
    approx(pearson(xs, ys), 0.6, 0.05);
  });

  it("recovers ρ = -0.5 between uniform marginals", () => {
    const sampler = createCorrelatedSampler(
      {
        baseCashFlow: { kind: "uniform", min: 60_000, max: 70_000 },
        highGrowthRate: { kind: "uniform", min: 0.05, max: 0.15 },
      },
      createCorrelationMatrix(
        ["baseCashFlow", "highGrowthRate"],
        [{ between: ["baseCashFlow", "highGrowthRate"], rho: -0.5 }],
      ),
    );
    const random = new SeededRandom(12);
    const xs: number[] = [];
    const ys: number[] = [];
    for (let i = 0; i < DRAWS; i++) {
      const draw = sampler.draw(random);
      xs.push(draw.baseCashFlow ?? Number.NaN);
      ys.push(draw.highGrowthRate ?? Number.NaN);
    }
    approx(pearson(xs, ys), -0.5, 0.05);
  });

  it("independent parameters stay uncorrelated", () => {
    const sampler = createCorrelatedSampler({
      discountRate: { kind: "normal", mean: 0.09, stdDev: 0.01 },
      highGrowthRate: { kind: "triangular", min: 0.05, mode: 0.1, max: 0.2 },
    });
    const random = new SeededRandom(13);
    const xs: number[] = [];
    const ys: number[] = [];
    for (let i = 0; i < DRAWS; i++) {
      const draw = sampler.draw(random);
      xs.push(draw.discountRate ?? Number.NaN);
      ys.push(draw.highGrowthRate ?? Number.NaN);
    }
    approx(pearson(xs, ys), 0, 0.05);
  });

  it("samples in fixed parameter order", () => {
    const sampler = createCorrelatedSampler({
      terminalGrowthRate: { kind: "normal", mean: 0.02, stdDev: 0.001 },
      baseCashFlow: { kind: "normal", mean: 100, stdDev: 1 },
    });
    assert.deepEqual(sampler.parameters, ["baseCashFlow", "terminalGrowthRate"]);
  });

  it("rejects an empty distribution map", () => {
    assert.throws(
      () => createCorrelatedSampler({}),
      (err: unknown) => isValuationError(err, "InvalidParameter") && err.field === "distributions",
    );
  });
});
