/**
 * Cost of Capital — Tests
 *
 * Uses node:test + node:assert/strict.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { isValuationError } from "@/lib/dcfEngine";
import { computeCostOfEquity, computeWacc } from "../index";

function approx(actual: number, expected: number, tol = 1e-12) {
  assert.ok(
    Math.abs(actual - expected) <= tol,
    `Expected ${expected} ± ${tol}, got ${actual}`,
  );
}

describe("computeCostOfEquity", () => {
  it("rf + β·ERP", () => {
    const result = computeCostOfEquity({ riskFreeRate: 0.04, beta: 1.2, equityRiskPremium: 0.05 });
    approx(result.marketRiskComponent, 0.06);
    assert.equal(result.additionalPremiums, 0);
    approx(result.costOfEquity, 0.1);
  });

  it("adds country, size and specific premiums", () => {
    const result = computeCostOfEquity({
      riskFreeRate: 0.04,
      beta: 1,
      equityRiskPremium: 0.05,
      countryRiskPremium: 0.01,
      sizePremium: 0.02,
      specificRiskPremium: 0.005,
    });
    approx(result.additionalPremiums, 0.035);
    approx(result.costOfEquity, 0.125);
  });

  it("rejects beta outside [-2, 5]", () => {
    assert.throws(
      () => computeCostOfEquity({ riskFreeRate: 0.04, beta: 6, equityRiskPremium: 0.05 }),
      (err: unknown) => isValuationError(err, "InvalidParameter") && err.field === "beta",
    );
  });
});

describe("computeWacc", () => {
  it("We·Ke + Wd·Kd·(1 - t)", () => {
    const result = computeWacc({
      costOfEquity: 0.12,
      preTaxCostOfDebt: 0.06,
      taxRate: 0.25,
      equityWeight: 0.7,
      debtWeight: 0.3,
    });
    approx(result.afterTaxCostOfDebt, 0.045);
    approx(result.equityContribution, 0.084);
    approx(result.debtContribution, 0.0135);
    approx(result.wacc, 0.0975);
  });

  it("accepts weights within 0.01 of 1", () => {
    const result = computeWacc({
      costOfEquity: 0.1,
      preTaxCostOfDebt: 0.05,
      taxRate: 0,
      equityWeight: 0.6,
      debtWeight: 0.395,
    });
    approx(result.wacc, 0.06 + 0.01975);
  });

  it("rejects weights that do not sum to 1", () => {
    assert.throws(
      () =>
        computeWacc({
          costOfEquity: 0.1,
          preTaxCostOfDebt: 0.05,
          taxRate: 0.2,
          equityWeight: 0.6,
          debtWeight: 0.3,
        }),
      (err: unknown) => isValuationError(err, "InvalidParameter") && err.field === "debtWeight",
    );
  });

  it("rejects a tax rate above 100%", () => {
    assert.throws(
      () =>
        computeWacc({
          costOfEquity: 0.1,
          preTaxCostOfDebt: 0.05,
          taxRate: 1.5,
          equityWeight: 0.5,
          debtWeight: 0.5,
        }),
      (err: unknown) =>
        isValuationError(err, "InvalidParameter") && err.field === "taxRate" && err.value === 1.5,
    );
  });
});
