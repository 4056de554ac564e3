/**
 * Cost of Capital — Public API
 *
 *   Ke   = rf + β·ERP + CRP + size + specific
 *   WACC = We·Ke + Wd·Kd·(1 - t)
 *
 * Produces the discountRate the DCF engine consumes: WACC for FCFF,
 * Ke for FCFE.
 */
import { z } from "zod";

import { fromZodError, invalidParameter } from "@/lib/dcfEngine";
import type {
  CostOfEquityInput,
  CostOfEquityResult,
  WaccInput,
  WaccResult,
} from "./types";

export type { CostOfEquityInput, CostOfEquityResult, WaccInput, WaccResult } from "./types";

const WEIGHT_TOLERANCE = 0.01;

const rate = () => z.number().finite().gt(-1, "must be greater than -1").max(5, "must be <= 5");
const premium = () => z.number().finite().min(-1).max(5).default(0);
const weight = () => z.number().finite().min(0, "must be >= 0").max(1, "must be <= 1");

export const CostOfEquityInputSchema = z.object({
  riskFreeRate: rate(),
  beta: z.number().finite().min(-2, "must be >= -2").max(5, "must be <= 5"),
  equityRiskPremium: rate(),
  countryRiskPremium: premium(),
  sizePremium: premium(),
  specificRiskPremium: premium(),
});

export const WaccInputSchema = z.object({
  costOfEquity: rate(),
  preTaxCostOfDebt: rate(),
  taxRate: weight(),
  equityWeight: weight(),
  debtWeight: weight(),
});

/**
 * @throws ValuationError InvalidParameter
 */
export function computeCostOfEquity(input: CostOfEquityInput): CostOfEquityResult {
  const parsed = CostOfEquityInputSchema.safeParse(input);
  if (!parsed.success) throw fromZodError(parsed.error, input);
  const p = parsed.data;

  const marketRiskComponent = p.beta * p.equityRiskPremium;
  const additionalPremiums = p.countryRiskPremium + p.sizePremium + p.specificRiskPremium;

  return {
    costOfEquity: p.riskFreeRate + marketRiskComponent + additionalPremiums,
    marketRiskComponent,
    additionalPremiums,
  };
}

/**
 * @throws ValuationError InvalidParameter, including weights that do not
 *         sum to 1 within 0.01
 */
export function computeWacc(input: WaccInput): WaccResult {
  const parsed = WaccInputSchema.safeParse(input);
  if (!parsed.success) throw fromZodError(parsed.error, input);
  const p = parsed.data;

  const weightSum = p.equityWeight + p.debtWeight;
  if (Math.abs(weightSum - 1) > WEIGHT_TOLERANCE) {
    throw invalidParameter("debtWeight", weightSum, "plus equityWeight must sum to 1");
  }

  const afterTaxCostOfDebt = p.preTaxCostOfDebt * (1 - p.taxRate);
  const equityContribution = p.equityWeight * p.costOfEquity;
  const debtContribution = p.debtWeight * afterTaxCostOfDebt;

  return {
    wacc: equityContribution + debtContribution,
    afterTaxCostOfDebt,
    equityContribution,
    debtContribution,
  };
}
