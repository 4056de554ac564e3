/**
 * Cost of Capital — Types
 *
 * CAPM cost of equity and after-tax WACC. Rates are decimals.
 */

export interface CostOfEquityInput {
  riskFreeRate: number;
  /** Levered beta, [-2, 5] */
  beta: number;
  equityRiskPremium: number;
  countryRiskPremium?: number;
  sizePremium?: number;
  /** Company-specific premium, analyst judgement */
  specificRiskPremium?: number;
}

export interface CostOfEquityResult {
  costOfEquity: number;
  /** beta * equityRiskPremium */
  marketRiskComponent: number;
  /** country + size + specific */
  additionalPremiums: number;
}

export interface WaccInput {
  costOfEquity: number;
  preTaxCostOfDebt: number;
  taxRate: number;
  equityWeight: number;
  debtWeight: number;
}

export interface WaccResult {
  wacc: number;
  afterTaxCostOfDebt: number;
  equityContribution: number;
  debtContribution: number;
}
