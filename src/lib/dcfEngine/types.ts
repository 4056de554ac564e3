/**
 * DCF Engine — Types
 *
 * Multi-stage discounted cash flow: explicit projection, terminal value,
 * enterprise → equity → per-share bridge.
 *
 * Pure math, no data fetching or logging.
 */

// ---------------------------------------------------------------------------
// Parameters
// ---------------------------------------------------------------------------

/** FCFF discounts at WACC to enterprise value; FCFE discounts at Ke to equity. */
export type CashFlowBasis = "FCFF" | "FCFE";

export type TerminalValueMethod =
  | {
      method: "gordon";
      /** Stable-phase ROIC. When set, terminal flow is reduced by reinvestment g / ROIC. */
      stableRoic?: number;
    }
  | {
      method: "exitMultiple";
      /** e.g. 8 for 8x EV/EBITDA */
      multiple: number;
      /** Metric the multiple applies to, in the final explicit year */
      terminalMetric: number;
    };

export interface ValuationParameters {
  /** Year-0 cash flow; the first projected year grows from this */
  baseCashFlow: number;
  /** Decimal (0.0942 for 9.42%) */
  discountRate: number;
  /** Phase-1 growth, decimal */
  highGrowthRate: number;
  highGrowthYears: number;
  /** Linear fade from highGrowthRate to terminalGrowthRate */
  transitionYears: number;
  terminalGrowthRate: number;
  /** Debt minus cash. Negative = net cash, added back to equity. */
  netDebt: number;
  shareCount: number;
  cashFlowBasis: CashFlowBasis;
  terminalValue: TerminalValueMethod;
}

/** Numeric fields a risk technique may vary. */
export type VariableParameter =
  | "baseCashFlow"
  | "discountRate"
  | "highGrowthRate"
  | "highGrowthYears"
  | "transitionYears"
  | "terminalGrowthRate"
  | "netDebt"
  | "shareCount";

export const VARIABLE_PARAMETERS: readonly VariableParameter[] = [
  "baseCashFlow",
  "discountRate",
  "highGrowthRate",
  "highGrowthYears",
  "transitionYears",
  "terminalGrowthRate",
  "netDebt",
  "shareCount",
];

// ---------------------------------------------------------------------------
// Projection
// ---------------------------------------------------------------------------

export type GrowthPhase = "high" | "transition";

export interface CashFlowEntry {
  /** 1-indexed year */
  period: number;
  phase: GrowthPhase;
  growthRate: number;
  cashFlow: number;
  /** 1 / (1 + r)^period */
  discountFactor: number;
  presentValue: number;
}

export interface ProjectionInput {
  baseCashFlow: number;
  highGrowthRate: number;
  highGrowthYears: number;
  transitionYears: number;
  terminalGrowthRate: number;
  discountRate: number;
}

export interface CashFlowProjection {
  /** Chronological; order is significant */
  entries: readonly CashFlowEntry[];
  horizonYears: number;
  /** Final projected flow, or the base flow when the horizon is empty */
  lastCashFlow: number;
  explicitPresentValue: number;
}

// ---------------------------------------------------------------------------
// Terminal value
// ---------------------------------------------------------------------------

export interface TerminalValueResult {
  method: TerminalValueMethod["method"];
  /** Undiscounted value at the end of the horizon */
  nominalValue: number;
  presentValue: number;
  /** Gordon only: first terminal-year flow after reinvestment */
  terminalCashFlow?: number;
  /** Gordon only, when stableRoic is given: g / ROIC */
  reinvestmentRate?: number;
}

export interface TerminalRelianceAssessment {
  terminalRatio: number;
  threshold: number;
  /** terminalRatio > threshold */
  excessive: boolean;
}

// ---------------------------------------------------------------------------
// Outcome
// ---------------------------------------------------------------------------

export interface ValuationOutcome {
  enterpriseValue: number;
  equityValue: number;
  perShareValue: number;
  explicitPresentValue: number;
  terminalPresentValue: number;
  /** terminalPresentValue / (explicitPresentValue + terminalPresentValue); always reported */
  terminalRatio: number;
  projection: CashFlowProjection;
  terminalValue: TerminalValueResult;
}
