/**
 * DCF Engine — Public API
 *
 * evaluateDcf() is the single re-entrant primitive every risk technique
 * calls: parameters → projection → terminal value → per-share value.
 *
 * Pure function: deterministic, no shared state.
 */

import type { ValuationOutcome, ValuationParameters } from "./types";
import type { ValuationParametersInput } from "./schemas";
import { parseValuationParameters } from "./schemas";
import { projectCashFlows } from "./cashFlowProjector";
import { computeExitMultipleTerminalValue, computeGordonTerminalValue } from "./terminalValue";

// Re-export types
export type {
  CashFlowBasis,
  CashFlowEntry,
  CashFlowProjection,
  GrowthPhase,
  ProjectionInput,
  TerminalRelianceAssessment,
  TerminalValueMethod,
  TerminalValueResult,
  ValuationOutcome,
  ValuationParameters,
  VariableParameter,
} from "./types";
export type { ValuationParametersInput } from "./schemas";
export type { ValuationErrorCode, ValuationErrorDetail } from "./errors";

// Re-export sub-modules
export { VARIABLE_PARAMETERS } from "./types";
export { parseValuationParameters, ValuationParametersSchema } from "./schemas";
export { buildGrowthSchedule, projectCashFlows } from "./cashFlowProjector";
export {
  assessTerminalReliance,
  computeExitMultipleTerminalValue,
  computeGordonTerminalValue,
} from "./terminalValue";
export { ValuationError, fromZodError, invalidParameter, isValuationError } from "./errors";

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Value one parameter set.
 *
 * FCFF: enterprise value = PV(explicit) + PV(TV); equity = EV - net debt.
 * FCFE: the discounted total is already equity; EV = equity + net debt.
 *
 * @throws ValuationError InvalidParameter, unchanged from the sub-calculators
 */
export function evaluateDcf(input: ValuationParametersInput | ValuationParameters): ValuationOutcome {
  const params = parseValuationParameters(input);

  const projection = projectCashFlows({
    baseCashFlow: params.baseCashFlow,
    highGrowthRate: params.highGrowthRate,
    highGrowthYears: params.highGrowthYears,
    transitionYears: params.transitionYears,
    terminalGrowthRate: params.terminalGrowthRate,
    discountRate: params.discountRate,
  });

  const tvMethod = params.terminalValue;
  const terminalValue =
    tvMethod.method === "gordon"
      ? computeGordonTerminalValue({
          lastCashFlow: projection.lastCashFlow,
          terminalGrowthRate: params.terminalGrowthRate,
          discountRate: params.discountRate,
          horizonYears: projection.horizonYears,
          stableRoic: tvMethod.stableRoic,
        })
      : computeExitMultipleTerminalValue({
          terminalMetric: tvMethod.terminalMetric,
          multiple: tvMethod.multiple,
          discountRate: params.discountRate,
          horizonYears: projection.horizonYears,
        });

  const explicitPresentValue = projection.explicitPresentValue;
  const terminalPresentValue = terminalValue.presentValue;
  const discountedTotal = explicitPresentValue + terminalPresentValue;

  const equityValue =
    params.cashFlowBasis === "FCFF" ? discountedTotal - params.netDebt : discountedTotal;
  const enterpriseValue =
    params.cashFlowBasis === "FCFF" ? discountedTotal : discountedTotal + params.netDebt;

  return {
    enterpriseValue,
    equityValue,
    perShareValue: equityValue / params.shareCount,
    explicitPresentValue,
    terminalPresentValue,
    terminalRatio: terminalPresentValue / discountedTotal,
    projection,
    terminalValue,
  };
}

/** Convenience for callers that only need the scalar. */
export function evaluatePerShareValue(
  input: ValuationParametersInput | ValuationParameters,
): number {
  return evaluateDcf(input).perShareValue;
}
