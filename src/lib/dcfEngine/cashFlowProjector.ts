/**
 * DCF Engine — Cash Flow Projector
 *
 * Two- or three-phase growth schedule:
 *   Phase 1:     constant highGrowthRate for highGrowthYears
 *   Transition:  period i of m grows at g1 + (gT - g1) * i / m,
 *                landing exactly on gT in the final transition year
 *   Terminal:    handled by terminalValue.ts, not projected here
 *
 * transitionYears = 0 is the two-phase case of the same loop.
 */

import { invalidParameter } from "./errors";
import type { CashFlowEntry, CashFlowProjection, GrowthPhase, ProjectionInput } from "./types";

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function assertYears(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw invalidParameter(field, value, "must be a whole number >= 0");
  }
}

function assertRate(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= -1) {
    throw invalidParameter(field, value, "must be a finite rate greater than -1");
  }
}

function validateProjectionInput(input: ProjectionInput): void {
  if (!Number.isFinite(input.baseCashFlow) || input.baseCashFlow <= 0) {
    throw invalidParameter("baseCashFlow", input.baseCashFlow, "must be finite and positive");
  }
  assertYears("highGrowthYears", input.highGrowthYears);
  assertYears("transitionYears", input.transitionYears);
  assertRate("highGrowthRate", input.highGrowthRate);
  assertRate("terminalGrowthRate", input.terminalGrowthRate);
  if (!Number.isFinite(input.discountRate) || input.discountRate <= 0) {
    throw invalidParameter("discountRate", input.discountRate, "must be finite and positive");
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Per-period growth rates, phase-tagged, in chronological order.
 */
export function buildGrowthSchedule(
  input: Pick<
    ProjectionInput,
    "highGrowthRate" | "highGrowthYears" | "transitionYears" | "terminalGrowthRate"
  >,
): Array<{ phase: GrowthPhase; growthRate: number }> {
  assertYears("highGrowthYears", input.highGrowthYears);
  assertYears("transitionYears", input.transitionYears);

  const schedule: Array<{ phase: GrowthPhase; growthRate: number }> = [];
  for (let year = 1; year <= input.highGrowthYears; year++) {
    schedule.push({ phase: "high", growthRate: input.highGrowthRate });
  }

  const m = input.transitionYears;
  const g1 = input.highGrowthRate;
  const gT = input.terminalGrowthRate;
  for (let i = 1; i <= m; i++) {
    schedule.push({ phase: "transition", growthRate: g1 + ((gT - g1) * i) / m });
  }

  return schedule;
}

/**
 * Compound and discount the explicit horizon.
 *
 * Pure function — deterministic, no side effects.
 *
 * @throws ValuationError InvalidParameter on negative/fractional year counts
 *         or a non-positive base flow
 */
export function projectCashFlows(input: ProjectionInput): CashFlowProjection {
  validateProjectionInput(input);

  const schedule = buildGrowthSchedule(input);
  const entries: CashFlowEntry[] = [];
  let cashFlow = input.baseCashFlow;
  let explicitPresentValue = 0;

  schedule.forEach((step, idx) => {
    const period = idx + 1;
    cashFlow = cashFlow * (1 + step.growthRate);
    const discountFactor = 1 / Math.pow(1 + input.discountRate, period);
    const presentValue = cashFlow / Math.pow(1 + input.discountRate, period);
    explicitPresentValue += presentValue;
    entries.push({
      period,
      phase: step.phase,
      growthRate: step.growthRate,
      cashFlow,
      discountFactor,
      presentValue,
    });
  });

  return {
    entries: Object.freeze(entries),
    horizonYears: entries.length,
    lastCashFlow: cashFlow,
    explicitPresentValue,
  };
}
