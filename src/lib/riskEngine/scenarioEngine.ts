/**
 * Risk Engine — Scenario Engine
 *
 * Named override sets (bear / base / bull …) weighted by probability.
 * expectedValue = Σ probability_i * perShareValue_i
 *
 * Fail-fast: a scenario that cannot be valued aborts the analysis.
 */

import {
  ValuationError,
  assessTerminalReliance,
  evaluateDcf,
  invalidParameter,
} from "@/lib/dcfEngine";
import type { ValuationParametersInput } from "@/lib/dcfEngine";
import { resolveRiskConfig } from "./config";
import type { RiskEngineConfigInput } from "./config";
import type {
  ScenarioAnalysis,
  ScenarioDefinition,
  ScenarioValue,
  StandardScenarioOpts,
} from "./types";

export const STANDARD_SCENARIO_PROBABILITIES = { best: 0.2, base: 0.55, worst: 0.25 } as const;

function validateScenarios(scenarios: readonly ScenarioDefinition[], tolerance: number): number {
  if (scenarios.length === 0) {
    throw invalidParameter("scenarios", scenarios, "must contain at least one scenario");
  }

  const seen = new Set<string>();
  let probabilitySum = 0;
  scenarios.forEach((s, idx) => {
    if (!Number.isFinite(s.probability) || s.probability <= 0 || s.probability > 1) {
      throw invalidParameter(`scenarios[${idx}].probability`, s.probability, "must be in (0, 1]");
    }
    if (seen.has(s.name)) {
      throw invalidParameter(`scenarios[${idx}].name`, s.name, "must be unique");
    }
    seen.add(s.name);
    probabilitySum += s.probability;
  });

  if (Math.abs(probabilitySum - 1) > tolerance) {
    throw new ValuationError(
      "InconsistentProbabilities",
      `scenario probabilities sum to ${probabilitySum}, expected 1 (±${tolerance})`,
      {
        field: "scenarios",
        value: probabilitySum,
        details: { probabilities: scenarios.map((s) => s.probability) },
      },
    );
  }

  return probabilitySum;
}

/**
 * Value every scenario and aggregate by probability.
 *
 * @throws ValuationError InconsistentProbabilities when Σp ≠ 1 within tolerance
 * @throws ValuationError InvalidParameter for bad probabilities or overrides
 */
export function evaluateScenarios(
  base: ValuationParametersInput,
  scenarios: readonly ScenarioDefinition[],
  config?: RiskEngineConfigInput,
): ScenarioAnalysis {
  const { probabilityTolerance, terminalRelianceThreshold } = resolveRiskConfig(config);
  const probabilitySum = validateScenarios(scenarios, probabilityTolerance);

  const values: ScenarioValue[] = scenarios.map((s) => {
    const outcome = evaluateDcf({ ...base, ...s.overrides });
    return {
      name: s.name,
      probability: s.probability,
      perShareValue: outcome.perShareValue,
      weightedValue: s.probability * outcome.perShareValue,
      terminalReliance: assessTerminalReliance(outcome.terminalRatio, terminalRelianceThreshold),
      outcome,
    };
  });

  let expectedValue = 0;
  for (const v of values) expectedValue += v.weightedValue;

  const perShare = values.map((v) => v.perShareValue);

  return {
    scenarios: values,
    expectedValue,
    probabilitySum,
    range: { low: Math.min(...perShare), high: Math.max(...perShare) },
  };
}

/**
 * Best / base / worst set. By default the best and worst cases scale the
 * base cash flow, which scales the discounted total by the same factor.
 *
 * @throws ValuationError InvalidParameter for upside < 0 or downside outside [0, 1)
 */
export function createStandardScenarios(
  base: ValuationParametersInput,
  opts: StandardScenarioOpts = {},
): ScenarioDefinition[] {
  const upside = opts.upside ?? 0.3;
  const downside = opts.downside ?? 0.25;
  if (!Number.isFinite(upside) || upside < 0) {
    throw invalidParameter("upside", upside, "must be >= 0");
  }
  if (!Number.isFinite(downside) || downside < 0 || downside >= 1) {
    throw invalidParameter("downside", downside, "must be in [0, 1)");
  }

  const probabilities = opts.probabilities ?? STANDARD_SCENARIO_PROBABILITIES;
  return [
    {
      name: "Best Case",
      probability: probabilities.best,
      overrides: opts.bestOverrides ?? { baseCashFlow: base.baseCashFlow * (1 + upside) },
    },
    { name: "Base Case", probability: probabilities.base, overrides: {} },
    {
      name: "Worst Case",
      probability: probabilities.worst,
      overrides: opts.worstOverrides ?? { baseCashFlow: base.baseCashFlow * (1 - downside) },
    },
  ];
}
