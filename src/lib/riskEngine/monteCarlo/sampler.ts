/**
 * Monte Carlo — Correlated Sampler
 *
 * z ~ N(0, I) per varied parameter → L·z → marginal transform.
 * Gaussian copula: normal marginals carry the target correlation exactly,
 * bounded marginals carry it through Φ.
 */

import { invalidParameter, VARIABLE_PARAMETERS } from "@/lib/dcfEngine";
import type { VariableParameter } from "@/lib/dcfEngine";
import type { CorrelationMatrix, DistributionMap, DistributionSpec } from "../types";
import { expandCorrelation } from "./correlation";
import { fromStandardNormal, parseDistributionSpec } from "./distributions";
import type { SeededRandom } from "./random";

export type ParameterDraw = Partial<Record<VariableParameter, number>>;

export interface CorrelatedSampler {
  /** Varied parameters, in sampling order */
  parameters: readonly VariableParameter[];
  draw(random: SeededRandom): ParameterDraw;
}

/**
 * Validate distributions, factor the correlation, and return a draw function.
 * Validation and factoring happen here, once, not per draw.
 *
 * @throws ValuationError InvalidParameter for bad distributions
 * @throws ValuationError SingularCorrelationMatrix
 */
export function createCorrelatedSampler(
  distributions: DistributionMap,
  correlation?: CorrelationMatrix,
): CorrelatedSampler {
  const parameters: VariableParameter[] = [];
  const specs: DistributionSpec[] = [];

  for (const name of VARIABLE_PARAMETERS) {
    const raw = distributions[name];
    if (raw === undefined) continue;
    parameters.push(name);
    specs.push(parseDistributionSpec(raw, `distributions.${name}`));
  }

  const unknown = Object.keys(distributions).filter(
    (key) => !parameters.some((name) => name === key),
  );
  if (unknown.length > 0) {
    throw invalidParameter("distributions", unknown, "names parameters that cannot be varied");
  }
  if (parameters.length === 0) {
    throw invalidParameter("distributions", distributions, "must vary at least one parameter");
  }

  const lower = expandCorrelation(correlation, parameters);
  const n = parameters.length;

  return {
    parameters,
    draw(random: SeededRandom): ParameterDraw {
      const independent: number[] = [];
      for (let i = 0; i < n; i++) independent.push(random.nextNormal());

      const out: ParameterDraw = {};
      for (let i = 0; i < n; i++) {
        let correlated = 0;
        for (let k = 0; k <= i; k++) correlated += lower[i][k] * independent[k];
        out[parameters[i]] = fromStandardNormal(specs[i], correlated);
      }
      return out;
    },
  };
}
