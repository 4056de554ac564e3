/**
 * Risk Engine — Types
 *
 * Sensitivity grids, probability-weighted scenarios and correlated
 * Monte Carlo over the DCF engine. Every technique goes through
 * evaluateDcf(); none re-implements the valuation.
 */

import type {
  TerminalRelianceAssessment,
  ValuationErrorDetail,
  ValuationOutcome,
  ValuationParametersInput,
  VariableParameter,
} from "@/lib/dcfEngine";
import type { RiskEngineConfigInput } from "./config";

// ---------------------------------------------------------------------------
// Sensitivity
// ---------------------------------------------------------------------------

export type SensitivityCell =
  | { status: "ok"; perShareValue: number; terminalRatio: number }
  | { status: "error"; error: ValuationErrorDetail };

export interface SensitivityGridOpts {
  base: ValuationParametersInput;
  rowParameter: VariableParameter;
  rowValues: readonly number[];
  columnParameter: VariableParameter;
  columnValues: readonly number[];
  /** Raise the first infeasible cell instead of isolating it. Default false. */
  failFast?: boolean;
}

/** Over feasible cells only */
export interface SensitivityGridSummary {
  min: number;
  max: number;
  /** Cell at (floor(rows / 2), floor(columns / 2)); null when that cell is infeasible */
  central: number | null;
  /** max - min */
  range: number;
}

export interface SensitivityGridResult {
  rowParameter: VariableParameter;
  rowValues: readonly number[];
  columnParameter: VariableParameter;
  columnValues: readonly number[];
  /** cells[i][j] ↔ (rowValues[i], columnValues[j]) */
  cells: SensitivityCell[][];
  infeasibleCount: number;
  /** null when no cell is feasible */
  summary: SensitivityGridSummary | null;
}

// ---------------------------------------------------------------------------
// Scenarios
// ---------------------------------------------------------------------------

export interface ScenarioDefinition {
  name: string;
  /** (0, 1] */
  probability: number;
  overrides: Partial<ValuationParametersInput>;
}

export interface ScenarioValue {
  name: string;
  probability: number;
  perShareValue: number;
  /** probability * perShareValue */
  weightedValue: number;
  /** At config.terminalRelianceThreshold */
  terminalReliance: TerminalRelianceAssessment;
  outcome: ValuationOutcome;
}

export interface StandardScenarioOpts {
  /** Best case scales baseCashFlow by (1 + upside). Default 0.30 */
  upside?: number;
  /** Worst case scales baseCashFlow by (1 - downside). Default 0.25 */
  downside?: number;
  /** Defaults 0.20 / 0.55 / 0.25 */
  probabilities?: { best: number; base: number; worst: number };
  /** Replace the default cash-flow scaling of a case */
  bestOverrides?: Partial<ValuationParametersInput>;
  worstOverrides?: Partial<ValuationParametersInput>;
}

export interface ScenarioAnalysis {
  scenarios: ScenarioValue[];
  expectedValue: number;
  probabilitySum: number;
  range: { low: number; high: number };
}

// ---------------------------------------------------------------------------
// Distributions
// ---------------------------------------------------------------------------

export type DistributionSpec =
  | { kind: "normal"; mean: number; stdDev: number }
  | { kind: "triangular"; min: number; mode: number; max: number }
  | { kind: "uniform"; min: number; max: number }
  | { kind: "lognormal"; mu: number; sigma: number };

export type DistributionMap = Partial<Record<VariableParameter, DistributionSpec>>;

// ---------------------------------------------------------------------------
// Correlation
// ---------------------------------------------------------------------------

export interface CorrelationPair {
  between: readonly [VariableParameter, VariableParameter];
  rho: number;
}

export interface CorrelationMatrix {
  names: readonly VariableParameter[];
  /** Symmetric, unit diagonal */
  values: readonly (readonly number[])[];
  /** Lower-triangular L with L·Lᵀ = values */
  cholesky: readonly (readonly number[])[];
}

// ---------------------------------------------------------------------------
// Monte Carlo
// ---------------------------------------------------------------------------

export interface MonteCarloOpts {
  base: ValuationParametersInput;
  /** Defaults to DEFAULT_DCF_DISTRIBUTIONS */
  distributions?: DistributionMap;
  correlation?: CorrelationMatrix;
  iterations: number;
  seed?: number;
  /** Stop scheduling new draws once this much clock time has elapsed */
  timeBudgetMs?: number;
  signal?: AbortSignal;
  /** Draws per work unit; defaults to config.chunkSize */
  chunkSize?: number;
  histogramBins?: number;
  /** Async mode only */
  concurrency?: number;
  /** Milliseconds; defaults to Date.now */
  clock?: () => number;
  config?: RiskEngineConfigInput;
}

export interface HistogramBin {
  lower: number;
  upper: number;
  count: number;
}

export interface SummaryStatistics {
  mean: number;
  median: number;
  /** Population standard deviation */
  stdDev: number;
  min: number;
  max: number;
  p5: number;
  p10: number;
  p25: number;
  p75: number;
  p90: number;
  p95: number;
  confidence90: readonly [number, number];
  confidence50: readonly [number, number];
  probabilityNegative: number;
}

export type InterruptionCause = "timeBudget" | "aborted";

export interface SimulationResult {
  /** Sorted ascending, frozen */
  values: readonly number[];
  statistics: SummaryStatistics;
  histogram: readonly HistogramBin[];
  /** values.length */
  sampleSize: number;
  requestedIterations: number;
  /** Draws attempted before completion or interruption */
  completedIterations: number;
  /** Draws whose sampled parameters were infeasible; excluded from values */
  failedDraws: number;
  /** sampleSize < requestedIterations, from interruption or infeasible draws */
  reducedSample: boolean;
  /** Stopped early by time budget or abort */
  partial: boolean;
  interruptedBy?: InterruptionCause;
  seed: number;
  parameters: readonly VariableParameter[];
}
