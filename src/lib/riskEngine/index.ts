/**
 * Risk Engine — Public API
 *
 * Sensitivity, scenarios and Monte Carlo over evaluateDcf().
 */

// Re-export types
export type {
  CorrelationMatrix,
  CorrelationPair,
  DistributionMap,
  DistributionSpec,
  HistogramBin,
  InterruptionCause,
  MonteCarloOpts,
  ScenarioAnalysis,
  ScenarioDefinition,
  ScenarioValue,
  SensitivityCell,
  SensitivityGridOpts,
  SensitivityGridResult,
  SensitivityGridSummary,
  SimulationResult,
  StandardScenarioOpts,
  SummaryStatistics,
} from "./types";
export type { RiskEngineConfig, RiskEngineConfigInput } from "./config";
export type { CorrelatedSampler, ParameterDraw } from "./monteCarlo/sampler";

// Re-export sub-modules
export {
  DEFAULT_RISK_CONFIG,
  MIN_ITERATIONS,
  RiskEngineConfigSchema,
  resolveRiskConfig,
} from "./config";
export {
  DEFAULT_DISCOUNT_RATE_RANGE,
  DEFAULT_TERMINAL_GROWTH_RANGE,
  computeSensitivityGrid,
  discountRateVsTerminalGrowthGrid,
  toValueMatrix,
} from "./sensitivityGrid";
export {
  STANDARD_SCENARIO_PROBABILITIES,
  createStandardScenarios,
  evaluateScenarios,
} from "./scenarioEngine";
export {
  SeededRandom,
  deriveStreamSeed,
  inverseStandardNormalCdf,
  standardNormalCdf,
} from "./monteCarlo/random";
export {
  DistributionSpecSchema,
  distributionMean,
  fromStandardNormal,
  parseDistributionSpec,
  quantile,
} from "./monteCarlo/distributions";
export {
  choleskyDecompose,
  createCorrelationMatrix,
  createCorrelationMatrixFromValues,
  expandCorrelation,
} from "./monteCarlo/correlation";
export { createCorrelatedSampler } from "./monteCarlo/sampler";
export { buildHistogram, percentile, sortAscending, summarize } from "./monteCarlo/statistics";
export {
  DEFAULT_DCF_DISTRIBUTIONS,
  runMonteCarlo,
  runMonteCarloAsync,
} from "./monteCarlo/simulate";
