/**
 * Monte Carlo — Simulation
 *
 * 1. iterations >= minIterations (hard floor)
 * 2. factor the correlation matrix
 * 3. per draw: N(0, I) → L·z → marginals → merge onto base → evaluateDcf
 * 4. sort, summarize, bin
 *
 * Draws are planned as fixed-size work units, each with its own seeded
 * stream, so the sampled multiset depends only on (seed, iterations,
 * chunkSize). runMonteCarlo executes the units in sequence;
 * runMonteCarloAsync schedules them through p-limit and concatenates the
 * per-unit buffers afterwards. Both return the same result.
 */

import pLimit from "p-limit";

import {
  ValuationError,
  evaluateDcf,
  invalidParameter,
  isValuationError,
  parseValuationParameters,
} from "@/lib/dcfEngine";
import type { ValuationParameters } from "@/lib/dcfEngine";
import { resolveRiskConfig } from "../config";
import type { RiskEngineConfig } from "../config";
import type {
  DistributionMap,
  InterruptionCause,
  MonteCarloOpts,
  SimulationResult,
} from "../types";
import { SeededRandom, deriveStreamSeed } from "./random";
import { createCorrelatedSampler } from "./sampler";
import type { CorrelatedSampler } from "./sampler";
import { buildHistogram, sortAscending, summarize } from "./statistics";

/**
 * Used when a caller supplies no distributions: discount rate, phase-1
 * growth and terminal growth vary; everything else stays at base.
 */
export const DEFAULT_DCF_DISTRIBUTIONS: DistributionMap = Object.freeze<DistributionMap>({
  discountRate: { kind: "normal", mean: 0.09, stdDev: 0.01 },
  highGrowthRate: { kind: "normal", mean: 0.1, stdDev: 0.03 },
  terminalGrowthRate: { kind: "triangular", min: 0.015, mode: 0.025, max: 0.035 },
});

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

interface WorkUnit {
  index: number;
  size: number;
}

interface WorkUnitResult {
  values: number[];
  attempted: number;
  failed: number;
}

interface PreparedRun {
  base: ValuationParameters;
  sampler: CorrelatedSampler;
  units: WorkUnit[];
  seed: number;
  requestedIterations: number;
  histogramBins: number;
  config: RiskEngineConfig;
  signal?: AbortSignal;
  timeBudgetMs?: number;
  clock: () => number;
  startedAt: number;
}

function assertPositiveInteger(field: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw invalidParameter(field, value, "must be a positive whole number");
  }
}

function planUnits(iterations: number, chunkSize: number): WorkUnit[] {
  const units: WorkUnit[] = [];
  for (let offset = 0, index = 0; offset < iterations; offset += chunkSize, index++) {
    units.push({ index, size: Math.min(chunkSize, iterations - offset) });
  }
  return units;
}

function prepareRun(opts: MonteCarloOpts): PreparedRun {
  const config = resolveRiskConfig(opts.config);

  if (!Number.isInteger(opts.iterations) || opts.iterations < config.minIterations) {
    throw new ValuationError(
      "InsufficientIterations",
      `iterations must be a whole number >= ${config.minIterations} (got ${opts.iterations})`,
      { field: "iterations", value: opts.iterations, details: { minimum: config.minIterations } },
    );
  }

  const base = parseValuationParameters(opts.base);
  const sampler = createCorrelatedSampler(
    opts.distributions ?? DEFAULT_DCF_DISTRIBUTIONS,
    opts.correlation,
  );

  const chunkSize = opts.chunkSize ?? config.chunkSize;
  assertPositiveInteger("chunkSize", chunkSize);
  const histogramBins = opts.histogramBins ?? config.histogramBins;
  assertPositiveInteger("histogramBins", histogramBins);

  const seed = opts.seed ?? config.defaultSeed;
  if (!Number.isInteger(seed) || seed < 0) {
    throw invalidParameter("seed", seed, "must be a non-negative whole number");
  }
  if (opts.timeBudgetMs !== undefined && !(opts.timeBudgetMs > 0)) {
    throw invalidParameter("timeBudgetMs", opts.timeBudgetMs, "must be positive");
  }

  const clock = opts.clock ?? Date.now;
  return {
    base,
    sampler,
    units: planUnits(opts.iterations, chunkSize),
    seed,
    requestedIterations: opts.iterations,
    histogramBins,
    config,
    signal: opts.signal,
    timeBudgetMs: opts.timeBudgetMs,
    clock,
    startedAt: clock(),
  };
}

function checkInterruption(run: PreparedRun): InterruptionCause | undefined {
  if (run.signal?.aborted) return "aborted";
  if (run.timeBudgetMs !== undefined && run.clock() - run.startedAt >= run.timeBudgetMs) {
    return "timeBudget";
  }
  return undefined;
}

function runUnit(run: PreparedRun, unit: WorkUnit): WorkUnitResult {
  const random = new SeededRandom(deriveStreamSeed(run.seed, unit.index));
  const values: number[] = [];
  let failed = 0;

  for (let i = 0; i < unit.size; i++) {
    const draw = run.sampler.draw(random);
    try {
      values.push(evaluateDcf({ ...run.base, ...draw }).perShareValue);
    } catch (err) {
      // sampled parameters can land outside the model's domain (g >= r, flow <= 0)
      if (!isValuationError(err, "InvalidParameter")) throw err;
      failed++;
    }
  }

  return { values, attempted: unit.size, failed };
}

function finalize(
  run: PreparedRun,
  results: readonly WorkUnitResult[],
  interruptedBy: InterruptionCause | undefined,
): SimulationResult {
  const collected: number[] = [];
  let completedIterations = 0;
  let failedDraws = 0;
  for (const r of results) {
    for (const v of r.values) collected.push(v);
    completedIterations += r.attempted;
    failedDraws += r.failed;
  }

  const context = {
    requestedIterations: run.requestedIterations,
    completedIterations,
    failedDraws,
    validDraws: collected.length,
    interruptedBy,
  };

  if (collected.length < run.config.minIterations) {
    throw new ValuationError(
      "InsufficientIterations",
      `only ${collected.length} valid draws of ${run.requestedIterations} requested; ` +
        `at least ${run.config.minIterations} are required`,
      { field: "iterations", value: collected.length, details: context },
    );
  }

  if (interruptedBy !== undefined) {
    console.warn("[monteCarlo] simulation interrupted; result is partial", context);
  }
  if (failedDraws > 0) {
    console.warn("[monteCarlo] draws skipped for infeasible parameters", context);
  }

  const sorted = sortAscending(collected);
  const result: SimulationResult = {
    values: Object.freeze(sorted),
    statistics: summarize(sorted),
    histogram: buildHistogram(sorted, run.histogramBins),
    sampleSize: sorted.length,
    requestedIterations: run.requestedIterations,
    completedIterations,
    failedDraws,
    reducedSample: sorted.length < run.requestedIterations,
    partial: interruptedBy !== undefined,
    ...(interruptedBy !== undefined ? { interruptedBy } : {}),
    seed: run.seed,
    parameters: run.sampler.parameters,
  };
  return Object.freeze(result);
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Run the simulation on the calling thread.
 *
 * @throws ValuationError InsufficientIterations below the floor, including
 *         when an interruption or infeasible draws leave too few values
 * @throws ValuationError SingularCorrelationMatrix
 * @throws ValuationError InvalidParameter for bad base parameters or distributions
 */
export function runMonteCarlo(opts: MonteCarloOpts): SimulationResult {
  const run = prepareRun(opts);
  const results: WorkUnitResult[] = [];
  let interruptedBy: InterruptionCause | undefined;

  for (const unit of run.units) {
    interruptedBy = checkInterruption(run);
    if (interruptedBy !== undefined) break;
    results.push(runUnit(run, unit));
  }

  return finalize(run, results, interruptedBy);
}

/**
 * Same contract as runMonteCarlo, with work units scheduled through p-limit
 * and the event loop released between units so a time budget or abort
 * signal can take effect.
 */
export async function runMonteCarloAsync(opts: MonteCarloOpts): Promise<SimulationResult> {
  const run = prepareRun(opts);
  const concurrency = opts.concurrency ?? run.config.concurrency;
  assertPositiveInteger("concurrency", concurrency);

  const limit = pLimit(concurrency);
  let interruptedBy: InterruptionCause | undefined;

  const settled = await Promise.all(
    run.units.map((unit) =>
      limit(async () => {
        await yieldToEventLoop();
        if (interruptedBy === undefined) interruptedBy = checkInterruption(run);
        if (interruptedBy !== undefined) return null;
        return runUnit(run, unit);
      }),
    ),
  );

  const results = settled.filter((r): r is WorkUnitResult => r !== null);
  return finalize(run, results, interruptedBy);
}
