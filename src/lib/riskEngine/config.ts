/**
 * Risk Engine — Configuration
 *
 * SINGLE SOURCE OF TRUTH for risk-layer defaults. Nothing in the core reads
 * process.env; a calling layer passes overrides explicitly.
 */
import { z } from "zod";

/** Monte Carlo sample-size floor. Config may raise it, never lower it. */
export const MIN_ITERATIONS = 10_000;

export const RiskEngineConfigSchema = z.object({
  minIterations: z
    .number()
    .int()
    .min(MIN_ITERATIONS, `must be >= ${MIN_ITERATIONS}`)
    .default(MIN_ITERATIONS),
  histogramBins: z.number().int().min(1).max(1_000).default(20),
  /** |Σ scenario probabilities - 1| allowed */
  probabilityTolerance: z.number().positive().max(0.01).default(1e-6),
  /** Conventional terminal-reliance flag; reported, never enforced by the engine */
  terminalRelianceThreshold: z.number().gt(0).max(1).default(0.8),
  /** Draws per Monte Carlo work unit */
  chunkSize: z.number().int().positive().default(2_500),
  /** Concurrent work units for runMonteCarloAsync */
  concurrency: z.number().int().positive().max(64).default(4),
  defaultSeed: z.number().int().nonnegative().default(42),
});

export type RiskEngineConfig = z.output<typeof RiskEngineConfigSchema>;
export type RiskEngineConfigInput = z.input<typeof RiskEngineConfigSchema>;

export const DEFAULT_RISK_CONFIG: RiskEngineConfig = RiskEngineConfigSchema.parse({});

export function resolveRiskConfig(overrides?: RiskEngineConfigInput): RiskEngineConfig {
  if (!overrides) return DEFAULT_RISK_CONFIG;
  const parsed = RiskEngineConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error("[riskConfig] Invalid risk engine config:", parsed.error.flatten().fieldErrors);
    throw new Error("Invalid risk engine config (see logs).");
  }
  return parsed.data;
}
