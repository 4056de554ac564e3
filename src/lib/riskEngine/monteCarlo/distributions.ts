/**
 * Monte Carlo — Marginal Distributions
 *
 * Closed union: normal / triangular / uniform / lognormal. Each variant maps
 * a standard-normal draw (sampling path) or a standard-uniform draw (inverse
 * CDF) to a parameter value. Zero-variance variants are legal and return
 * their single value exactly.
 */
import { z } from "zod";

import { fromZodError } from "@/lib/dcfEngine";
import type { DistributionSpec } from "../types";
import { inverseStandardNormalCdf, standardNormalCdf } from "./random";

const finite = () => z.number().finite();

export const DistributionSpecSchema = z
  .discriminatedUnion("kind", [
    z.object({ kind: z.literal("normal"), mean: finite(), stdDev: finite().nonnegative() }),
    z.object({ kind: z.literal("triangular"), min: finite(), mode: finite(), max: finite() }),
    z.object({ kind: z.literal("uniform"), min: finite(), max: finite() }),
    z.object({ kind: z.literal("lognormal"), mu: finite(), sigma: finite().nonnegative() }),
  ])
  .superRefine((d, ctx) => {
    if (d.kind === "triangular" && !(d.min <= d.mode && d.mode <= d.max)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["mode"],
        message: "triangular requires min <= mode <= max",
      });
    }
    if (d.kind === "uniform" && d.min > d.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["max"],
        message: "uniform requires min <= max",
      });
    }
  });

export function parseDistributionSpec(input: unknown, field: string): DistributionSpec {
  const parsed = DistributionSpecSchema.safeParse(input);
  if (!parsed.success) throw fromZodError(parsed.error, input, field);
  return parsed.data;
}

function triangularQuantile(min: number, mode: number, max: number, u: number): number {
  if (max === min) return min;
  const span = max - min;
  const split = (mode - min) / span;
  if (u < split) return min + Math.sqrt(u * span * (mode - min));
  return max - Math.sqrt((1 - u) * span * (max - mode));
}

/**
 * Inverse CDF at u ∈ [0, 1].
 */
export function quantile(spec: DistributionSpec, u: number): number {
  switch (spec.kind) {
    case "normal":
      return spec.stdDev === 0 ? spec.mean : spec.mean + spec.stdDev * inverseStandardNormalCdf(u);
    case "lognormal":
      return spec.sigma === 0
        ? Math.exp(spec.mu)
        : Math.exp(spec.mu + spec.sigma * inverseStandardNormalCdf(u));
    case "uniform":
      return spec.min + (spec.max - spec.min) * u;
    case "triangular":
      return triangularQuantile(spec.min, spec.mode, spec.max, u);
    default: {
      const unreachable: never = spec;
      return unreachable;
    }
  }
}

/**
 * Map a (possibly correlated) standard-normal draw to the marginal.
 * Normal and lognormal use z directly; bounded shapes go through Φ(z).
 */
export function fromStandardNormal(spec: DistributionSpec, z: number): number {
  switch (spec.kind) {
    case "normal":
      return spec.mean + spec.stdDev * z;
    case "lognormal":
      return Math.exp(spec.mu + spec.sigma * z);
    case "uniform":
    case "triangular":
      return quantile(spec, standardNormalCdf(z));
    default: {
      const unreachable: never = spec;
      return unreachable;
    }
  }
}

/** Closed-form mean, for diagnostics and tests. */
export function distributionMean(spec: DistributionSpec): number {
  switch (spec.kind) {
    case "normal":
      return spec.mean;
    case "lognormal":
      return Math.exp(spec.mu + (spec.sigma * spec.sigma) / 2);
    case "uniform":
      return (spec.min + spec.max) / 2;
    case "triangular":
      return (spec.min + spec.mode + spec.max) / 3;
    default: {
      const unreachable: never = spec;
      return unreachable;
    }
  }
}
