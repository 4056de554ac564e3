/**
 * DCF Engine — Zod Schemas
 *
 * ValuationParameters are validated exactly once, here. Everything
 * downstream takes the parsed value at face value.
 */
import { z } from "zod";

import { fromZodError } from "./errors";
import type { ValuationParameters } from "./types";

const finite = () => z.number().finite();

/** Growth rates below -100% would flip the sign of every later flow. */
const growthRate = () => finite().gt(-1, "must be greater than -1");

const yearCount = () => z.number().int("must be a whole number of years").min(0, "must be >= 0");

export const TerminalValueMethodSchema = z.discriminatedUnion("method", [
  z.object({
    method: z.literal("gordon"),
    stableRoic: finite().positive().optional(),
  }),
  z.object({
    method: z.literal("exitMultiple"),
    multiple: finite().positive(),
    terminalMetric: finite().positive(),
  }),
]);

export const ValuationParametersSchema = z
  .object({
    baseCashFlow: finite().positive(),
    discountRate: finite().positive(),
    highGrowthRate: growthRate(),
    highGrowthYears: yearCount(),
    transitionYears: yearCount(),
    terminalGrowthRate: growthRate(),
    netDebt: finite(),
    shareCount: z.number().int("must be a whole number of shares").positive(),
    cashFlowBasis: z.enum(["FCFF", "FCFE"]).default("FCFF"),
    terminalValue: TerminalValueMethodSchema.default({ method: "gordon" }),
  })
  .superRefine((p, ctx) => {
    if (p.terminalValue.method === "gordon" && p.terminalGrowthRate >= p.discountRate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["terminalGrowthRate"],
        message: `must be below discountRate (${p.discountRate}) for a Gordon terminal value`,
      });
    }
  });

/** Caller-facing shape: basis and terminal method may be omitted. */
export type ValuationParametersInput = z.input<typeof ValuationParametersSchema>;

/**
 * Validate raw parameters.
 *
 * @throws ValuationError InvalidParameter naming the first failing field
 */
export function parseValuationParameters(input: unknown): ValuationParameters {
  const parsed = ValuationParametersSchema.safeParse(input);
  if (!parsed.success) {
    throw fromZodError(parsed.error, input);
  }
  return parsed.data;
}
