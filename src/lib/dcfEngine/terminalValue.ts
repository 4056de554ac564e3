/**
 * DCF Engine — Terminal Value
 *
 * Gordon growth:   TV = FCF_last * (1 + g) / (r - g)          requires g < r
 *   with ROIC:     TV = FCF_last * (1 + g) * (1 - g/ROIC) / (r - g)
 * Exit multiple:   TV = terminalMetric * multiple             no rate constraint
 *
 * Both discount to today over the explicit horizon: TV / (1 + r)^n.
 */

import { invalidParameter } from "./errors";
import type { TerminalRelianceAssessment, TerminalValueResult } from "./types";

function discount(value: number, discountRate: number, horizonYears: number): number {
  return value / Math.pow(1 + discountRate, horizonYears);
}

export function computeGordonTerminalValue(args: {
  lastCashFlow: number;
  terminalGrowthRate: number;
  discountRate: number;
  horizonYears: number;
  stableRoic?: number;
}): TerminalValueResult {
  const { lastCashFlow, terminalGrowthRate: g, discountRate: r, horizonYears, stableRoic } = args;

  if (!Number.isFinite(g) || !Number.isFinite(r)) {
    throw invalidParameter("terminalGrowthRate", g, "and discountRate must be finite");
  }
  if (g >= r) {
    throw invalidParameter(
      "terminalGrowthRate",
      g,
      `must be below discountRate (${r}); the perpetuity diverges otherwise`,
    );
  }
  if (stableRoic !== undefined && (!Number.isFinite(stableRoic) || stableRoic <= 0)) {
    throw invalidParameter("terminalValue.stableRoic", stableRoic, "must be finite and positive");
  }

  const reinvestmentRate = stableRoic !== undefined ? g / stableRoic : undefined;
  const terminalCashFlow = lastCashFlow * (1 + g) * (1 - (reinvestmentRate ?? 0));
  const nominalValue =
    reinvestmentRate === undefined
      ? (lastCashFlow * (1 + g)) / (r - g)
      : terminalCashFlow / (r - g);

  return {
    method: "gordon",
    nominalValue,
    presentValue: discount(nominalValue, r, horizonYears),
    terminalCashFlow,
    ...(reinvestmentRate !== undefined ? { reinvestmentRate } : {}),
  };
}

export function computeExitMultipleTerminalValue(args: {
  terminalMetric: number;
  multiple: number;
  discountRate: number;
  horizonYears: number;
}): TerminalValueResult {
  if (!Number.isFinite(args.terminalMetric) || args.terminalMetric <= 0) {
    throw invalidParameter(
      "terminalValue.terminalMetric",
      args.terminalMetric,
      "must be finite and positive",
    );
  }
  if (!Number.isFinite(args.multiple) || args.multiple <= 0) {
    throw invalidParameter("terminalValue.multiple", args.multiple, "must be finite and positive");
  }

  const nominalValue = args.terminalMetric * args.multiple;
  return {
    method: "exitMultiple",
    nominalValue,
    presentValue: discount(nominalValue, args.discountRate, args.horizonYears),
  };
}

/**
 * Flag heavy reliance on the terminal estimate. The engine only reports the
 * ratio; the threshold is the caller's call (0.80 by convention).
 */
export function assessTerminalReliance(
  terminalRatio: number,
  threshold: number,
): TerminalRelianceAssessment {
  return { terminalRatio, threshold, excessive: terminalRatio > threshold };
}
