/**
 * Risk Engine — Sensitivity Grid
 *
 * Two parameters varied independently, everything else held at base.
 * Infeasible corners (e.g. terminal growth >= discount rate) become error
 * cells so a caller can render "N/A" without losing the rest of the grid.
 */

import { evaluateDcf, invalidParameter, isValuationError } from "@/lib/dcfEngine";
import type { ValuationParametersInput, VariableParameter } from "@/lib/dcfEngine";
import type {
  SensitivityCell,
  SensitivityGridOpts,
  SensitivityGridResult,
  SensitivityGridSummary,
} from "./types";

export const DEFAULT_DISCOUNT_RATE_RANGE: readonly number[] = [
  0.07, 0.08, 0.085, 0.09, 0.095, 0.1, 0.11,
];
export const DEFAULT_TERMINAL_GROWTH_RANGE: readonly number[] = [
  0.015, 0.02, 0.025, 0.03, 0.035,
];

function evaluateCell(
  base: ValuationParametersInput,
  overrides: Partial<Record<VariableParameter, number>>,
  failFast: boolean,
): SensitivityCell {
  try {
    const outcome = evaluateDcf({ ...base, ...overrides });
    return {
      status: "ok",
      perShareValue: outcome.perShareValue,
      terminalRatio: outcome.terminalRatio,
    };
  } catch (err) {
    if (!failFast && isValuationError(err, "InvalidParameter")) {
      return { status: "error", error: err.toDetail() };
    }
    throw err;
  }
}

function summarizeCells(cells: SensitivityCell[][]): SensitivityGridSummary | null {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  let feasible = 0;
  for (const row of cells) {
    for (const cell of row) {
      if (cell.status !== "ok") continue;
      feasible++;
      if (cell.perShareValue < min) min = cell.perShareValue;
      if (cell.perShareValue > max) max = cell.perShareValue;
    }
  }
  if (feasible === 0) return null;

  const centre = cells[Math.floor(cells.length / 2)]?.[Math.floor((cells[0]?.length ?? 0) / 2)];
  return {
    min,
    max,
    central: centre?.status === "ok" ? centre.perShareValue : null,
    range: max - min,
  };
}

/**
 * Evaluate the cross product of rowValues × columnValues.
 *
 * Row/column order is exactly the caller's; nothing is sorted.
 * Deterministic: identical inputs give an identical grid.
 */
export function computeSensitivityGrid(opts: SensitivityGridOpts): SensitivityGridResult {
  const { base, rowParameter, rowValues, columnParameter, columnValues } = opts;
  const failFast = opts.failFast ?? false;

  if (rowParameter === columnParameter) {
    throw invalidParameter("columnParameter", columnParameter, "must differ from rowParameter");
  }

  let infeasibleCount = 0;
  const cells = rowValues.map((rowValue) =>
    columnValues.map((columnValue) => {
      const overrides: Partial<Record<VariableParameter, number>> = {};
      overrides[rowParameter] = rowValue;
      overrides[columnParameter] = columnValue;
      const cell = evaluateCell(base, overrides, failFast);
      if (cell.status === "error") infeasibleCount++;
      return cell;
    }),
  );

  return {
    rowParameter,
    rowValues: [...rowValues],
    columnParameter,
    columnValues: [...columnValues],
    cells,
    infeasibleCount,
    summary: summarizeCells(cells),
  };
}

/** Per-share values with null at infeasible cells. */
export function toValueMatrix(grid: SensitivityGridResult): Array<Array<number | null>> {
  return grid.cells.map((row) =>
    row.map((cell) => (cell.status === "ok" ? cell.perShareValue : null)),
  );
}

/**
 * The standard discount rate × terminal growth table.
 */
export function discountRateVsTerminalGrowthGrid(
  base: ValuationParametersInput,
  ranges: { discountRates?: readonly number[]; terminalGrowthRates?: readonly number[] } = {},
): SensitivityGridResult {
  return computeSensitivityGrid({
    base,
    rowParameter: "discountRate",
    rowValues: ranges.discountRates ?? DEFAULT_DISCOUNT_RATE_RANGE,
    columnParameter: "terminalGrowthRate",
    columnValues: ranges.terminalGrowthRates ?? DEFAULT_TERMINAL_GROWTH_RANGE,
  });
}
