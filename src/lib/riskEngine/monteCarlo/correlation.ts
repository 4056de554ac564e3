/**
 * Monte Carlo — Correlation
 *
 * Builds the symmetric unit-diagonal correlation matrix from parameter
 * pairs and factors it (Cholesky, L·Lᵀ = Σ). Positive semi-definite input
 * is accepted, including perfectly correlated pairs; anything else is a
 * construction-time SingularCorrelationMatrix error, never a clamp.
 */

import { ValuationError, invalidParameter } from "@/lib/dcfEngine";
import type { VariableParameter } from "@/lib/dcfEngine";
import type { CorrelationMatrix, CorrelationPair } from "../types";

const PSD_TOLERANCE = 1e-10;
const SYMMETRY_TOLERANCE = 1e-12;

// ---------------------------------------------------------------------------
// Cholesky
// ---------------------------------------------------------------------------

/**
 * Lower-triangular Cholesky factor of a symmetric PSD matrix.
 *
 * A zero pivot (rank-deficient but PSD) yields a zero column, provided the
 * entries below it are zero too; a negative pivot means not PSD.
 *
 * @throws ValuationError SingularCorrelationMatrix
 */
export function choleskyDecompose(
  matrix: readonly (readonly number[])[],
  names: readonly string[] = [],
): number[][] {
  const n = matrix.length;
  const lower: number[][] = Array.from({ length: n }, () => new Array<number>(n).fill(0));

  for (let j = 0; j < n; j++) {
    let pivot = matrix[j][j];
    for (let k = 0; k < j; k++) pivot -= lower[j][k] * lower[j][k];

    if (pivot < -PSD_TOLERANCE) {
      throw new ValuationError(
        "SingularCorrelationMatrix",
        `correlation matrix is not positive semi-definite (pivot ${pivot} at ${names[j] ?? j})`,
        { field: "correlation", value: pivot, details: { index: j, parameter: names[j] } },
      );
    }

    const diag = pivot > PSD_TOLERANCE ? Math.sqrt(pivot) : 0;
    lower[j][j] = diag;

    for (let i = j + 1; i < n; i++) {
      let sum = matrix[i][j];
      for (let k = 0; k < j; k++) sum -= lower[i][k] * lower[j][k];

      if (diag === 0) {
        if (Math.abs(sum) > PSD_TOLERANCE) {
          throw new ValuationError(
            "SingularCorrelationMatrix",
            `correlation matrix is not positive semi-definite (${names[i] ?? i} vs ${names[j] ?? j})`,
            { field: "correlation", value: sum, details: { row: i, column: j } },
          );
        }
        lower[i][j] = 0;
      } else {
        lower[i][j] = sum / diag;
      }
    }
  }

  return lower;
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

function assertUniqueNames(names: readonly VariableParameter[]): void {
  if (names.length === 0) {
    throw invalidParameter("correlation.names", names, "must name at least one parameter");
  }
  if (new Set(names).size !== names.length) {
    throw invalidParameter("correlation.names", names, "must not repeat a parameter");
  }
}

function assertCoefficient(field: string, rho: number): void {
  if (!Number.isFinite(rho) || rho < -1 || rho > 1) {
    throw invalidParameter(field, rho, "must be a correlation coefficient in [-1, 1]");
  }
}

/**
 * Correlation matrix over `names`, identity except for the given pairs.
 */
export function createCorrelationMatrix(
  names: readonly VariableParameter[],
  pairs: readonly CorrelationPair[],
): CorrelationMatrix {
  assertUniqueNames(names);
  const index = new Map(names.map((name, i) => [name, i] as const));
  const values: number[][] = names.map((_, i) => names.map((__, j) => (i === j ? 1 : 0)));
  const assigned = new Map<string, number>();

  pairs.forEach((pair, p) => {
    const [a, b] = pair.between;
    const field = `correlation.pairs[${p}]`;
    const i = index.get(a);
    const j = index.get(b);
    if (i === undefined) throw invalidParameter(`${field}.between`, a, "is not a correlated parameter");
    if (j === undefined) throw invalidParameter(`${field}.between`, b, "is not a correlated parameter");
    assertCoefficient(`${field}.rho`, pair.rho);

    if (i === j) {
      if (pair.rho !== 1) throw invalidParameter(`${field}.rho`, pair.rho, "must be 1 on the diagonal");
      return;
    }

    const key = i < j ? `${i}:${j}` : `${j}:${i}`;
    const previous = assigned.get(key);
    if (previous !== undefined && previous !== pair.rho) {
      throw invalidParameter(`${field}.rho`, pair.rho, `conflicts with earlier value ${previous}`);
    }
    assigned.set(key, pair.rho);
    values[i][j] = pair.rho;
    values[j][i] = pair.rho;
  });

  return { names: [...names], values, cholesky: choleskyDecompose(values, names) };
}

/**
 * Correlation matrix from a full square array.
 */
export function createCorrelationMatrixFromValues(
  names: readonly VariableParameter[],
  values: readonly (readonly number[])[],
): CorrelationMatrix {
  assertUniqueNames(names);
  const n = names.length;
  if (values.length !== n || values.some((row) => row.length !== n)) {
    throw invalidParameter("correlation.values", values, `must be a ${n}x${n} matrix`);
  }

  for (let i = 0; i < n; i++) {
    if (values[i][i] !== 1) {
      throw invalidParameter(`correlation.values[${i}][${i}]`, values[i][i], "must be 1");
    }
    for (let j = 0; j < i; j++) {
      assertCoefficient(`correlation.values[${i}][${j}]`, values[i][j]);
      if (Math.abs(values[i][j] - values[j][i]) > SYMMETRY_TOLERANCE) {
        throw invalidParameter(
          `correlation.values[${j}][${i}]`,
          values[j][i],
          `must equal values[${i}][${j}] (${values[i][j]})`,
        );
      }
    }
  }

  const copy = values.map((row) => [...row]);
  return { names: [...names], values: copy, cholesky: choleskyDecompose(copy, names) };
}

/**
 * Cholesky factor over the varied parameters, in their order. Parameters
 * the matrix does not mention are independent of everything else.
 */
export function expandCorrelation(
  correlation: CorrelationMatrix | undefined,
  parameters: readonly VariableParameter[],
): number[][] {
  const n = parameters.length;
  const full: number[][] = parameters.map((_, i) => parameters.map((__, j) => (i === j ? 1 : 0)));
  if (!correlation) return full;

  const position = new Map(parameters.map((name, i) => [name, i] as const));
  const mapped = correlation.names.map((name) => {
    const at = position.get(name);
    if (at === undefined) {
      throw invalidParameter("correlation.names", name, "has no distribution to correlate");
    }
    return at;
  });

  for (let a = 0; a < mapped.length; a++) {
    for (let b = 0; b < mapped.length; b++) {
      full[mapped[a]][mapped[b]] = correlation.values[a][b];
    }
  }

  return n === 0 ? [] : choleskyDecompose(full, parameters);
}
