/**
 * DCF Engine — Errors
 *
 * One error class for the whole valuation core. The code says which
 * invariant failed; field/value say where, so callers can render a precise
 * message without parsing strings.
 */

import type { ZodError } from "zod";

export type ValuationErrorCode =
  | "InvalidParameter"
  | "InconsistentProbabilities"
  | "InsufficientIterations"
  | "SingularCorrelationMatrix";

/** Plain-data view of a ValuationError (used for grid cells). */
export interface ValuationErrorDetail {
  code: ValuationErrorCode;
  message: string;
  field?: string;
  value?: unknown;
}

export class ValuationError extends Error {
  readonly code: ValuationErrorCode;
  readonly field?: string;
  readonly value?: unknown;
  readonly details: Record<string, unknown>;

  constructor(
    code: ValuationErrorCode,
    message: string,
    opts: { field?: string; value?: unknown; details?: Record<string, unknown> } = {},
  ) {
    super(`${code}: ${message}`);
    this.name = "ValuationError";
    this.code = code;
    this.field = opts.field;
    this.value = opts.value;
    this.details = opts.details ?? {};
  }

  toDetail(): ValuationErrorDetail {
    return {
      code: this.code,
      message: this.message,
      ...(this.field !== undefined ? { field: this.field } : {}),
      ...(this.value !== undefined ? { value: this.value } : {}),
    };
  }
}

export function isValuationError(
  err: unknown,
  code?: ValuationErrorCode,
): err is ValuationError {
  return err instanceof ValuationError && (code === undefined || err.code === code);
}

export function invalidParameter(field: string, value: unknown, reason: string): ValuationError {
  return new ValuationError(
    "InvalidParameter",
    `${field} ${reason} (got ${formatValue(value)})`,
    { field, value },
  );
}

function formatValue(value: unknown): string {
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (value === undefined) return "undefined";
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

// ---------------------------------------------------------------------------
// Zod bridge
// ---------------------------------------------------------------------------

function valueAtPath(input: unknown, path: ReadonlyArray<string | number>): unknown {
  let cursor: unknown = input;
  for (const key of path) {
    if (cursor === null || typeof cursor !== "object") return undefined;
    cursor = Reflect.get(cursor, key);
  }
  return cursor;
}

/**
 * Map the first zod issue to InvalidParameter, naming the failing path and
 * the value actually received.
 */
export function fromZodError(error: ZodError, input: unknown, prefix?: string): ValuationError {
  const issue = error.issues[0];
  const path = issue?.path ?? [];
  const joined = path.map(String).join(".");
  const field = prefix ? (joined ? `${prefix}.${joined}` : prefix) : joined || "input";
  const value = valueAtPath(input, path);
  return new ValuationError(
    "InvalidParameter",
    `${field}: ${issue?.message ?? "invalid value"} (got ${formatValue(value)})`,
    { field, value, details: { issues: error.issues.length } },
  );
}
