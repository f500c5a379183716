import type { FailureKind } from "../models/handlers";

const FAULT_ERROR_TYPES = [TypeError, ReferenceError, RangeError];

/**
 * Sorts a thrown value into the `exception` or `fault` category.
 *
 * Faults are programming-level failures: thrown values that are not errors
 * at all, the built-in `TypeError`/`ReferenceError`/`RangeError`, and failed
 * assertions. Pipeline stages wrap transport, decoding and parsing failures
 * before they get here, so only errors escaping caller code (converters,
 * hooks) can end up as faults.
 */
export function classifyFailure(error: unknown): FailureKind {
  if (!(error instanceof Error)) {
    return "fault";
  }
  if (FAULT_ERROR_TYPES.some((type) => error instanceof type)) {
    return "fault";
  }
  if (isAssertionError(error)) {
    return "fault";
  }
  return "exception";
}

function isAssertionError(error: Error): boolean {
  return (
    error.name === "AssertionError" ||
    ("code" in error && error.code === "ERR_ASSERTION")
  );
}
