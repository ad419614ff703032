/**
 * Type guards for the base error types + code-level discrimination.
 */

import type { BenchdefError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ErrorCode } from "./catalog.js";

/** Check if an error is a ValidationError (bad input, config) */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/** Check if an error is a NotFoundError (resource missing) */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

/** Check if an error is an InternalError (bug) */
export function isInternalError(error: unknown): error is InternalError {
  return error instanceof InternalError;
}

/**
 * Check if a BenchdefError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: BenchdefError,
  code: C,
): error is BenchdefError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition (caller input).
 * Returns false for values outside the benchdef hierarchy.
 */
export function isExpectedError(error: unknown): boolean {
  if (
    error !== null &&
    error !== undefined &&
    typeof error === "object" &&
    "isExpected" in error &&
    typeof error.isExpected === "boolean"
  ) {
    return error.isExpected;
  }
  return false;
}
