/**
 * Type guards for the base error types + code-level discrimination.
 */

import { VeracityError } from "./base.js";
import { ExternalError } from "./bases/external-error.js";
import { PermissionError } from "./bases/permission-error.js";
import { RateLimitError } from "./bases/rate-limit-error.js";
import { TimeoutError } from "./bases/timeout-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ErrorCode } from "./catalog.js";
import type { ExternalCodes, PermissionCodes, TimeoutCodes, ValidationCodes } from "./types.js";

/** Check if an error is a ValidationError (bad input, config) */
export function isValidationError(error: unknown): error is ValidationError<ValidationCodes> {
  return error instanceof ValidationError;
}

/** Check if an error is a PermissionError (auth failure) */
export function isPermissionError(error: unknown): error is PermissionError<PermissionCodes> {
  return error instanceof PermissionError;
}

/** Check if an error is a RateLimitError (resource exhaustion) */
export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError;
}

/** Check if an error is a TimeoutError (deadline exceeded) */
export function isTimeoutError(error: unknown): error is TimeoutError<TimeoutCodes> {
  return error instanceof TimeoutError;
}

/** Check if an error is an ExternalError (dependency/runtime failure) */
export function isExternalError(error: unknown): error is ExternalError<ExternalCodes> {
  return error instanceof ExternalError;
}

/**
 * Check if a VeracityError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: VeracityError,
  code: C,
): error is VeracityError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition (4xx-class).
 * Returns false for anything that is not a VeracityError.
 */
export function isExpectedError(error: unknown): boolean {
  return error instanceof VeracityError && error.isExpected;
}
