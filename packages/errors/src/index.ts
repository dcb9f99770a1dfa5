/**
 * @veracity/errors
 *
 * Error taxonomy shared by the gateway packages.
 *
 * Six behavioral base types: ValidationError, PermissionError,
 * RateLimitError, TimeoutError, ExternalError, InternalError.
 * Each error carries a `.code` from the catalog that discriminates
 * the specific condition. Match on `error.code` for fine-grained handling,
 * or `instanceof BaseType` for category handling.
 */

export { type ErrorJSON, isVeracityError, VeracityError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export { getErrorMessage, wrapError } from "./utils.js";

export { friendlyErrorMessage } from "./friendly.js";

export {
  ExternalError,
  InternalError,
  PermissionError,
  RateLimitError,
  TimeoutError,
  ValidationError,
} from "./bases/index.js";

export {
  hasCode,
  isExpectedError,
  isExternalError,
  isPermissionError,
  isRateLimitError,
  isTimeoutError,
  isValidationError,
} from "./guards.js";

export type {
  ExternalCodes,
  InternalCodes,
  PermissionCodes,
  RateLimitCodes,
  TimeoutCodes,
  ValidationCodes,
  ValidationIssue,
  VeracityErrorOptions,
} from "./types.js";
