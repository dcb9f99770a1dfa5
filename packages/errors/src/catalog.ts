/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the veracity packages maps to an HTTP status,
 * a gRPC canonical code and one of the six behavioral base types.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: INTERNAL, CONFIG, PROVIDER
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "PermissionError"
  | "RateLimitError"
  | "TimeoutError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // CONFIGURATION
  // ============================================================================
  CONFIG_INVALID: {
    domain: "config",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid configuration",
    description: "The gateway configuration failed schema validation",
  },
  CONFIG_FILE_UNREADABLE: {
    domain: "config",
    httpStatus: 400,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Configuration file unreadable",
    description: "The configuration file could not be read",
  },

  // ============================================================================
  // PROVIDER ERRORS - Failures talking to an evaluation backend
  // ============================================================================
  PROVIDER_NOT_CONFIGURED: {
    domain: "provider",
    httpStatus: 400,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Provider not configured",
    description: "The provider has no usable API key or client",
  },
  PROVIDER_INVALID_CONFIG: {
    domain: "provider",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid provider configuration",
    description: "The provider configuration cannot produce a client",
  },
  PROVIDER_AUTH_FAILED: {
    domain: "provider",
    httpStatus: 401,
    grpcCode: "UNAUTHENTICATED" as const,
    baseType: "PermissionError" as const,
    isExpected: true,
    title: "Provider authentication failed",
    description: "The backend rejected the API key",
  },
  PROVIDER_QUOTA_EXCEEDED: {
    domain: "provider",
    httpStatus: 402,
    grpcCode: "PERMISSION_DENIED" as const,
    baseType: "PermissionError" as const,
    isExpected: true,
    title: "Provider quota exceeded",
    description: "The account behind the API key has no remaining quota",
  },
  PROVIDER_RATE_LIMITED: {
    domain: "provider",
    httpStatus: 429,
    grpcCode: "RESOURCE_EXHAUSTED" as const,
    baseType: "RateLimitError" as const,
    isExpected: true,
    title: "Provider rate limited",
    description: "The backend refused the request because the key is over its rate limit",
  },
  PROVIDER_TIMEOUT: {
    domain: "provider",
    httpStatus: 504,
    grpcCode: "DEADLINE_EXCEEDED" as const,
    baseType: "TimeoutError" as const,
    isExpected: false,
    title: "Provider timed out",
    description: "The backend did not answer before the request timeout",
  },
  PROVIDER_UNAVAILABLE: {
    domain: "provider",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Provider unreachable",
    description: "The backend could not be reached over the network",
  },
  PROVIDER_ERROR: {
    domain: "provider",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Provider error",
    description: "The backend returned an error response",
  },
  PROVIDER_BAD_RESPONSE: {
    domain: "provider",
    httpStatus: 502,
    grpcCode: "DATA_LOSS" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Malformed provider response",
    description: "The backend answered with a body of unexpected shape",
  },
  PROVIDER_REQUEST_REJECTED: {
    domain: "provider",
    httpStatus: 400,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "ExternalError" as const,
    isExpected: true,
    title: "Provider rejected the request",
    description: "The backend refused the request as malformed or unsupported",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

export type ErrorDomain = ErrorCatalogEntry["domain"];

export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
