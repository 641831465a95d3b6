/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised by the sessionlink packages. Each code maps to an
 * HTTP status, a domain and one of the behavioral base types so callers can
 * match either on `.code` or on `._tag`.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 */

/**
 * Behavioral base types that every error code maps to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "PermissionError"
  | "RateLimitError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    baseType: "InternalError",
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // BATTLEMETRICS ERRORS - Upstream API failures
  // ============================================================================
  BATTLEMETRICS_UNAUTHORIZED: {
    domain: "battlemetrics",
    httpStatus: 401,
    baseType: "PermissionError",
    isExpected: true,
    title: "BattleMetrics rejected credentials",
    description: "The BattleMetrics API answered 401 for the supplied token",
  },
  BATTLEMETRICS_NOT_FOUND: {
    domain: "battlemetrics",
    httpStatus: 404,
    baseType: "NotFoundError",
    isExpected: true,
    title: "BattleMetrics resource not found",
    description: "The requested player or server does not exist",
  },
  BATTLEMETRICS_RATE_LIMITED: {
    domain: "battlemetrics",
    httpStatus: 429,
    baseType: "RateLimitError",
    isExpected: true,
    title: "BattleMetrics rate limit hit",
    description: "Too many requests were sent to the BattleMetrics API",
  },
  BATTLEMETRICS_REQUEST_FAILED: {
    domain: "battlemetrics",
    httpStatus: 502,
    baseType: "ExternalError",
    isExpected: false,
    title: "BattleMetrics request failed",
    description: "Network error, timeout or non-success status from BattleMetrics",
  },
  BATTLEMETRICS_INVALID_RESPONSE: {
    domain: "battlemetrics",
    httpStatus: 502,
    baseType: "ExternalError",
    isExpected: false,
    title: "Unexpected BattleMetrics payload",
    description: "The BattleMetrics response did not match the expected document shape",
  },
  BATTLEMETRICS_CONFIGURATION_INVALID: {
    domain: "battlemetrics",
    httpStatus: 400,
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid client configuration",
    description: "The BattleMetrics client configuration failed validation",
  },

  // ============================================================================
  // CORRELATION ERRORS
  // ============================================================================
  CORRELATION_INPUT_INVALID: {
    domain: "correlation",
    httpStatus: 400,
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid correlation request",
    description: "Player ids or window length failed validation",
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

export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
