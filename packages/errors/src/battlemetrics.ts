/**
 * BattleMetrics API errors
 *
 * Abstract base: BattleMetricsError
 * Concrete:
 *   - BattleMetricsUnauthorizedError  (BATTLEMETRICS_UNAUTHORIZED)
 *   - BattleMetricsNotFoundError      (BATTLEMETRICS_NOT_FOUND)
 *   - BattleMetricsRateLimitedError   (BATTLEMETRICS_RATE_LIMITED)
 *   - BattleMetricsRequestError       (BATTLEMETRICS_REQUEST_FAILED)
 *   - BattleMetricsResponseError      (BATTLEMETRICS_INVALID_RESPONSE)
 *   - ClientConfigurationError        (BATTLEMETRICS_CONFIGURATION_INVALID)
 */

import { SessionLinkError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain, type HttpStatusCode } from "./catalog.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

export abstract class BattleMetricsError extends SessionLinkError {
  /** API path that failed, without host or query string */
  readonly endpoint: string;

  constructor(endpoint: string, message: string, cause?: Error) {
    super(message, { endpoint }, cause ? { cause } : undefined);
    this.endpoint = endpoint;
  }
}

// ---------------------------------------------------------------------------
// Concrete Errors
// ---------------------------------------------------------------------------

export class BattleMetricsUnauthorizedError extends BattleMetricsError {
  readonly _tag = "PermissionError" as const;
  readonly code = "BATTLEMETRICS_UNAUTHORIZED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(endpoint: string) {
    super(endpoint, `BattleMetrics rejected the access token for ${endpoint}`);
    const entry = ERROR_CATALOG.BATTLEMETRICS_UNAUTHORIZED;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}

export class BattleMetricsNotFoundError extends BattleMetricsError {
  readonly _tag = "NotFoundError" as const;
  readonly code = "BATTLEMETRICS_NOT_FOUND" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(endpoint: string) {
    super(endpoint, `BattleMetrics resource not found: ${endpoint}`);
    const entry = ERROR_CATALOG.BATTLEMETRICS_NOT_FOUND;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}

export class BattleMetricsRateLimitedError extends BattleMetricsError {
  readonly _tag = "RateLimitError" as const;
  readonly code = "BATTLEMETRICS_RATE_LIMITED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(endpoint: string) {
    super(endpoint, `BattleMetrics rate limited ${endpoint}`);
    const entry = ERROR_CATALOG.BATTLEMETRICS_RATE_LIMITED;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}

export class BattleMetricsRequestError extends BattleMetricsError {
  readonly _tag = "ExternalError" as const;
  readonly code = "BATTLEMETRICS_REQUEST_FAILED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  /** Upstream HTTP status, when the request got that far */
  readonly status: number | undefined;

  constructor(endpoint: string, message: string, status?: number, cause?: Error) {
    super(endpoint, `BattleMetrics request to ${endpoint} failed: ${message}`, cause);
    const entry = ERROR_CATALOG.BATTLEMETRICS_REQUEST_FAILED;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.status = status;
  }
}

export class BattleMetricsResponseError extends BattleMetricsError {
  readonly _tag = "ExternalError" as const;
  readonly code = "BATTLEMETRICS_INVALID_RESPONSE" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly issues: readonly string[];

  constructor(endpoint: string, issues: readonly string[]) {
    super(endpoint, `Unexpected BattleMetrics payload from ${endpoint}: ${issues.join("; ")}`);
    const entry = ERROR_CATALOG.BATTLEMETRICS_INVALID_RESPONSE;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = issues;
  }
}

export class ClientConfigurationError extends SessionLinkError {
  readonly _tag = "ValidationError" as const;
  readonly code = "BATTLEMETRICS_CONFIGURATION_INVALID" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`BattleMetrics client configuration invalid: ${issues.join("; ")}`);
    const entry = ERROR_CATALOG.BATTLEMETRICS_CONFIGURATION_INVALID;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = issues;
  }
}
