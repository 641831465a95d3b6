/**
 * Correlation errors
 *
 * Concrete:
 *   - CorrelationInputError (CORRELATION_INPUT_INVALID)
 */

import { SessionLinkError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain, type HttpStatusCode } from "./catalog.js";

export class CorrelationInputError extends SessionLinkError {
  readonly _tag = "ValidationError" as const;
  readonly code = "CORRELATION_INPUT_INVALID" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Correlation request invalid: ${issues.join("; ")}`);
    const entry = ERROR_CATALOG.CORRELATION_INPUT_INVALID;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = issues;
  }
}
