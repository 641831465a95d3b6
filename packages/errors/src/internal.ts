import { SessionLinkError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain, type HttpStatusCode } from "./catalog.js";

/**
 * Catch-all for failures that have no more specific code.
 */
export class InternalError extends SessionLinkError {
  readonly _tag = "InternalError" as const;
  readonly code = "INTERNAL_ERROR" as const;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor(message: string, metadata?: Record<string, string>, cause?: Error) {
    super(message, metadata, cause ? { cause } : undefined);
    const entry = ERROR_CATALOG.INTERNAL_ERROR;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
