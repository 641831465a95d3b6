/**
 * @sessionlink/errors
 *
 * Shared error taxonomy for the sessionlink packages.
 *
 * Each error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` for fine-grained matching,
 * `._tag` for the behavioral category, or `instanceof` on the classes.
 */

export { type ErrorJSON, isSessionLinkError, SessionLinkError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type HttpStatusCode,
} from "./catalog.js";

export { getCatalogEntry, getErrorMessage, isValidErrorCode, wrapError } from "./utils.js";

export { InternalError } from "./internal.js";

export {
  BattleMetricsError,
  BattleMetricsNotFoundError,
  BattleMetricsRateLimitedError,
  BattleMetricsRequestError,
  BattleMetricsResponseError,
  BattleMetricsUnauthorizedError,
  ClientConfigurationError,
} from "./battlemetrics.js";

export { CorrelationInputError } from "./correlation.js";
