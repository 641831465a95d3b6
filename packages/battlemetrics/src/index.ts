/**
 * @sessionlink/battlemetrics — BattleMetrics API client
 *
 * Public API surface.
 */

// Client
export { BattleMetricsClient, resolveClientConfig } from "./client.js";
// HTTP
export { buildHeaders, endpointOf, fetchJson } from "./fetch-json.js";
// Logging
export { createConsoleLogger } from "./logger.js";
// Lookups
export type { LookupOptions } from "./players.js";
// Sessions
export { buildSessionsUrl, intersectsWindow } from "./sessions.js";
// Types
export type {
  BattleMetricsClientConfig,
  FetchSessionsOptions,
  Logger,
  PlayerInfo,
  PlayerServer,
  ResolvedClientConfig,
  ServerInfo,
  Session,
  SessionFetchResult,
  TimeWindow,
} from "./types.js";
export {
  DEFAULT_BASE_URL,
  DEFAULT_MAX_PAGES,
  DEFAULT_PAGE_SIZE,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
} from "./types.js";
// Validation
export {
  BattleMetricsClientConfigSchema,
  loadClientConfigFromEnv,
  loadTokenFromEnv,
  validateClientConfig,
} from "./validation.js";
