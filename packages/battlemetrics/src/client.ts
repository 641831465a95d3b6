/**
 * BattleMetricsClient — one configured entry point for every endpoint.
 */

import { createConsoleLogger } from "./logger.js";
import {
  getOnlineServer,
  getPlayer,
  getRecentServers,
  getServer,
  type LookupOptions,
} from "./players.js";
import { fetchSessions } from "./sessions.js";
import {
  type BattleMetricsClientConfig,
  DEFAULT_BASE_URL,
  DEFAULT_MAX_PAGES,
  DEFAULT_PAGE_SIZE,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  type FetchSessionsOptions,
  type PlayerInfo,
  type PlayerServer,
  type ResolvedClientConfig,
  type ServerInfo,
  type SessionFetchResult,
  type TimeWindow,
} from "./types.js";
import { validateClientConfig } from "./validation.js";

/** Resolve user config with defaults */
export function resolveClientConfig(config?: BattleMetricsClientConfig): ResolvedClientConfig {
  validateClientConfig(config);
  return {
    baseUrl: (config?.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, ""),
    timeoutMs: config?.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    pageSize: config?.pageSize ?? DEFAULT_PAGE_SIZE,
    maxPages: config?.maxPages ?? DEFAULT_MAX_PAGES,
    userAgent: config?.userAgent ?? DEFAULT_USER_AGENT,
    logger: config?.logger ?? createConsoleLogger("battlemetrics"),
  };
}

export class BattleMetricsClient {
  private readonly config: ResolvedClientConfig;

  constructor(config?: BattleMetricsClientConfig) {
    this.config = resolveClientConfig(config);
  }

  fetchSessions(
    playerId: string,
    window: TimeWindow,
    options?: FetchSessionsOptions,
  ): Promise<SessionFetchResult> {
    return fetchSessions(this.config, playerId, window, options);
  }

  getPlayer(playerId: string, options?: LookupOptions): Promise<PlayerInfo> {
    return getPlayer(this.config, playerId, options);
  }

  getRecentServers(
    playerId: string,
    n: number,
    options?: LookupOptions,
  ): Promise<readonly PlayerServer[]> {
    return getRecentServers(this.config, playerId, n, options);
  }

  getOnlineServer(playerId: string, options?: LookupOptions): Promise<PlayerServer | null> {
    return getOnlineServer(this.config, playerId, options);
  }

  getServer(serverId: string, options?: LookupOptions): Promise<ServerInfo> {
    return getServer(this.config, serverId, options);
  }
}
