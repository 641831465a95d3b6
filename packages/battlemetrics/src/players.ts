/**
 * Player and server lookups.
 *
 * Unlike session fetching these throw: the caller asked for exactly one
 * entity and has nothing useful to do with a partial answer.
 */

import { BattleMetricsResponseError } from "@sessionlink/errors";
import { buildHeaders, fetchJson } from "./fetch-json.js";
import type { PlayerInfo, PlayerServer, ResolvedClientConfig, ServerInfo } from "./types.js";
import {
  formatIssues,
  PlayerResponseSchema,
  PlayerServerSchema,
  ServerResponseSchema,
} from "./validation.js";

export interface LookupOptions {
  readonly token?: string;
  readonly signal?: AbortSignal;
}

export async function getPlayer(
  config: ResolvedClientConfig,
  playerId: string,
  options: LookupOptions = {},
): Promise<PlayerInfo> {
  const path = `/players/${encodeURIComponent(playerId)}`;
  const body = await fetchJson(
    `${config.baseUrl}${path}?include=server`,
    { method: "GET", headers: buildHeaders(config, options.token) },
    config.timeoutMs,
    options.signal,
  );

  const parsed = PlayerResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new BattleMetricsResponseError(path, formatIssues(parsed.error));
  }

  const servers: PlayerServer[] = [];
  for (const resource of parsed.data.included ?? []) {
    if (resource.type !== "server") continue;
    const server = PlayerServerSchema.safeParse(resource);
    if (!server.success) {
      config.logger.warn(`Skipping malformed server ${resource.id} on player ${playerId}`);
      continue;
    }
    servers.push({
      id: server.data.id,
      name: server.data.attributes.name,
      online: server.data.meta.online,
      lastSeen: server.data.meta.lastSeen,
    });
  }
  servers.sort((a, b) => a.lastSeen.getTime() - b.lastSeen.getTime());

  return {
    id: parsed.data.data.id,
    name: parsed.data.data.attributes.name,
    servers,
  };
}

/** The `n` most recently seen servers, oldest first */
export async function getRecentServers(
  config: ResolvedClientConfig,
  playerId: string,
  n: number,
  options?: LookupOptions,
): Promise<readonly PlayerServer[]> {
  if (n <= 0) return [];
  const player = await getPlayer(config, playerId, options);
  return player.servers.slice(-n);
}

/** The server the player is on right now, or null when offline */
export async function getOnlineServer(
  config: ResolvedClientConfig,
  playerId: string,
  options?: LookupOptions,
): Promise<PlayerServer | null> {
  const player = await getPlayer(config, playerId, options);
  return player.servers.find((server) => server.online) ?? null;
}

export async function getServer(
  config: ResolvedClientConfig,
  serverId: string,
  options: LookupOptions = {},
): Promise<ServerInfo> {
  const path = `/servers/${encodeURIComponent(serverId)}`;
  const body = await fetchJson(
    `${config.baseUrl}${path}`,
    { method: "GET", headers: buildHeaders(config, options.token) },
    config.timeoutMs,
    options.signal,
  );

  const parsed = ServerResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new BattleMetricsResponseError(path, formatIssues(parsed.error));
  }

  const { id, attributes } = parsed.data.data;
  return {
    id,
    name: attributes.name,
    ip: attributes.ip,
    port: attributes.port,
    players: attributes.players,
    maxPlayers: attributes.maxPlayers,
    details: attributes.details ?? {},
  };
}
