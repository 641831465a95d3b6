/**
 * Core types for the BattleMetrics client.
 */

import type { BattleMetricsError } from "@sessionlink/errors";

/**
 * One recorded presence of a player on a server.
 * `stop` is null while the session is still running.
 */
export interface Session {
  readonly playerId: string;
  readonly serverId: string;
  readonly start: Date;
  readonly stop: Date | null;
}

/** Half-open time range `[start, end)` */
export interface TimeWindow {
  readonly start: Date;
  readonly end: Date;
}

/**
 * Outcome of fetching one player's sessions. Never thrown: a failed fetch
 * carries an empty `sessions` list and the error that ended it.
 */
export interface SessionFetchResult {
  readonly playerId: string;
  readonly sessions: readonly Session[];
  readonly error?: BattleMetricsError;
  /** Whether the sessions were fetched with the elevated token */
  readonly usedToken: boolean;
}

export interface FetchSessionsOptions {
  /** Elevated access token; dropped for a single retry on 401 */
  readonly token?: string;
  readonly signal?: AbortSignal;
  /** Called before each page request, 1-based */
  readonly onPage?: (page: number) => void;
}

/** A server from a player's history */
export interface PlayerServer {
  readonly id: string;
  readonly name: string;
  readonly online: boolean;
  readonly lastSeen: Date;
}

export interface PlayerInfo {
  readonly id: string;
  readonly name: string;
  /** Sorted by `lastSeen`, oldest first */
  readonly servers: readonly PlayerServer[];
}

export interface ServerInfo {
  readonly id: string;
  readonly name: string;
  readonly ip: string;
  readonly port: number;
  readonly players: number;
  readonly maxPlayers: number;
  /** Game-specific details block, passed through as-is */
  readonly details: Readonly<Record<string, unknown>>;
}

/** Minimal logging surface; defaults to the console */
export interface Logger {
  warn(message: string): void;
  debug?(message: string): void;
}

export interface BattleMetricsClientConfig {
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  readonly pageSize?: number;
  readonly maxPages?: number;
  readonly userAgent?: string;
  readonly logger?: Logger;
}

/** Fully resolved config (no optionals) */
export interface ResolvedClientConfig {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly pageSize: number;
  readonly maxPages: number;
  readonly userAgent: string;
  readonly logger: Logger;
}

/** Default API root */
export const DEFAULT_BASE_URL = "https://api.battlemetrics.com";

/** Default per-request timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 10_000;

/** Largest page the sessions endpoint serves reliably */
export const DEFAULT_PAGE_SIZE = 90;

/** Upper bound on pages fetched per player */
export const DEFAULT_MAX_PAGES = 50;

export const DEFAULT_USER_AGENT = "sessionlink/0.1";
