/**
 * Types for the session-overlap correlator.
 */

import type {
  FetchSessionsOptions,
  Logger,
  PlayerInfo,
  Session,
  SessionFetchResult,
  TimeWindow,
} from "@sessionlink/battlemetrics";
import type { BattleMetricsError } from "@sessionlink/errors";

/**
 * One time range during which two or more players were on the same server.
 * Every listed player has a session on `serverId` covering `[start, stop]`.
 */
export interface OverlapRecord {
  readonly serverId: string;
  readonly start: Date;
  readonly stop: Date;
  /** `stop - start` in milliseconds */
  readonly durationMs: number;
  /** Participant player ids, no duplicates, at least two */
  readonly players: readonly string[];
}

/** Already-fetched sessions keyed by player id */
export type SessionsByPlayer = ReadonlyMap<string, readonly Session[]>;

/**
 * Where sessions come from. `BattleMetricsClient` satisfies this; tests
 * supply an in-memory source.
 */
export interface SessionSource {
  fetchSessions(
    playerId: string,
    window: TimeWindow,
    options?: FetchSessionsOptions,
  ): Promise<SessionFetchResult>;
}

/** Anything that can look a player up by id */
export interface PlayerLookup {
  getPlayer(playerId: string): Promise<PlayerInfo>;
}

export type ProgressEvent =
  | {
      readonly type: "fetch-start";
      readonly playerId: string;
      /** 1-based position in the request */
      readonly index: number;
      readonly total: number;
    }
  | { readonly type: "page"; readonly playerId: string; readonly page: number }
  | { readonly type: "analyze" };

export interface CorrelateOptions {
  /** Elevated BattleMetrics token; dropped per player on 401 */
  readonly token?: string;
  /** Session source (default: a BattleMetricsClient with default config) */
  readonly client?: SessionSource;
  /** Clock for the window end (default: current time) */
  readonly now?: () => Date;
  /** Players fetched at once (default 4) */
  readonly concurrency?: number;
  readonly signal?: AbortSignal;
  readonly onProgress?: (event: ProgressEvent) => void;
  readonly logger?: Logger;
}

export interface PlayerFetchFailure {
  readonly playerId: string;
  readonly error: BattleMetricsError;
}

export interface CorrelationResult {
  readonly overlaps: readonly OverlapRecord[];
  readonly window: TimeWindow;
  /** Players whose sessions could not be fetched; they contributed nothing */
  readonly failures: readonly PlayerFetchFailure[];
  /** Sessions per player that fall inside `window` and were correlated */
  readonly sessionCounts: Readonly<Record<string, number>>;
  /** True when at least one player's sessions were fetched with the token */
  readonly usedToken: boolean;
}

export const DEFAULT_CONCURRENCY = 4;

export const MAX_WINDOW_DAYS = 365;

export const DAY_MS = 86_400_000;
