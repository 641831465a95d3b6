/**
 * Paged session fetcher for `GET /sessions`.
 *
 * Each call owns its cursor and its result; nothing is cached between calls,
 * so concurrent fetches for different players never see each other's pages.
 */

import {
  BattleMetricsError,
  BattleMetricsRequestError,
  BattleMetricsResponseError,
  BattleMetricsUnauthorizedError,
  getErrorMessage,
} from "@sessionlink/errors";
import { buildHeaders, endpointOf, fetchJson } from "./fetch-json.js";
import type {
  FetchSessionsOptions,
  ResolvedClientConfig,
  Session,
  SessionFetchResult,
  TimeWindow,
} from "./types.js";
import { formatIssues, RawSessionSchema, SessionsPageSchema } from "./validation.js";

const SESSIONS_PATH = "/sessions";

export function buildSessionsUrl(
  config: ResolvedClientConfig,
  playerId: string,
  window: TimeWindow,
): string {
  const params = new URLSearchParams({
    include: "server",
    "page[size]": String(config.pageSize),
    "filter[players]": playerId,
    "filter[range]": `${window.start.toISOString()}:${window.end.toISOString()}`,
  });
  return `${config.baseUrl}${SESSIONS_PATH}?${params.toString()}`;
}

/**
 * True when the session shares at least one instant with `[window.start, window.end)`.
 * A running session counts as lasting until the window end.
 */
export function intersectsWindow(session: Session, window: TimeWindow): boolean {
  const stop = session.stop ?? window.end;
  return session.start < window.end && stop > window.start;
}

function toSession(
  config: ResolvedClientConfig,
  playerId: string,
  raw: unknown,
  page: number,
): Session | undefined {
  const parsed = RawSessionSchema.safeParse(raw);
  if (!parsed.success) {
    config.logger.warn(
      `Skipping malformed session for player ${playerId} on page ${page}: ${formatIssues(parsed.error).join("; ")}`,
    );
    return undefined;
  }

  const { attributes, relationships } = parsed.data;
  const stop = attributes.stop ?? null;
  if (stop !== null && stop < attributes.start) {
    config.logger.warn(
      `Skipping session ${parsed.data.id ?? "<no id>"} for player ${playerId}: stop precedes start`,
    );
    return undefined;
  }

  return {
    playerId,
    serverId: relationships.server.data.id,
    start: attributes.start,
    stop,
  };
}

async function collectSessions(
  config: ResolvedClientConfig,
  playerId: string,
  window: TimeWindow,
  token: string | undefined,
  options: FetchSessionsOptions,
): Promise<SessionFetchResult> {
  const usedToken = Boolean(token);
  const sessions: Session[] = [];
  let url: string | undefined = buildSessionsUrl(config, playerId, window);
  let page = 0;

  try {
    while (url) {
      options.signal?.throwIfAborted();
      if (page >= config.maxPages) {
        config.logger.warn(
          `Stopped paging sessions for player ${playerId} after ${config.maxPages} pages`,
        );
        break;
      }
      page++;
      options.onPage?.(page);

      const body = await fetchJson(
        url,
        { method: "GET", headers: buildHeaders(config, token) },
        config.timeoutMs,
        options.signal,
      );

      const parsed = SessionsPageSchema.safeParse(body);
      if (!parsed.success) {
        throw new BattleMetricsResponseError(endpointOf(url), formatIssues(parsed.error));
      }

      for (const raw of parsed.data.data) {
        const session = toSession(config, playerId, raw, page);
        if (session && intersectsWindow(session, window)) {
          sessions.push(session);
        }
      }

      url = parsed.data.links?.next ?? undefined;
    }
  } catch (error) {
    if (options.signal?.aborted) {
      throw error;
    }
    const failure =
      error instanceof BattleMetricsError
        ? error
        : new BattleMetricsRequestError(
            SESSIONS_PATH,
            getErrorMessage(error),
            undefined,
            error instanceof Error ? error : undefined,
          );
    return { playerId, sessions: [], error: failure, usedToken };
  }

  return { playerId, sessions, usedToken };
}

/**
 * Fetch every session of `playerId` that intersects `window`.
 *
 * With a token, a 401 restarts the fetch once without it. Any other failure
 * ends the fetch with an empty session list and the error attached; only an
 * abort of `options.signal` is thrown.
 */
export async function fetchSessions(
  config: ResolvedClientConfig,
  playerId: string,
  window: TimeWindow,
  options: FetchSessionsOptions = {},
): Promise<SessionFetchResult> {
  let result = await collectSessions(config, playerId, window, options.token, options);
  if (options.token && result.error instanceof BattleMetricsUnauthorizedError) {
    config.logger.warn(`Token rejected for player ${playerId}; retrying without it`);
    result = await collectSessions(config, playerId, window, undefined, options);
  }

  if (result.error) {
    config.logger.warn(`Session fetch failed for player ${playerId}: ${result.error.message}`);
  }
  return result;
}
