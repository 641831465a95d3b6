/**
 * Correlation entry points.
 */

import {
  BattleMetricsClient,
  createConsoleLogger,
  intersectsWindow,
  type Logger,
  type Session,
  type TimeWindow,
} from "@sessionlink/battlemetrics";
import { getErrorMessage } from "@sessionlink/errors";
import { findOverlaps } from "./engine.js";
import { runWithConcurrency } from "./pool.js";
import {
  type CorrelateOptions,
  type CorrelationResult,
  DAY_MS,
  DEFAULT_CONCURRENCY,
  type OverlapRecord,
  type PlayerFetchFailure,
  type ProgressEvent,
  type SessionsByPlayer,
} from "./types.js";
import { parseCorrelateInput } from "./validation.js";

/** `[now - days, now)` */
export function windowFromDays(days: number, now: Date): TimeWindow {
  return {
    start: new Date(now.getTime() - days * DAY_MS),
    end: new Date(now.getTime()),
  };
}

/**
 * Overlaps among already-fetched sessions. Sessions outside `window` are
 * ignored; running sessions end at `window.end`.
 */
export function correlateSessions(
  sessionsByPlayer: SessionsByPlayer,
  window: TimeWindow,
): OverlapRecord[] {
  const inWindow = new Map<string, readonly Session[]>();
  for (const [playerId, sessions] of sessionsByPlayer) {
    inWindow.set(
      playerId,
      sessions.filter((session) => intersectsWindow(session, window)),
    );
  }
  return findOverlaps(inWindow, window.end);
}

function createProgressEmitter(
  onProgress: ((event: ProgressEvent) => void) | undefined,
  logger: Logger,
): (event: ProgressEvent) => void {
  return (event) => {
    if (!onProgress) return;
    try {
      onProgress(event);
    } catch (error) {
      logger.warn(`Progress callback failed on "${event.type}": ${getErrorMessage(error)}`);
    }
  };
}

/**
 * Fetch the sessions of every player over the last `windowDays` days and
 * return the same-server overlaps between them.
 *
 * A player whose fetch fails is listed in `failures` and the others are
 * still correlated. Fewer than two distinct players yields no overlaps and
 * no requests. An abort of `options.signal` rejects the call, and players
 * not yet started are never fetched.
 */
export async function correlate(
  playerIds: readonly string[],
  windowDays: number,
  options: CorrelateOptions = {},
): Promise<CorrelationResult> {
  const input = parseCorrelateInput({
    playerIds,
    windowDays,
    concurrency: options.concurrency,
  });
  const logger = options.logger ?? createConsoleLogger("correlator");
  const window = windowFromDays(input.windowDays, options.now?.() ?? new Date());
  const emit = createProgressEmitter(options.onProgress, logger);

  if (input.playerIds.length < 2) {
    return { overlaps: [], window, failures: [], sessionCounts: {}, usedToken: false };
  }

  const source = options.client ?? new BattleMetricsClient({ logger });
  const total = input.playerIds.length;
  const tasks = input.playerIds.map((playerId, i) => () => {
    options.signal?.throwIfAborted();
    emit({ type: "fetch-start", playerId, index: i + 1, total });
    return source.fetchSessions(playerId, window, {
      ...(options.token ? { token: options.token } : {}),
      ...(options.signal ? { signal: options.signal } : {}),
      onPage: (page) => emit({ type: "page", playerId, page }),
    });
  });
  const results = await runWithConcurrency(tasks, input.concurrency ?? DEFAULT_CONCURRENCY);

  emit({ type: "analyze" });

  const sessionsByPlayer = new Map<string, readonly Session[]>();
  const failures: PlayerFetchFailure[] = [];
  const sessionCounts: Record<string, number> = {};
  let usedToken = false;

  for (const result of results) {
    const inWindow = result.sessions.filter((session) => intersectsWindow(session, window));
    sessionsByPlayer.set(result.playerId, inWindow);
    sessionCounts[result.playerId] = inWindow.length;
    if (result.error) {
      failures.push({ playerId: result.playerId, error: result.error });
    } else if (result.usedToken) {
      usedToken = true;
    }
  }

  const overlaps = correlateSessions(sessionsByPlayer, window);
  logger.debug?.(
    `Correlated ${total} players over ${input.windowDays} days: ${overlaps.length} overlaps, ${failures.length} failed fetches`,
  );

  return { overlaps, window, failures, sessionCounts, usedToken };
}
