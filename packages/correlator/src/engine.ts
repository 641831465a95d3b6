/**
 * Overlap engine.
 *
 * Compares every pair of players, and every pair of their sessions on the
 * same server, and records each non-empty intersection. Records are keyed by
 * exact (server, start, stop): a later pair producing the same range joins
 * the existing record, while a different range on the same server gets its
 * own record even if the two ranges intersect.
 *
 * When a pair lands on an existing record both of its players join it, not
 * just the second one. Each joining player covers the range, so the result is
 * a superset of the second-player-only rule and keeps every listed
 * participant on the server for the whole range.
 */

import type { OverlapRecord, SessionsByPlayer } from "./types.js";

interface DraftOverlap {
  readonly serverId: string;
  readonly start: Date;
  readonly stop: Date;
  readonly durationMs: number;
  readonly players: string[];
}

export function overlapKey(serverId: string, start: Date, stop: Date): string {
  return `${serverId}|${start.getTime()}|${stop.getTime()}`;
}

function addPlayer(record: DraftOverlap, playerId: string): void {
  if (!record.players.includes(playerId)) {
    record.players.push(playerId);
  }
}

/**
 * Find every same-server overlap between two or more players.
 *
 * @param sessionsByPlayer - Sessions per player; iteration order sets pair order
 * @param windowEnd - Effective stop for sessions that are still running
 * @returns Records in creation order
 */
export function findOverlaps(
  sessionsByPlayer: SessionsByPlayer,
  windowEnd: Date,
): OverlapRecord[] {
  const entries = [...sessionsByPlayer];
  const records = new Map<string, DraftOverlap>();
  const endMs = windowEnd.getTime();

  for (const [i, [playerA, sessionsA]] of entries.entries()) {
    for (const [playerB, sessionsB] of entries.slice(i + 1)) {
      for (const a of sessionsA) {
        for (const b of sessionsB) {
          if (a.serverId !== b.serverId) continue;

          const startMs = Math.max(a.start.getTime(), b.start.getTime());
          const stopMs = Math.min(a.stop?.getTime() ?? endMs, b.stop?.getTime() ?? endMs);
          if (startMs >= stopMs) continue;

          const start = new Date(startMs);
          const stop = new Date(stopMs);
          const key = overlapKey(a.serverId, start, stop);
          const existing = records.get(key);
          if (existing) {
            addPlayer(existing, playerA);
            addPlayer(existing, playerB);
            continue;
          }

          records.set(key, {
            serverId: a.serverId,
            start,
            stop,
            durationMs: stopMs - startMs,
            players: [playerA, playerB],
          });
        }
      }
    }
  }

  return [...records.values()];
}
