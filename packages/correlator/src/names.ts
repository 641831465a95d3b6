import { createConsoleLogger, type Logger } from "@sessionlink/battlemetrics";
import { getErrorMessage } from "@sessionlink/errors";
import { runWithConcurrency } from "./pool.js";
import { DEFAULT_CONCURRENCY, type PlayerLookup } from "./types.js";

/**
 * Map player ids to display names. A failed lookup maps the id to itself
 * so the result always has an entry per requested id.
 */
export async function resolvePlayerNames(
  client: PlayerLookup,
  playerIds: readonly string[],
  logger: Logger = createConsoleLogger("correlator"),
): Promise<Map<string, string>> {
  const unique = [...new Set(playerIds)];
  const names = await runWithConcurrency(
    unique.map((playerId) => async () => {
      try {
        const player = await client.getPlayer(playerId);
        return player.name;
      } catch (error) {
        logger.warn(`Name lookup failed for player ${playerId}: ${getErrorMessage(error)}`);
        return playerId;
      }
    }),
    DEFAULT_CONCURRENCY,
  );

  const result = new Map<string, string>();
  for (const [i, playerId] of unique.entries()) {
    result.set(playerId, names[i] ?? playerId);
  }
  return result;
}
