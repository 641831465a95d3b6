/**
 * Zod schemas for correlation requests.
 */

import { CorrelationInputError } from "@sessionlink/errors";
import { z } from "zod";
import { MAX_WINDOW_DAYS } from "./types.js";

const PlayerIdsSchema = z
  .array(z.string())
  .transform((ids) => [...new Set(ids.map((id) => id.trim()).filter((id) => id.length > 0))])
  .pipe(z.array(z.string()).min(1, "at least one player id is required"));

export const CorrelateInputSchema = z.object({
  playerIds: PlayerIdsSchema,
  windowDays: z.number().int().positive().max(MAX_WINDOW_DAYS),
  concurrency: z.number().int().positive().optional(),
});

export interface CorrelateInput {
  readonly playerIds: readonly string[];
  readonly windowDays: number;
  readonly concurrency?: number | undefined;
}

/**
 * Validate a correlation request, throw CorrelationInputError on invalid input.
 * Player ids come back trimmed, blank-free and de-duplicated in first-seen order.
 */
export function parseCorrelateInput(input: CorrelateInput): z.infer<typeof CorrelateInputSchema> {
  const parsed = CorrelateInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new CorrelationInputError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    );
  }
  return parsed.data;
}

/**
 * Split a comma-separated id list as typed into a chat command.
 */
export function parsePlayerIdList(raw: string): string[] {
  return raw
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
}
