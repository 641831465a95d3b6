/**
 * @sessionlink/correlator — same-server session overlap detection
 *
 * Public API surface.
 */

export { correlate, correlateSessions, windowFromDays } from "./correlate.js";
export { findOverlaps, overlapKey } from "./engine.js";
export { resolvePlayerNames } from "./names.js";
export { runWithConcurrency } from "./pool.js";
export type {
  CorrelateOptions,
  CorrelationResult,
  OverlapRecord,
  PlayerFetchFailure,
  PlayerLookup,
  ProgressEvent,
  SessionSource,
  SessionsByPlayer,
} from "./types.js";
export { DAY_MS, DEFAULT_CONCURRENCY, MAX_WINDOW_DAYS } from "./types.js";
export {
  CorrelateInputSchema,
  type CorrelateInput,
  parseCorrelateInput,
  parsePlayerIdList,
} from "./validation.js";
