/**
 * Zod schemas for client configuration and BattleMetrics JSON:API payloads.
 */

import { ClientConfigurationError } from "@sessionlink/errors";
import { type ZodError, z } from "zod";
import type { BattleMetricsClientConfig } from "./types.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export const BattleMetricsClientConfigSchema = z.object({
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().min(1000).max(60_000).optional(),
  pageSize: z.number().int().min(1).max(100).optional(),
  maxPages: z.number().int().min(1).max(500).optional(),
  userAgent: z.string().min(1).optional(),
});

const EnvSchema = z.object({
  BATTLEMETRICS_BASE_URL: z.string().optional(),
  BATTLEMETRICS_TIMEOUT_MS: z.coerce.number().optional(),
  BATTLEMETRICS_PAGE_SIZE: z.coerce.number().optional(),
  BATTLEMETRICS_MAX_PAGES: z.coerce.number().optional(),
  BATTLEMETRICS_TOKEN: z.string().optional(),
});

export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

/** Validate configuration, throw ClientConfigurationError on invalid input */
export function validateClientConfig(config?: BattleMetricsClientConfig): void {
  if (config === undefined) return;
  const parsed = BattleMetricsClientConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new ClientConfigurationError(formatIssues(parsed.error));
  }
}

/**
 * Build a client config from `BATTLEMETRICS_*` environment variables.
 * Unset variables fall back to the client defaults.
 */
export function loadClientConfigFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
): BattleMetricsClientConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ClientConfigurationError(formatIssues(parsed.error));
  }
  const vars = parsed.data;
  const config: BattleMetricsClientConfig = {
    ...(vars.BATTLEMETRICS_BASE_URL ? { baseUrl: vars.BATTLEMETRICS_BASE_URL } : {}),
    ...(vars.BATTLEMETRICS_TIMEOUT_MS !== undefined
      ? { timeoutMs: vars.BATTLEMETRICS_TIMEOUT_MS }
      : {}),
    ...(vars.BATTLEMETRICS_PAGE_SIZE !== undefined
      ? { pageSize: vars.BATTLEMETRICS_PAGE_SIZE }
      : {}),
    ...(vars.BATTLEMETRICS_MAX_PAGES !== undefined
      ? { maxPages: vars.BATTLEMETRICS_MAX_PAGES }
      : {}),
  };
  validateClientConfig(config);
  return config;
}

/**
 * Read the elevated access token, if one is configured.
 * @returns Trimmed token, or undefined when unset or blank.
 */
export function loadTokenFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
): string | undefined {
  const token = env.BATTLEMETRICS_TOKEN?.trim();
  return token ? token : undefined;
}

// ---------------------------------------------------------------------------
// Payloads
// ---------------------------------------------------------------------------

const timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const resourceRef = z.object({
  data: z.object({
    type: z.string().optional(),
    id: z.string().min(1),
  }),
});

/** A single record from `GET /sessions` */
export const RawSessionSchema = z.object({
  id: z.string().optional(),
  attributes: z.object({
    start: timestamp,
    stop: timestamp.nullable().optional(),
  }),
  relationships: z.object({
    server: resourceRef,
  }),
});

/**
 * Page envelope. Records stay `unknown` here so one malformed record can be
 * skipped without rejecting its page.
 */
export const SessionsPageSchema = z.object({
  data: z.array(z.unknown()),
  links: z
    .object({
      next: z.string().url().nullable().optional(),
    })
    .optional(),
});

const IncludedResourceSchema = z.object({
  type: z.string(),
  id: z.string(),
  attributes: z.record(z.unknown()).optional(),
  meta: z.record(z.unknown()).optional(),
});

export const PlayerServerSchema = z.object({
  id: z.string().min(1),
  attributes: z.object({ name: z.string() }),
  meta: z.object({
    online: z.boolean(),
    lastSeen: timestamp,
  }),
});

export const PlayerResponseSchema = z.object({
  data: z.object({
    id: z.string().min(1),
    attributes: z.object({ name: z.string() }),
  }),
  included: z.array(IncludedResourceSchema).optional(),
});

export const ServerResponseSchema = z.object({
  data: z.object({
    id: z.string().min(1),
    attributes: z.object({
      name: z.string(),
      ip: z.string(),
      port: z.number().int(),
      players: z.number().int(),
      maxPlayers: z.number().int(),
      details: z.record(z.unknown()).optional(),
    }),
  }),
});

export type RawSession = z.infer<typeof RawSessionSchema>;
export type SessionsPage = z.infer<typeof SessionsPageSchema>;
