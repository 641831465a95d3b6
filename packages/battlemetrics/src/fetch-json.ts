/**
 * Shared HTTP utility — fetch + timeout + error classification.
 */

import {
  BattleMetricsError,
  BattleMetricsNotFoundError,
  BattleMetricsRateLimitedError,
  BattleMetricsRequestError,
  BattleMetricsUnauthorizedError,
} from "@sessionlink/errors";
import { DEFAULT_TIMEOUT_MS, type ResolvedClientConfig } from "./types.js";

/** Path component used to label errors; never carries the query string */
export function endpointOf(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url.split("?")[0] ?? url;
  }
}

/** Request headers; the elevated token travels as a bearer credential */
export function buildHeaders(config: ResolvedClientConfig, token?: string): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: "application/json",
    "User-Agent": config.userAgent,
  };
  if (token) {
    headers.Authorization = `Bearer ${token}`;
  }
  return headers;
}

/**
 * Fetch JSON from a BattleMetrics URL with timeout and error classification.
 *
 * @param url - Absolute URL to fetch
 * @param init - Fetch init options (headers)
 * @param timeoutMs - Request timeout in milliseconds (default 10_000)
 * @param signal - Optional external abort signal; its abort is re-thrown as-is,
 *   including one that fired before the call
 * @returns Parsed JSON body, unvalidated
 */
export async function fetchJson(
  url: string,
  init: RequestInit,
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
  signal?: AbortSignal,
): Promise<unknown> {
  signal?.throwIfAborted();

  const endpoint = endpointOf(url);
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  // Link external signal to internal controller
  const onExternalAbort = () => controller.abort();
  signal?.addEventListener("abort", onExternalAbort, { once: true });

  try {
    const response = await fetch(url, {
      ...init,
      signal: controller.signal,
    });

    switch (response.status) {
      case 401:
        throw new BattleMetricsUnauthorizedError(endpoint);
      case 404:
        throw new BattleMetricsNotFoundError(endpoint);
      case 429:
        throw new BattleMetricsRateLimitedError(endpoint);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new BattleMetricsRequestError(
        endpoint,
        `HTTP ${response.status}${body ? `: ${body}` : ""}`,
        response.status,
      );
    }

    return await response.json();
  } catch (error) {
    if (error instanceof BattleMetricsError) {
      throw error;
    }

    if (error instanceof Error && error.name === "AbortError") {
      if (signal?.aborted) {
        throw error;
      }
      throw new BattleMetricsRequestError(endpoint, `Request timed out after ${timeoutMs}ms`);
    }

    throw new BattleMetricsRequestError(
      endpoint,
      error instanceof Error ? error.message : String(error),
      undefined,
      error instanceof Error ? error : undefined,
    );
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onExternalAbort);
  }
}
