/**
 * Retry Helpers
 *
 * Shared by the chat fallback wrapper and the embedder's backoff loop.
 */

import type { LLMProvider, ModelRole } from "../types.js";
import { FALLBACK_CHAINS, type FallbackEntry } from "../config.js";
import { ProviderError, RETRYABLE_STATUSES, isTransientError } from "../../errors.js";

// Seen in fetch and socket failures that carry no status
const NETWORK_PATTERNS = ["fetch failed", "econnrefused", "econnreset", "enotfound", "socket hang up", "timed out", "timeout", "network", "aborted"];

/** Longest Retry-After worth waiting for; beyond it the fallback is tried at once */
const MAX_RETRY_AFTER_MS = 30_000;

/**
 * Whether another attempt (or another provider) might succeed. Typed errors
 * decide by category; anything else by a status code or network phrase in
 * its message.
 */
export function isRetryableError(error: unknown): boolean {
  if (isTransientError(error)) return true;
  if (error instanceof ProviderError) return false;

  const text = (error instanceof Error ? `${error.name} ${error.message}` : String(error)).toLowerCase();
  const statuses = text.match(/\b\d{3}\b/g) ?? [];
  if (statuses.some((s) => RETRYABLE_STATUSES.has(Number(s)))) return true;
  return text.includes("rate limit") || text.includes("overloaded") || NETWORK_PATTERNS.some((p) => text.includes(p));
}

/** Seconds from a Retry-After header as ms; 0 when absent or not a number */
export function retryAfterMs(header: string | null): number {
  if (!header) return 0;
  const seconds = Number.parseFloat(header);
  return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : 0;
}

/** Wait the provider asked for before falling back, if short enough */
export function fallbackDelayMs(error: unknown): number {
  if (!(error instanceof ProviderError)) return 0;
  return error.retryAfterMs <= MAX_RETRY_AFTER_MS ? error.retryAfterMs : 0;
}

/** initial × 2^(attempt-1), capped; attempt is 1-based */
export function backoffDelayMs(attempt: number, initialMs: number, maxMs: number): number {
  return Math.min(maxMs, initialMs * 2 ** Math.max(0, attempt - 1));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** The role's fallback chain without the provider that just failed */
export function getRuntimeFallbacks(role: ModelRole, failedProvider: LLMProvider): FallbackEntry[] {
  return FALLBACK_CHAINS[role].filter((entry) => entry.provider !== failedProvider);
}
