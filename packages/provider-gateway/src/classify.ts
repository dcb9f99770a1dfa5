/**
 * Failure classification for the retry orchestrator.
 *
 * Backends throw @veracity/errors instances; this module maps them (and
 * anything raw that slipped through) onto the four retry categories, and
 * holds the per-backend parsers for "retry after" hints.
 */

import {
  ExternalError,
  getErrorMessage,
  hasCode,
  isExternalError,
  isPermissionError,
  isRateLimitError,
  isTimeoutError,
  isVeracityError,
  PermissionError,
  RateLimitError,
} from "@veracity/errors";
import type { FailureClassification } from "./types.js";

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export function isAbortError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "name" in error && error.name === "AbortError";
}

/**
 * Map an error raised by a backend call to a retry category.
 *
 * auth/fatal end the evaluation, rate_limit cools the key down and rotates,
 * transient waits and rotates.
 */
export function classifyFailure(error: unknown): FailureClassification {
  const reason = getErrorMessage(error);

  if (isAbortError(error)) return { category: "aborted", reason: "evaluation cancelled" };

  if (isRateLimitError(error)) {
    return {
      category: "rate_limit",
      reason,
      ...(error.retryAfterMs !== undefined ? { retryAfterMs: error.retryAfterMs } : {}),
    };
  }
  if (isPermissionError(error)) return { category: "auth", reason };
  if (isTimeoutError(error)) return { category: "transient", reason };
  if (isExternalError(error)) {
    return hasCode(error, "PROVIDER_REQUEST_REJECTED")
      ? { category: "fatal", reason }
      : { category: "transient", reason };
  }
  // Configuration and internal errors will not fix themselves on retry
  if (isVeracityError(error)) return { category: "fatal", reason };

  return { category: "transient", reason };
}

// ---------------------------------------------------------------------------
// HTTP status mapping
// ---------------------------------------------------------------------------

export interface HttpFailure {
  readonly status: number;
  readonly body: string;
  readonly headers: Headers;
}

const BODY_SNIPPET_LENGTH = 300;

export function describeFailure(backend: string, failure: HttpFailure): string {
  const body = failure.body.trim().slice(0, BODY_SNIPPET_LENGTH);
  return `${backend}: HTTP ${failure.status}${body ? `: ${body}` : ""}`;
}

/**
 * Generic status table: 401/403 auth, 429 rate limit, 400/404/422 rejected,
 * everything else a retryable provider error.
 */
export function errorFromHttpStatus(backend: string, failure: HttpFailure, now = Date.now()): Error {
  const message = describeFailure(backend, failure);
  const { status } = failure;

  if (status === 401 || status === 403) {
    return new PermissionError({ code: "PROVIDER_AUTH_FAILED", message });
  }
  if (status === 429) {
    return new RateLimitError({
      code: "PROVIDER_RATE_LIMITED",
      message,
      retryAfterMs: parseRetryAfterHeader(failure.headers.get("retry-after"), now),
    });
  }
  if (status === 400 || status === 404 || status === 422) {
    return new ExternalError({ code: "PROVIDER_REQUEST_REJECTED", message, upstreamStatus: status });
  }
  return new ExternalError({ code: "PROVIDER_ERROR", message, upstreamStatus: status });
}

// ---------------------------------------------------------------------------
// Retry-after hints
// ---------------------------------------------------------------------------

/** Maximum honoured Retry-After header (5 minutes) */
export const MAX_RETRY_AFTER_MS = 300_000;

/** Safety margin added to a Gemini RetryInfo delay */
export const GEMINI_RETRY_BUFFER_MS = 5_000;

/**
 * `Retry-After` as integer seconds or an HTTP date.
 */
export function parseRetryAfterHeader(value: string | null | undefined, now = Date.now()): number | undefined {
  if (value === null || value === undefined || value.trim() === "") return undefined;

  const seconds = Number(value);
  if (!Number.isNaN(seconds) && seconds >= 0) {
    return Math.min(seconds * 1000, MAX_RETRY_AFTER_MS);
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    return Math.min(Math.max(0, date - now), MAX_RETRY_AFTER_MS);
  }

  return undefined;
}

const GEMINI_RETRY_DELAY = /["']retryDelay["']\s*:\s*["'](\d+(?:\.\d+)?)s["']/;

/**
 * Gemini puts the delay in a `google.rpc.RetryInfo` detail
 * (`"retryDelay": "13s"`), sometimes only inside the message text.
 */
export function retryDelayFromGemini(body: string): number | undefined {
  const match = GEMINI_RETRY_DELAY.exec(body);
  if (!match?.[1]) return undefined;
  return Math.round(Number(match[1]) * 1000) + GEMINI_RETRY_BUFFER_MS;
}

const OPENAI_TRY_AGAIN = /try again in (\d+(?:\.\d+)?)\s*(ms|s)\b/i;

/**
 * OpenAI-compatible APIs say "Please try again in 20s" (or "in 850ms").
 */
export function retryDelayFromOpenAi(message: string): number | undefined {
  const match = OPENAI_TRY_AGAIN.exec(message);
  if (!match?.[1]) return undefined;
  const amount = Number(match[1]);
  return Math.ceil(match[2]?.toLowerCase() === "ms" ? amount : amount * 1000);
}
