/**
 * Shared HTTP utility: fetch + timeout + error classification.
 */

import { ExternalError, getErrorMessage, isVeracityError, TimeoutError } from "@veracity/errors";
import type { z } from "zod";
import { errorFromHttpStatus, type HttpFailure } from "./classify.js";
import { abortReason } from "./wait.js";

export const DEFAULT_TIMEOUT_MS = 60_000;

/** Backend hook for non-2xx responses; `undefined` falls back to the status table */
export type ErrorMapper = (failure: HttpFailure) => Error | undefined;

export interface HttpRequest {
  /** Used as the prefix of error messages */
  readonly backend: string;
  readonly url: string;
  readonly method?: "GET" | "POST";
  readonly headers?: Readonly<Record<string, string>>;
  /** JSON-encoded when present */
  readonly body?: unknown;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
  readonly mapError?: ErrorMapper;
}

/**
 * Perform the request and hand a successful response to `consume`. The
 * timeout and the caller's signal stay armed until `consume` settles, so a
 * stalled stream is cut off like a stalled request.
 */
export async function withResponse<T>(
  request: HttpRequest,
  consume: (response: Response, signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const timeoutMs = request.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  // Link external signal to internal controller
  const external = request.signal;
  const onExternalAbort = () => controller.abort();
  if (external?.aborted) {
    controller.abort();
  } else {
    external?.addEventListener("abort", onExternalAbort, { once: true });
  }

  const hasBody = request.body !== undefined;

  try {
    const response = await fetch(request.url, {
      method: request.method ?? (hasBody ? "POST" : "GET"),
      headers: { ...(hasBody ? { "content-type": "application/json" } : {}), ...request.headers },
      ...(hasBody ? { body: JSON.stringify(request.body) } : {}),
      signal: controller.signal,
    });

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      const failure: HttpFailure = { status: response.status, body, headers: response.headers };
      throw request.mapError?.(failure) ?? errorFromHttpStatus(request.backend, failure);
    }

    return await consume(response, controller.signal);
  } catch (error) {
    if (isVeracityError(error)) {
      throw error;
    }

    if (external?.aborted) {
      throw abortReason(external);
    }

    if (timedOut) {
      throw new TimeoutError({
        code: "PROVIDER_TIMEOUT",
        message: `${request.backend}: request timed out after ${timeoutMs}ms`,
        timeoutMs,
      });
    }

    throw new ExternalError({
      code: "PROVIDER_UNAVAILABLE",
      message: `${request.backend}: ${getErrorMessage(error)}`,
      cause: error instanceof Error ? error : undefined,
    });
  } finally {
    clearTimeout(timeout);
    external?.removeEventListener("abort", onExternalAbort);
  }
}

/** Non-JSON bodies are PROVIDER_BAD_RESPONSE. */
export function parseJsonBody(backend: string, text: string): unknown {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ExternalError({
      code: "PROVIDER_BAD_RESPONSE",
      message: `${backend}: response is not JSON: ${text.slice(0, 200)}`,
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parsed;
}

/**
 * Validate a decoded body against the backend's response schema.
 */
export function expectShape<S extends z.ZodTypeAny>(backend: string, schema: S, value: unknown): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "invalid shape";
    throw new ExternalError({
      code: "PROVIDER_BAD_RESPONSE",
      message: `${backend}: unexpected response shape (${where})`,
    });
  }
  return result.data;
}
