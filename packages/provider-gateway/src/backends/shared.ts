import { ValidationError } from "@veracity/errors";
import { readSseEvents, type SseEvent } from "../sse.js";
import { abortReason } from "../wait.js";

export interface StreamStep {
  readonly text?: string;
  readonly done?: boolean;
  readonly error?: Error;
}

/**
 * Drain an SSE body, forwarding text as it arrives. Returns the full text
 * once the backend's terminal event (or end of stream) is seen; throws the
 * abort reason if `signal` fired first.
 */
export async function collectStream(
  response: Response,
  signal: AbortSignal,
  extract: (event: SseEvent) => StreamStep,
  onChunk?: (text: string) => void,
): Promise<string> {
  let text = "";
  for await (const event of readSseEvents(response.body, signal)) {
    const step = extract(event);
    if (step.error) throw step.error;
    if (step.text) {
      text += step.text;
      onChunk?.(step.text);
    }
    if (step.done) return text;
  }
  if (signal.aborted) throw abortReason(signal);
  return text;
}

/**
 * Check and normalize a configured endpoint: must be http(s), no trailing slash.
 */
export function resolveBaseUrl(backend: string, configured: string | undefined, fallback: string): string {
  const raw = (configured ?? fallback).trim();
  let url: URL;
  try {
    url = new URL(raw);
  } catch (error) {
    throw new ValidationError({
      code: "PROVIDER_INVALID_CONFIG",
      message: `${backend}: invalid base URL "${raw}"`,
      cause: error instanceof Error ? error : undefined,
    });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ValidationError({
      code: "PROVIDER_INVALID_CONFIG",
      message: `${backend}: base URL must use http or https, got "${url.protocol}"`,
    });
  }
  return raw.replace(/\/+$/, "");
}

export function bearer(key: string): Record<string, string> {
  return { authorization: `Bearer ${key}` };
}
