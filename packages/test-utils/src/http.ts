/**
 * Builders for scripted `fetch` responses. Tests install them on
 * `globalThis.fetch` and restore the original in `afterEach`.
 */

import { type Mock, vi } from "vitest";

export interface ScriptedInit {
  readonly status?: number;
  readonly headers?: Readonly<Record<string, string>>;
}

export function jsonResponse(body: unknown, init: ScriptedInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    headers: { "content-type": "application/json", ...init.headers },
  });
}

export function textResponse(body: string, init: ScriptedInit = {}): Response {
  return new Response(body, { status: init.status ?? 200, headers: { ...init.headers } });
}

/** One `data:` frame; strings are sent verbatim (e.g. "[DONE]") */
export function sseData(payload: unknown): string {
  return `data: ${typeof payload === "string" ? payload : JSON.stringify(payload)}\n\n`;
}

/** Streams each frame as its own chunk */
export function sseResponse(frames: readonly string[], init: ScriptedInit = {}): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const frame of frames) controller.enqueue(encoder.encode(frame));
      controller.close();
    },
  });
  return new Response(body, {
    status: init.status ?? 200,
    headers: { "content-type": "text/event-stream", ...init.headers },
  });
}

export interface OpenSseStream {
  readonly response: Response;
  /** Called with the reason once the consumer cancels the body */
  readonly cancel: Mock<(reason: unknown) => void>;
}

/** Sends `frames` and then stays open until the body is cancelled */
export function openSseResponse(frames: readonly string[]): OpenSseStream {
  const encoder = new TextEncoder();
  const cancel = vi.fn<(reason: unknown) => void>();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const frame of frames) controller.enqueue(encoder.encode(frame));
    },
    cancel(reason) {
      cancel(reason);
    },
  });
  return { response: new Response(body, { headers: { "content-type": "text/event-stream" } }), cancel };
}

/**
 * A `fetch` mock answering with `responses` in order. An Error entry is
 * thrown instead, the way a failed network call rejects.
 */
export function mockFetch(...responses: readonly (Response | Error)[]) {
  const mock = vi.fn<typeof fetch>();
  for (const response of responses) {
    if (response instanceof Error) {
      mock.mockRejectedValueOnce(response);
    } else {
      mock.mockResolvedValueOnce(response);
    }
  }
  return mock;
}

export interface RecordedRequest {
  readonly url: string;
  readonly method: string;
  readonly headers: Headers;
  /** JSON-decoded request body, when there was one */
  readonly body: unknown;
}

/** The `index`-th request a fetch mock received. */
export function recordedRequest(mock: Mock<typeof fetch>, index = 0): RecordedRequest {
  const call = mock.mock.calls[index];
  if (!call) throw new Error(`fetch was not called ${index + 1} time(s)`);
  const [input, init] = call;
  const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
  return {
    url: typeof input === "string" ? input : input instanceof URL ? input.href : input.url,
    method: init?.method ?? "GET",
    headers: new Headers(init?.headers),
    body,
  };
}
