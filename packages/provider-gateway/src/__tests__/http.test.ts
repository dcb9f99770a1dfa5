import { ExternalError, PermissionError, RateLimitError, TimeoutError } from "@veracity/errors";
import { jsonResponse, mockFetch, textResponse } from "@veracity/test-utils";
import { afterEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { expectShape, type HttpRequest, parseJsonBody, withResponse } from "../http.js";

/** Never answers; rejects once the request signal aborts. */
function hangingFetch() {
  return vi.fn<typeof fetch>(
    (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        const fail = () => reject(new DOMException("This operation was aborted", "AbortError"));
        if (signal?.aborted) fail();
        signal?.addEventListener("abort", fail, { once: true });
      }),
  );
}

function requestJson(request: HttpRequest): Promise<unknown> {
  return withResponse(request, async (response) => parseJsonBody(request.backend, await response.text()));
}

describe("withResponse", () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it("posts a JSON body and parses the reply", async () => {
    const fetchMock = mockFetch(jsonResponse({ ok: true }));
    globalThis.fetch = fetchMock;

    const result = await requestJson({
      backend: "test",
      url: "https://backend.test/v1/run",
      headers: { authorization: "Bearer test-key" },
      body: { query: "hi" },
    });

    expect(result).toEqual({ ok: true });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://backend.test/v1/run");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "content-type": "application/json", authorization: "Bearer test-key" });
    expect(init?.body).toBe('{"query":"hi"}');
  });

  it("uses GET without a body", async () => {
    const fetchMock = mockFetch(jsonResponse([]));
    globalThis.fetch = fetchMock;

    await requestJson({ backend: "test", url: "https://backend.test/models" });

    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe("GET");
  });

  it("maps error statuses through the status table", async () => {
    globalThis.fetch = mockFetch(textResponse("denied", { status: 403 }));

    const error = await requestJson({ backend: "test", url: "https://backend.test" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PermissionError);
    expect(error).toMatchObject({ code: "PROVIDER_AUTH_FAILED", message: "test: HTTP 403: denied" });
  });

  it("prefers the backend's own error mapper", async () => {
    globalThis.fetch = mockFetch(textResponse("overloaded", { status: 529 }));

    const error = await requestJson({
      backend: "test",
      url: "https://backend.test",
      mapError: (failure) =>
        failure.status === 529
          ? new RateLimitError({ code: "PROVIDER_RATE_LIMITED", message: "overloaded" })
          : undefined,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitError);
  });

  it("wraps network failures", async () => {
    globalThis.fetch = mockFetch(new TypeError("fetch failed"));

    const error = await requestJson({ backend: "test", url: "https://backend.test" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalError);
    expect(error).toMatchObject({ code: "PROVIDER_UNAVAILABLE", message: "test: fetch failed" });
  });

  it("turns an expired timeout into a TimeoutError", async () => {
    globalThis.fetch = hangingFetch();

    const error = await requestJson({ backend: "test", url: "https://backend.test", timeoutMs: 10 }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ code: "PROVIDER_TIMEOUT", message: "test: request timed out after 10ms" });
  });

  it("rethrows the caller's abort reason", async () => {
    globalThis.fetch = hangingFetch();
    const controller = new AbortController();
    controller.abort(new Error("stopped by caller"));

    await expect(
      requestJson({ backend: "test", url: "https://backend.test", signal: controller.signal }),
    ).rejects.toThrow("stopped by caller");
  });

  it("keeps the timeout armed while the body is consumed", async () => {
    globalThis.fetch = mockFetch(jsonResponse({}));

    const error = await withResponse(
      { backend: "test", url: "https://backend.test", timeoutMs: 10 },
      (_response, signal) =>
        new Promise<never>((_resolve, reject) => {
          signal.addEventListener("abort", () => reject(new DOMException("aborted", "AbortError")), { once: true });
        }),
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
  });
});

describe("parseJsonBody", () => {
  it("rejects non-JSON bodies as bad responses", () => {
    expect(() => parseJsonBody("test", "<html>")).toThrow("test: response is not JSON: <html>");
  });
});

describe("expectShape", () => {
  it("names the first offending field", () => {
    const schema = z.object({ answer: z.string() });
    expect(() => expectShape("test", schema, { answer: 1 })).toThrow(
      "test: unexpected response shape (answer: Expected string, received number)",
    );
  });

  it("returns the parsed value", () => {
    expect(expectShape("test", z.object({ answer: z.string() }), { answer: "ok" })).toEqual({ answer: "ok" });
  });
});
