import { ExternalError, RateLimitError } from "@veracity/errors";
import { jsonResponse, mockFetch, recordedRequest, sseData, sseResponse, textResponse } from "@veracity/test-utils";
import { afterEach, describe, expect, it } from "vitest";
import { createDifyBackend, normalizeDifyBaseUrl } from "../../backends/dify.js";
import { silentLogger } from "../../logger.js";

const settings = { timeoutMs: 5_000, logger: silentLogger };
const call = { key: "test-key", model: "Dify App", prompt: "judge this", stream: false };

describe("normalizeDifyBaseUrl", () => {
  it("appends /v1 once", () => {
    expect(normalizeDifyBaseUrl("https://dify.local")).toBe("https://dify.local/v1");
    expect(normalizeDifyBaseUrl("https://dify.local/v1/")).toBe("https://dify.local/v1");
  });
});

describe("createDifyBackend", () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it("sends a blocking chat message", async () => {
    const fetchMock = mockFetch(jsonResponse({ answer: "判断结果：是" }));
    globalThis.fetch = fetchMock;

    const reply = await createDifyBackend(settings).complete(call);

    expect(reply).toEqual({ text: "判断结果：是" });
    const request = recordedRequest(fetchMock);
    expect(request.url).toBe("https://api.dify.ai/v1/chat-messages");
    expect(request.headers.get("authorization")).toBe("Bearer test-key");
    expect(request.body).toEqual({
      inputs: {},
      query: "judge this",
      response_mode: "blocking",
      user: "veracity-gateway",
      conversation_id: "",
    });
  });

  it("includes the application id when configured", async () => {
    const fetchMock = mockFetch(jsonResponse({ answer: "ok" }));
    globalThis.fetch = fetchMock;

    await createDifyBackend({ ...settings, appId: "app-test" }).complete(call);

    expect(recordedRequest(fetchMock).body).toMatchObject({ app_id: "app-test" });
  });

  it("falls back to data.answer", async () => {
    globalThis.fetch = mockFetch(jsonResponse({ data: { answer: "nested" } }));

    expect(await createDifyBackend(settings).complete(call)).toEqual({ text: "nested" });
  });

  it("rejects a reply without an answer", async () => {
    globalThis.fetch = mockFetch(jsonResponse({}));

    const error = await createDifyBackend(settings)
      .complete(call)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalError);
    expect(error).toMatchObject({ code: "PROVIDER_BAD_RESPONSE", message: "dify: response carries no answer" });
  });

  it("collects message events until message_end", async () => {
    const fetchMock = mockFetch(
      sseResponse([
        sseData({ event: "message", answer: "是" }),
        sseData({ event: "agent_message", answer: "的" }),
        sseData({ event: "message_end" }),
      ]),
    );
    globalThis.fetch = fetchMock;

    const reply = await createDifyBackend(settings).complete({ ...call, stream: true });

    expect(reply).toEqual({ text: "是的" });
    expect(recordedRequest(fetchMock).body).toMatchObject({ response_mode: "streaming" });
  });

  it("raises a rate-limited stream error event", async () => {
    globalThis.fetch = mockFetch(sseResponse([sseData({ event: "error", status: 429, message: "rate limited" })]));

    await expect(createDifyBackend(settings).complete({ ...call, stream: true })).rejects.toBeInstanceOf(
      RateLimitError,
    );
  });

  it("upgrades a plain-http base after a network failure and keeps it", async () => {
    const fetchMock = mockFetch(new TypeError("fetch failed"), jsonResponse({ answer: "ok" }));
    globalThis.fetch = fetchMock;
    const backend = createDifyBackend({ ...settings, baseUrl: "http://dify.local" });

    expect(await backend.complete(call)).toEqual({ text: "ok" });
    expect(recordedRequest(fetchMock, 0).url).toBe("http://dify.local/v1/chat-messages");
    expect(recordedRequest(fetchMock, 1).url).toBe("https://dify.local/v1/chat-messages");
    expect(backend.baseUrl()).toBe("https://dify.local/v1");
  });

  it("upgrades after HTTP 405", async () => {
    const fetchMock = mockFetch(textResponse("", { status: 405 }), jsonResponse({ answer: "ok" }));
    globalThis.fetch = fetchMock;

    expect(await createDifyBackend({ ...settings, baseUrl: "http://dify.local/v1" }).complete(call)).toEqual({
      text: "ok",
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("keeps the plain-http base when a stream breaks after the response arrived", async () => {
    let pulls = 0;
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        pulls += 1;
        if (pulls === 1) controller.enqueue(new TextEncoder().encode(sseData({ event: "message", answer: "部分" })));
        else controller.error(new TypeError("terminated"));
      },
    });
    const fetchMock = mockFetch(
      new Response(body, { headers: { "content-type": "text/event-stream" } }),
      jsonResponse({ answer: "ok" }),
    );
    globalThis.fetch = fetchMock;
    const chunks: string[] = [];
    const backend = createDifyBackend({ ...settings, baseUrl: "http://dify.local" });

    await expect(
      backend.complete({ ...call, stream: true, onChunk: (text) => chunks.push(text) }),
    ).rejects.toMatchObject({ code: "PROVIDER_UNAVAILABLE" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(chunks).toEqual(["部分"]);
    expect(backend.baseUrl()).toBe("http://dify.local/v1");
  });

  it("does not retry an https base", async () => {
    const fetchMock = mockFetch(new TypeError("fetch failed"));
    globalThis.fetch = fetchMock;

    await expect(createDifyBackend(settings).complete(call)).rejects.toMatchObject({ code: "PROVIDER_UNAVAILABLE" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("validates a key through the parameters endpoint", async () => {
    const fetchMock = mockFetch(jsonResponse({ user_input_form: [] }));
    globalThis.fetch = fetchMock;

    expect(await createDifyBackend(settings).validateKey("test-key")).toBe(true);
    expect(recordedRequest(fetchMock)).toMatchObject({ url: "https://api.dify.ai/v1/parameters", method: "GET" });
  });
});
