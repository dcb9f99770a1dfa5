import { ExternalError, PermissionError, RateLimitError } from "@veracity/errors";
import { jsonResponse, mockFetch, recordedRequest, sseData, sseResponse, textResponse } from "@veracity/test-utils";
import { afterEach, describe, expect, it } from "vitest";
import { createOpenAiBackend } from "../../backends/openai.js";
import { silentLogger } from "../../logger.js";
import { ANALYST_SYSTEM_PROMPT } from "../../prompts.js";

const settings = { timeoutMs: 5_000, logger: silentLogger };
const call = { key: "test-key", model: "gpt-4o", prompt: "judge this", stream: false };

describe("createOpenAiBackend", () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it("posts a chat completion with a system prompt", async () => {
    const fetchMock = mockFetch(jsonResponse({ choices: [{ message: { content: '{"result":"是"}' } }] }));
    globalThis.fetch = fetchMock;

    const reply = await createOpenAiBackend(settings).complete(call);

    expect(reply).toEqual({ text: '{"result":"是"}' });
    const request = recordedRequest(fetchMock);
    expect(request.url).toBe("https://api.openai.com/v1/chat/completions");
    expect(request.headers.get("authorization")).toBe("Bearer test-key");
    expect(request.body).toEqual({
      model: "gpt-4o",
      messages: [
        { role: "system", content: ANALYST_SYSTEM_PROMPT },
        { role: "user", content: "judge this" },
      ],
      temperature: 0,
      max_tokens: 1000,
      stream: false,
    });
  });

  it("honours a compatible endpoint", async () => {
    const fetchMock = mockFetch(jsonResponse({ choices: [{ message: { content: "ok" } }] }));
    globalThis.fetch = fetchMock;

    await createOpenAiBackend({ ...settings, baseUrl: "https://llm.internal/v1/" }).complete(call);

    expect(recordedRequest(fetchMock).url).toBe("https://llm.internal/v1/chat/completions");
  });

  it("treats exhausted quota as a permission failure", async () => {
    globalThis.fetch = mockFetch(
      textResponse('{"error":{"code":"insufficient_quota","message":"You exceeded your current quota"}}', {
        status: 429,
      }),
    );

    const error = await createOpenAiBackend(settings)
      .complete(call)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PermissionError);
    expect(error).toMatchObject({ code: "PROVIDER_QUOTA_EXCEEDED" });
  });

  it("reads the suggested delay of a rate limit", async () => {
    globalThis.fetch = mockFetch(
      textResponse('{"error":{"message":"Rate limit reached. Please try again in 20s."}}', { status: 429 }),
    );

    const error = await createOpenAiBackend(settings)
      .complete(call)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ retryAfterMs: 20_000 });
  });

  it("collects streamed deltas until [DONE]", async () => {
    globalThis.fetch = mockFetch(
      sseResponse([
        sseData({ choices: [{ delta: { content: "判断结果：" } }] }),
        sseData({ choices: [{ delta: {} }] }),
        sseData({ choices: [{ delta: { content: "是" } }] }),
        sseData("[DONE]"),
      ]),
    );

    const reply = await createOpenAiBackend(settings).complete({ ...call, stream: true });

    expect(reply).toEqual({ text: "判断结果：是" });
  });

  it("rejects a completion without choices", async () => {
    globalThis.fetch = mockFetch(jsonResponse({ choices: [] }));

    const error = await createOpenAiBackend(settings)
      .complete(call)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalError);
    expect(error).toMatchObject({
      code: "PROVIDER_BAD_RESPONSE",
      message: "openai: unexpected response shape (choices: Array must contain at least 1 element(s))",
    });
  });

  describe("validateKey", () => {
    it("lists models", async () => {
      const fetchMock = mockFetch(jsonResponse({ data: [] }));
      globalThis.fetch = fetchMock;

      expect(await createOpenAiBackend(settings).validateKey("test-key")).toBe(true);
      expect(recordedRequest(fetchMock)).toMatchObject({ url: "https://api.openai.com/v1/models", method: "GET" });
    });

    it("throws on a rejected key", async () => {
      globalThis.fetch = mockFetch(textResponse("unauthorized", { status: 401 }));

      await expect(createOpenAiBackend(settings).validateKey("test-key")).rejects.toBeInstanceOf(PermissionError);
    });
  });
});
