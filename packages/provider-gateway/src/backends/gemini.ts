/**
 * Google Gemini (generateContent REST API).
 *
 * Multi-key, auto-rotating. A rate limit arrives as HTTP 429 /
 * RESOURCE_EXHAUSTED with a RetryInfo delay, which is honoured plus a
 * small buffer.
 */

import { ExternalError, PermissionError, RateLimitError } from "@veracity/errors";
import { z } from "zod";
import { describeFailure, type HttpFailure, parseRetryAfterHeader, retryDelayFromGemini } from "../classify.js";
import { expectShape, parseJsonBody, withResponse } from "../http.js";
import { parseSseJson } from "../sse.js";
import { collectStream, resolveBaseUrl } from "./shared.js";
import type { BackendAdapter, BackendCall, BackendDefaults, BackendReply, BackendSettings } from "./types.js";

export const GEMINI_MODELS = [
  "gemini-2.5-flash",
  "gemini-2.5-pro",
  "gemini-2.0-flash-thinking-exp-1219",
  "gemini-1.5-flash",
  "gemini-1.5-pro",
] as const;

export const GEMINI_DEFAULTS: BackendDefaults = {
  name: "Google Gemini",
  baseUrl: "https://generativelanguage.googleapis.com",
  models: GEMINI_MODELS,
  rotation: "auto",
  maxAttempts: 5,
  retryDelayMs: 60_000,
  rateLimitDelayMs: 60_000,
  promptStyle: "json",
};

const KEY_FORMAT = /^[A-Za-z0-9_-]{20,}$/;

const PartSchema = z.object({
  text: z.string().optional(),
  thought: z.boolean().optional(),
});

const GenerateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(PartSchema).default([]) }).optional(),
        finishReason: z.string().optional(),
      }),
    )
    .default([]),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
});

type GenerateResponse = z.infer<typeof GenerateResponseSchema>;

function splitParts(response: GenerateResponse): BackendReply {
  const parts = response.candidates[0]?.content?.parts ?? [];
  const text = parts
    .filter((part) => part.thought !== true)
    .map((part) => part.text ?? "")
    .join("");
  const thinking = parts
    .filter((part) => part.thought === true)
    .map((part) => part.text ?? "")
    .join("");
  return thinking ? { text, thinking } : { text };
}

function mapGeminiError(failure: HttpFailure): Error | undefined {
  const message = describeFailure("gemini", failure);
  if (failure.status === 429 || failure.body.includes("RESOURCE_EXHAUSTED")) {
    return new RateLimitError({
      code: "PROVIDER_RATE_LIMITED",
      message,
      retryAfterMs:
        retryDelayFromGemini(failure.body) ?? parseRetryAfterHeader(failure.headers.get("retry-after")),
    });
  }
  if (
    failure.status === 400 &&
    (failure.body.includes("API_KEY_INVALID") || failure.body.includes("API key not valid"))
  ) {
    return new PermissionError({ code: "PROVIDER_AUTH_FAILED", message });
  }
  return undefined;
}

export function createGeminiBackend(settings: BackendSettings): BackendAdapter {
  const baseUrl = resolveBaseUrl("gemini", settings.baseUrl, GEMINI_DEFAULTS.baseUrl);

  function toReply(value: unknown): BackendReply {
    const response = expectShape("gemini", GenerateResponseSchema, value);
    if (response.candidates.length === 0) {
      const blocked = response.promptFeedback?.blockReason;
      if (blocked) {
        throw new ExternalError({
          code: "PROVIDER_REQUEST_REJECTED",
          message: `gemini: prompt blocked (${blocked})`,
        });
      }
      throw new ExternalError({ code: "PROVIDER_BAD_RESPONSE", message: "gemini: response has no candidates" });
    }
    return splitParts(response);
  }

  return {
    type: "gemini",
    defaults: GEMINI_DEFAULTS,
    baseUrl: () => baseUrl,

    async complete(call: BackendCall): Promise<BackendReply> {
      const method = call.stream ? "streamGenerateContent?alt=sse" : "generateContent";
      return withResponse(
        {
          backend: "gemini",
          url: `${baseUrl}/v1beta/models/${encodeURIComponent(call.model)}:${method}`,
          headers: { "x-goog-api-key": call.key },
          body: {
            contents: [{ role: "user", parts: [{ text: call.prompt }] }],
            generationConfig: { temperature: 0 },
          },
          timeoutMs: settings.timeoutMs,
          signal: call.signal,
          mapError: mapGeminiError,
        },
        async (response, signal) => {
          if (!call.stream) {
            return toReply(parseJsonBody("gemini", await response.text()));
          }
          const text = await collectStream(
            response,
            signal,
            (event) => {
              const parsed = GenerateResponseSchema.safeParse(parseSseJson(event.data));
              return parsed.success ? { text: splitParts(parsed.data).text } : {};
            },
            call.onChunk,
          );
          return { text };
        },
      );
    },

    async validateKey(key: string, signal?: AbortSignal): Promise<boolean> {
      if (!KEY_FORMAT.test(key)) return false;
      return withResponse(
        {
          backend: "gemini",
          url: `${baseUrl}/v1beta/models/${GEMINI_MODELS[0]}`,
          headers: { "x-goog-api-key": key },
          timeoutMs: settings.timeoutMs,
          signal,
          mapError: mapGeminiError,
        },
        async () => true,
      );
    },
  };
}
