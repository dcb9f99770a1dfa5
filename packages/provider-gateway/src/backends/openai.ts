/**
 * OpenAI-compatible chat completions.
 *
 * Errors are classified purely by HTTP status. A 429 carrying
 * `insufficient_quota` is a billing problem, not a rate limit, and ends the
 * evaluation.
 */

import { PermissionError, RateLimitError } from "@veracity/errors";
import { z } from "zod";
import { describeFailure, type HttpFailure, parseRetryAfterHeader, retryDelayFromOpenAi } from "../classify.js";
import { expectShape, parseJsonBody, withResponse } from "../http.js";
import { ANALYST_SYSTEM_PROMPT } from "../prompts.js";
import { parseSseJson } from "../sse.js";
import { bearer, collectStream, resolveBaseUrl, type StreamStep } from "./shared.js";
import type { BackendAdapter, BackendCall, BackendDefaults, BackendReply, BackendSettings } from "./types.js";

export const OPENAI_MODELS = ["gpt-4o", "gpt-4o-mini", "gpt-4-turbo", "gpt-3.5-turbo", "gpt-4"] as const;

export const OPENAI_DEFAULTS: BackendDefaults = {
  name: "OpenAI",
  baseUrl: "https://api.openai.com/v1",
  models: OPENAI_MODELS,
  rotation: "manual",
  maxAttempts: 3,
  retryDelayMs: 5_000,
  rateLimitDelayMs: 30_000,
  promptStyle: "json",
};

// ---------------------------------------------------------------------------
// Chat completions wire format (shared with other compatible backends)
// ---------------------------------------------------------------------------

export const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .min(1),
});

const ChatChunkSchema = z.object({
  choices: z
    .array(z.object({ delta: z.object({ content: z.string().nullable().optional() }).optional() }))
    .default([]),
});

export function chatCompletionText(backend: string, value: unknown): string {
  const completion = expectShape(backend, ChatCompletionSchema, value);
  return completion.choices[0]?.message.content ?? "";
}

/** `choices[0].delta.content` of a streamed chunk; `[DONE]` ends the reader */
export function chatStreamStep(data: string): StreamStep {
  const parsed = ChatChunkSchema.safeParse(parseSseJson(data));
  if (!parsed.success) return {};
  const text = parsed.data.choices[0]?.delta?.content;
  return text ? { text } : {};
}

export interface ChatRequestOptions {
  readonly systemPrompt: string;
  readonly temperature: number;
  readonly maxTokens: number;
}

export function chatRequestBody(call: BackendCall, options: ChatRequestOptions): Record<string, unknown> {
  return {
    model: call.model,
    messages: [
      { role: "system", content: options.systemPrompt },
      { role: "user", content: call.prompt },
    ],
    temperature: options.temperature,
    max_tokens: options.maxTokens,
    stream: call.stream,
  };
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

function mapOpenAiError(failure: HttpFailure): Error | undefined {
  if (failure.status !== 429) return undefined;
  const message = describeFailure("openai", failure);
  if (failure.body.toLowerCase().includes("insufficient_quota")) {
    return new PermissionError({ code: "PROVIDER_QUOTA_EXCEEDED", message });
  }
  return new RateLimitError({
    code: "PROVIDER_RATE_LIMITED",
    message,
    retryAfterMs: retryDelayFromOpenAi(failure.body) ?? parseRetryAfterHeader(failure.headers.get("retry-after")),
  });
}

export function createOpenAiBackend(settings: BackendSettings): BackendAdapter {
  const baseUrl = resolveBaseUrl("openai", settings.baseUrl, OPENAI_DEFAULTS.baseUrl);

  return {
    type: "openai",
    defaults: OPENAI_DEFAULTS,
    baseUrl: () => baseUrl,

    async complete(call: BackendCall): Promise<BackendReply> {
      return withResponse(
        {
          backend: "openai",
          url: `${baseUrl}/chat/completions`,
          headers: bearer(call.key),
          body: chatRequestBody(call, { systemPrompt: ANALYST_SYSTEM_PROMPT, temperature: 0, maxTokens: 1000 }),
          timeoutMs: settings.timeoutMs,
          signal: call.signal,
          mapError: mapOpenAiError,
        },
        async (response, signal) => {
          if (call.stream) {
            return { text: await collectStream(response, signal, (event) => chatStreamStep(event.data), call.onChunk) };
          }
          return { text: chatCompletionText("openai", parseJsonBody("openai", await response.text())) };
        },
      );
    },

    async validateKey(key: string, signal?: AbortSignal): Promise<boolean> {
      return withResponse(
        {
          backend: "openai",
          url: `${baseUrl}/models`,
          headers: bearer(key),
          timeoutMs: settings.timeoutMs,
          signal,
          mapError: mapOpenAiError,
        },
        async () => true,
      );
    },
  };
}
