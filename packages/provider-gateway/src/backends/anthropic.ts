/**
 * Anthropic Messages API.
 *
 * Replies are often wrapped in a ```json fence or use a bracketed
 * "判断结果：【是】" layout; the normalizer handles both.
 */

import { ExternalError, RateLimitError } from "@veracity/errors";
import { z } from "zod";
import { describeFailure, type HttpFailure, parseRetryAfterHeader } from "../classify.js";
import { expectShape, parseJsonBody, withResponse } from "../http.js";
import { parseSseJson } from "../sse.js";
import { collectStream, resolveBaseUrl, type StreamStep } from "./shared.js";
import type { BackendAdapter, BackendCall, BackendDefaults, BackendReply, BackendSettings } from "./types.js";

export const ANTHROPIC_MODELS = [
  "claude-sonnet-4-20250514",
  "claude-3-7-sonnet-20250314",
  "claude-3-5-sonnet-20241022",
  "claude-3-5-haiku-20241022",
  "claude-3-opus-20240229",
] as const;

export const ANTHROPIC_DEFAULTS: BackendDefaults = {
  name: "Anthropic Claude",
  baseUrl: "https://api.anthropic.com",
  models: ANTHROPIC_MODELS,
  rotation: "manual",
  maxAttempts: 3,
  retryDelayMs: 5_000,
  rateLimitDelayMs: 60_000,
  promptStyle: "json",
};

export const ANTHROPIC_VERSION = "2023-06-01";

const MAX_TOKENS = 1000;
const THINKING_BUDGET = 2000;

const MessageResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
      thinking: z.string().optional(),
    }),
  ),
});

const StreamEventSchema = z.object({
  type: z.string(),
  delta: z.object({ type: z.string(), text: z.string().optional() }).optional(),
  error: z.object({ type: z.string().optional(), message: z.string().optional() }).optional(),
});

export function supportsThinking(model: string): boolean {
  return model.includes("claude-3-7");
}

function mapAnthropicError(failure: HttpFailure): Error | undefined {
  // 529: overloaded
  if (failure.status !== 529) return undefined;
  return new RateLimitError({
    code: "PROVIDER_RATE_LIMITED",
    message: describeFailure("anthropic", failure),
    retryAfterMs: parseRetryAfterHeader(failure.headers.get("retry-after")),
  });
}

function streamStep(data: string): StreamStep {
  const parsed = StreamEventSchema.safeParse(parseSseJson(data));
  if (!parsed.success) return {};
  const event = parsed.data;

  if (event.type === "content_block_delta" && event.delta?.type === "text_delta") {
    return event.delta.text ? { text: event.delta.text } : {};
  }
  if (event.type === "message_stop") return { done: true };
  if (event.type === "error") {
    const message = `anthropic: ${event.error?.type ?? "error"}: ${event.error?.message ?? "stream error"}`;
    if (event.error?.type === "overloaded_error" || event.error?.type === "rate_limit_error") {
      return { error: new RateLimitError({ code: "PROVIDER_RATE_LIMITED", message }) };
    }
    return { error: new ExternalError({ code: "PROVIDER_ERROR", message }) };
  }
  return {};
}

export function createAnthropicBackend(settings: BackendSettings): BackendAdapter {
  const baseUrl = resolveBaseUrl("anthropic", settings.baseUrl, ANTHROPIC_DEFAULTS.baseUrl);
  const headers = (key: string) => ({ "x-api-key": key, "anthropic-version": ANTHROPIC_VERSION });

  return {
    type: "anthropic",
    defaults: ANTHROPIC_DEFAULTS,
    baseUrl: () => baseUrl,

    async complete(call: BackendCall): Promise<BackendReply> {
      const thinking = settings.showThinking === true && supportsThinking(call.model);
      return withResponse(
        {
          backend: "anthropic",
          url: `${baseUrl}/v1/messages`,
          headers: headers(call.key),
          body: {
            model: call.model,
            // max_tokens must exceed the thinking budget
            max_tokens: thinking ? THINKING_BUDGET + MAX_TOKENS : MAX_TOKENS,
            messages: [{ role: "user", content: call.prompt }],
            ...(thinking ? { thinking: { type: "enabled", budget_tokens: THINKING_BUDGET } } : {}),
            ...(call.stream ? { stream: true } : {}),
          },
          timeoutMs: settings.timeoutMs,
          signal: call.signal,
          mapError: mapAnthropicError,
        },
        async (response, signal) => {
          if (call.stream) {
            return { text: await collectStream(response, signal, (event) => streamStep(event.data), call.onChunk) };
          }
          const message = expectShape(
            "anthropic",
            MessageResponseSchema,
            parseJsonBody("anthropic", await response.text()),
          );
          const text = message.content
            .filter((block) => block.type === "text")
            .map((block) => block.text ?? "")
            .join("");
          const reasoning = message.content
            .filter((block) => block.type === "thinking")
            .map((block) => block.thinking ?? "")
            .join("\n");
          return reasoning ? { text, thinking: reasoning } : { text };
        },
      );
    },

    async validateKey(key: string, signal?: AbortSignal): Promise<boolean> {
      return withResponse(
        {
          backend: "anthropic",
          url: `${baseUrl}/v1/messages`,
          headers: headers(key),
          body: {
            model: ANTHROPIC_MODELS[0],
            max_tokens: 1,
            messages: [{ role: "user", content: "Hi" }],
          },
          timeoutMs: settings.timeoutMs,
          signal,
          mapError: mapAnthropicError,
        },
        async () => true,
      );
    },
  };
}
