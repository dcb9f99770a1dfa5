/**
 * Dify chat-messages API.
 *
 * One application key per provider in practice; keys rotate only after a
 * failure. Streams use Dify's own SSE events (`message`, `agent_message`,
 * `message_end`, `error`).
 */

import { ExternalError, isExternalError, RateLimitError } from "@veracity/errors";
import { z } from "zod";
import { expectShape, parseJsonBody, withResponse } from "../http.js";
import type { Logger } from "../logger.js";
import { parseSseJson } from "../sse.js";
import { bearer, collectStream, resolveBaseUrl, type StreamStep } from "./shared.js";
import type { BackendAdapter, BackendCall, BackendDefaults, BackendReply, BackendSettings } from "./types.js";

export const DIFY_DEFAULTS: BackendDefaults = {
  name: "Dify",
  baseUrl: "https://api.dify.ai/v1",
  models: ["Dify App"],
  rotation: "manual",
  maxAttempts: 3,
  retryDelayMs: 2_000,
  rateLimitDelayMs: 60_000,
  promptStyle: "json",
  referenceLimit: 8_000,
};

/** End-user identifier Dify requires on every message */
export const DIFY_USER = "veracity-gateway";

const BlockingResponseSchema = z.object({
  answer: z.string().optional(),
  message: z.string().optional(),
  data: z.object({ answer: z.string().optional() }).optional(),
});

const StreamEventSchema = z.object({
  event: z.string(),
  answer: z.string().optional(),
  message: z.string().optional(),
  status: z.union([z.number(), z.string()]).optional(),
});

/** Dify's API lives under /v1; accept bases given with or without it. */
export function normalizeDifyBaseUrl(url: string): string {
  const trimmed = url.replace(/\/+$/, "");
  return trimmed.endsWith("/v1") ? trimmed : `${trimmed}/v1`;
}

function streamStep(data: string): StreamStep {
  const parsed = StreamEventSchema.safeParse(parseSseJson(data));
  if (!parsed.success) return {};
  const event = parsed.data;

  switch (event.event) {
    case "message":
    case "agent_message":
      return event.answer ? { text: event.answer } : {};
    case "message_end":
      return { done: true };
    case "error": {
      const message = `dify: ${event.message ?? "stream error"}`;
      if (String(event.status) === "429") {
        return { error: new RateLimitError({ code: "PROVIDER_RATE_LIMITED", message }) };
      }
      return { error: new ExternalError({ code: "PROVIDER_ERROR", message }) };
    }
    default:
      return {};
  }
}

function blockingAnswer(value: unknown): string {
  const body = expectShape("dify", BlockingResponseSchema, value);
  const answer = body.answer || body.message || body.data?.answer;
  if (!answer) {
    throw new ExternalError({ code: "PROVIDER_BAD_RESPONSE", message: "dify: response carries no answer" });
  }
  return answer;
}

/** Plain-http endpoints that refuse the request may only speak https. */
function shouldUpgrade(base: string, error: unknown): boolean {
  if (!base.startsWith("http://") || !isExternalError(error)) return false;
  return error.code === "PROVIDER_UNAVAILABLE" || error.upstreamStatus === 405;
}

export function createDifyBackend(settings: BackendSettings): BackendAdapter {
  let baseUrl = normalizeDifyBaseUrl(resolveBaseUrl("dify", settings.baseUrl, DIFY_DEFAULTS.baseUrl));
  const logger: Logger = settings.logger;

  /**
   * Retries over https only when the plain-http attempt failed before a
   * response arrived. `send` calls `answered` once it holds a successful
   * response; anything thrown after that (a broken stream) is not retried.
   */
  async function withUpgrade<T>(send: (base: string, answered: () => void) => Promise<T>): Promise<T> {
    const base = baseUrl;
    let responded = false;
    try {
      return await send(base, () => {
        responded = true;
      });
    } catch (error) {
      if (responded || !shouldUpgrade(base, error)) throw error;
      const upgraded = `https://${base.slice("http://".length)}`;
      logger.warn(`dify: ${base} refused the request, retrying over ${upgraded}`);
      const result = await send(upgraded, () => {});
      baseUrl = upgraded;
      return result;
    }
  }

  return {
    type: "dify",
    defaults: DIFY_DEFAULTS,
    baseUrl: () => baseUrl,

    async complete(call: BackendCall): Promise<BackendReply> {
      return withUpgrade((base, answered) =>
        withResponse(
          {
            backend: "dify",
            url: `${base}/chat-messages`,
            headers: bearer(call.key),
            body: {
              inputs: {},
              query: call.prompt,
              response_mode: call.stream ? "streaming" : "blocking",
              user: DIFY_USER,
              conversation_id: "",
              ...(settings.appId ? { app_id: settings.appId } : {}),
            },
            timeoutMs: settings.timeoutMs,
            signal: call.signal,
          },
          async (response, signal) => {
            answered();
            if (call.stream) {
              return {
                text: await collectStream(response, signal, (event) => streamStep(event.data), call.onChunk),
              };
            }
            return { text: blockingAnswer(parseJsonBody("dify", await response.text())) };
          },
        ),
      );
    },

    async validateKey(key: string, signal?: AbortSignal): Promise<boolean> {
      return withUpgrade((base) =>
        withResponse(
          {
            backend: "dify",
            url: `${base}/parameters`,
            headers: bearer(key),
            timeoutMs: settings.timeoutMs,
            signal,
          },
          async () => true,
        ),
      );
    },
  };
}
