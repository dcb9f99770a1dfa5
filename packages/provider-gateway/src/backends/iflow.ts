/**
 * iFlow (OpenAI-compatible chat completions).
 *
 * Failures can arrive inside an HTTP 200 body as `{"status": "434", "msg": …}`.
 * Those business codes are this backend's own contract and are mapped here
 * only.
 */

import { ExternalError, PermissionError, RateLimitError } from "@veracity/errors";
import { z } from "zod";
import { parseJsonBody, withResponse } from "../http.js";
import { EXPERT_SYSTEM_PROMPT } from "../prompts.js";
import { bearer, collectStream, resolveBaseUrl } from "./shared.js";
import { chatCompletionText, chatRequestBody, chatStreamStep } from "./openai.js";
import type { BackendAdapter, BackendCall, BackendDefaults, BackendReply, BackendSettings } from "./types.js";

export const IFLOW_MODELS = ["qwen3-max", "kimi-k2-0905", "glm-4.6", "deepseek-v3.2"] as const;

export const IFLOW_DEFAULTS: BackendDefaults = {
  name: "iFlow",
  baseUrl: "https://apis.iflow.cn/v1",
  models: IFLOW_MODELS,
  rotation: "manual",
  maxAttempts: 3,
  retryDelayMs: 2_000,
  rateLimitDelayMs: 60_000,
  promptStyle: "labeled",
  referenceLimit: 3_000,
};

const AUTH_STATUSES: ReadonlySet<string> = new Set(["401", "403", "434"]);
const RATE_LIMIT_STATUSES: ReadonlySet<string> = new Set(["429", "449"]);
const OK_STATUSES: ReadonlySet<string> = new Set(["0", "200"]);

const BusinessEnvelopeSchema = z.object({
  status: z.union([z.string(), z.number()]).optional(),
  msg: z.string().nullable().optional(),
});

/**
 * Throw the error a business status stands for; returns quietly for
 * bodies without one.
 */
export function checkBusinessStatus(value: unknown): void {
  const envelope = BusinessEnvelopeSchema.safeParse(value);
  if (!envelope.success || envelope.data.status === undefined) return;

  const status = String(envelope.data.status);
  if (OK_STATUSES.has(status)) return;

  const message = `iflow: business status ${status}${envelope.data.msg ? `: ${envelope.data.msg}` : ""}`;
  if (AUTH_STATUSES.has(status)) {
    throw new PermissionError({ code: "PROVIDER_AUTH_FAILED", message });
  }
  if (RATE_LIMIT_STATUSES.has(status)) {
    throw new RateLimitError({ code: "PROVIDER_RATE_LIMITED", message });
  }
  throw new ExternalError({ code: "PROVIDER_ERROR", message });
}

export function createIflowBackend(settings: BackendSettings): BackendAdapter {
  const baseUrl = resolveBaseUrl("iflow", settings.baseUrl, IFLOW_DEFAULTS.baseUrl);

  return {
    type: "iflow",
    defaults: IFLOW_DEFAULTS,
    baseUrl: () => baseUrl,

    async complete(call: BackendCall): Promise<BackendReply> {
      return withResponse(
        {
          backend: "iflow",
          url: `${baseUrl}/chat/completions`,
          headers: bearer(call.key),
          body: chatRequestBody(call, { systemPrompt: EXPERT_SYSTEM_PROMPT, temperature: 0.3, maxTokens: 1000 }),
          timeoutMs: settings.timeoutMs,
          signal: call.signal,
        },
        async (response, signal) => {
          // Business errors come back as plain JSON even when a stream was asked for
          const isJson = (response.headers.get("content-type") ?? "").includes("application/json");
          if (call.stream && !isJson) {
            return { text: await collectStream(response, signal, (event) => chatStreamStep(event.data), call.onChunk) };
          }
          const body = parseJsonBody("iflow", await response.text());
          checkBusinessStatus(body);
          return { text: chatCompletionText("iflow", body) };
        },
      );
    },

    async validateKey(key: string, signal?: AbortSignal): Promise<boolean> {
      return withResponse(
        {
          backend: "iflow",
          url: `${baseUrl}/models`,
          headers: bearer(key),
          timeoutMs: settings.timeoutMs,
          signal,
        },
        async (response) => {
          checkBusinessStatus(parseJsonBody("iflow", await response.text()));
          return true;
        },
      );
    },
  };
}
