import type { BackendType } from "../types.js";
import { createAnthropicBackend } from "./anthropic.js";
import { createDifyBackend } from "./dify.js";
import { createGeminiBackend } from "./gemini.js";
import { createIflowBackend } from "./iflow.js";
import { createOpenAiBackend } from "./openai.js";
import type { BackendAdapter, BackendSettings } from "./types.js";

export { ANTHROPIC_DEFAULTS, ANTHROPIC_MODELS, createAnthropicBackend } from "./anthropic.js";
export { createDifyBackend, DIFY_DEFAULTS, normalizeDifyBaseUrl } from "./dify.js";
export { createGeminiBackend, GEMINI_DEFAULTS, GEMINI_MODELS } from "./gemini.js";
export { checkBusinessStatus, createIflowBackend, IFLOW_DEFAULTS, IFLOW_MODELS } from "./iflow.js";
export { createOpenAiBackend, OPENAI_DEFAULTS, OPENAI_MODELS } from "./openai.js";
export type { BackendAdapter, BackendCall, BackendDefaults, BackendReply, BackendSettings } from "./types.js";

export const BACKEND_TYPES = ["gemini", "openai", "anthropic", "dify", "iflow"] as const satisfies readonly BackendType[];

/**
 * Create the protocol adapter for a backend type.
 * Throws a PROVIDER_INVALID_CONFIG ValidationError for an unusable base URL.
 */
export function createBackend(type: BackendType, settings: BackendSettings): BackendAdapter {
  switch (type) {
    case "gemini":
      return createGeminiBackend(settings);
    case "openai":
      return createOpenAiBackend(settings);
    case "anthropic":
      return createAnthropicBackend(settings);
    case "dify":
      return createDifyBackend(settings);
    case "iflow":
      return createIflowBackend(settings);
  }
}
