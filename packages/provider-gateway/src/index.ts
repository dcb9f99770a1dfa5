/**
 * @veracity/provider-gateway
 *
 * Judges whether an AI answer agrees with a reference document by routing
 * the question to one of several LLM backends, with per-backend key
 * rotation, retries and response normalization.
 */

export {
  ANTHROPIC_DEFAULTS,
  ANTHROPIC_MODELS,
  BACKEND_TYPES,
  checkBusinessStatus,
  createAnthropicBackend,
  createBackend,
  createDifyBackend,
  createGeminiBackend,
  createIflowBackend,
  createOpenAiBackend,
  DIFY_DEFAULTS,
  GEMINI_DEFAULTS,
  GEMINI_MODELS,
  IFLOW_DEFAULTS,
  IFLOW_MODELS,
  normalizeDifyBaseUrl,
  OPENAI_DEFAULTS,
  OPENAI_MODELS,
} from "./backends/index.js";
export type { BackendAdapter, BackendCall, BackendDefaults, BackendReply, BackendSettings } from "./backends/index.js";
export {
  classifyFailure,
  errorFromHttpStatus,
  isAbortError,
  parseRetryAfterHeader,
  retryDelayFromGemini,
  retryDelayFromOpenAi,
} from "./classify.js";
export {
  DEFAULT_PROVIDER_ORDER,
  type Env,
  isPlaceholderKey,
  loadGatewayConfig,
  type LoadConfigOptions,
  parseProviderList,
  resolveGatewayConfig,
  type ResolveConfigOptions,
} from "./config.js";
export { createGateway, type CreateGatewayOptions } from "./gateway.js";
export { DEFAULT_TIMEOUT_MS, withResponse, type HttpRequest } from "./http.js";
export { createTerminalIndicator, type IndicatorStream, type TerminalIndicatorOptions } from "./indicator.js";
export { KeyPool, type KeyPoolOptions, type KeyPoolSnapshot } from "./key-pool.js";
export { createLogger, type Logger, type LoggerOptions, type LogLevel, maskKey, silentLogger } from "./logger.js";
export {
  JUSTIFICATION_LIMIT,
  normalizeResponse,
  type NormalizedResponse,
  type NormalizerTier,
  parseLabeledLines,
  parseStructured,
  scoreKeywords,
  stripCodeFence,
} from "./normalize.js";
export {
  defaultTemplate,
  JSON_VERDICT_PROMPT,
  LABELED_VERDICT_PROMPT,
  type PromptStyle,
  renderPrompt,
} from "./prompts.js";
export { GatewayProvider, type GatewayProviderDeps } from "./provider.js";
export {
  type GatewayEvaluationRequest,
  PROVIDER_UNAVAILABLE_REASON,
  PROVIDER_UNCONFIGURED_REASON,
  type ProviderFactory,
  ProviderRegistry,
  type ProviderRegistryOptions,
} from "./registry.js";
export { CANCELLED_REASON, evaluateWithRetry, EXHAUSTED_PREFIX, NO_CLIENT_REASON, type RetryPolicy } from "./retry.js";
export { readSseEvents, type SseEvent } from "./sse.js";
export { EVALUATE_SPAN, withSpan } from "./telemetry.js";
export type {
  BackendType,
  ConfigurationSummary,
  EvaluationOutcome,
  EvaluationProvider,
  EvaluationRequest,
  FailureCategory,
  FailureClassification,
  OutcomeKind,
  ProviderChoice,
  ProviderConfig,
  ProviderInfo,
  ProviderStatistics,
  RotationPolicy,
  ValidationReport,
  ValidationStatus,
  Verdict,
} from "./types.js";
export { GatewayConfigSchema, type GatewayConfig, ProviderConfigSchema, validateGatewayConfig, type WaitingConfig } from "./validation.js";
export { type Clock, observedWait, silentObserver, sleep, systemClock, type Waiter, type WaitHandle, type WaitObserver } from "./wait.js";

export const PACKAGE_NAME = "@veracity/provider-gateway" as const;
