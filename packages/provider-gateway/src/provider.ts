import { getErrorMessage, ValidationError } from "@veracity/errors";
import { createBackend } from "./backends/index.js";
import type { BackendAdapter } from "./backends/types.js";
import { DEFAULT_TIMEOUT_MS } from "./http.js";
import { KeyPool, type KeyPoolSnapshot } from "./key-pool.js";
import { type Logger, silentLogger } from "./logger.js";
import { normalizeResponse } from "./normalize.js";
import { defaultTemplate, renderPrompt, truncateReference } from "./prompts.js";
import { evaluateWithRetry, type RetryPolicy } from "./retry.js";
import type {
  BackendType,
  EvaluationOutcome,
  EvaluationProvider,
  EvaluationRequest,
  ProviderConfig,
  ProviderInfo,
  RotationPolicy,
} from "./types.js";
import { type Clock, silentObserver, sleep, systemClock, type Waiter, type WaitObserver } from "./wait.js";

export interface GatewayProviderDeps {
  /** Protocol adapter; built from `config.type` when omitted */
  readonly adapter?: BackendAdapter;
  readonly clock?: Clock;
  readonly waiter?: Waiter;
  /** Shows key waits, retry waits and in-flight calls */
  readonly observer?: WaitObserver;
  readonly logger?: Logger;
  /** Fallback when the provider config has no template of its own */
  readonly promptTemplate?: string;
}

/** Trimmed, de-duplicated, empty entries dropped; order kept. */
function cleanKeys(keys: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const key of keys) {
    const trimmed = key.trim();
    if (trimmed) seen.add(trimmed);
  }
  return [...seen];
}

/**
 * One configured backend: key pool, retry loop and normalizer around a
 * protocol adapter.
 */
export class GatewayProvider implements EvaluationProvider {
  readonly id: string;
  readonly name: string;
  readonly type: BackendType;

  private readonly config: ProviderConfig;
  private readonly adapter: BackendAdapter;
  private readonly pool: KeyPool;
  private readonly keys: readonly string[];
  private readonly models: readonly string[];
  private readonly rotation: RotationPolicy;
  private readonly retryPolicy: RetryPolicy;
  private readonly template: string;
  private readonly waiter: Waiter;
  private readonly observer: WaitObserver;
  private readonly logger: Logger;

  /** Throws a ValidationError when the backend cannot be constructed (e.g. a bad base URL). */
  constructor(config: ProviderConfig, deps: GatewayProviderDeps = {}) {
    this.config = config;
    this.id = config.id;
    this.type = config.type;
    this.logger = deps.logger ?? silentLogger;
    this.waiter = deps.waiter ?? sleep;
    this.observer = deps.observer ?? silentObserver;

    this.adapter =
      deps.adapter ??
      createBackend(config.type, {
        baseUrl: config.baseUrl,
        timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        logger: this.logger,
        appId: config.appId,
        showThinking: config.showThinking,
      });

    const defaults = this.adapter.defaults;
    this.name = config.name ?? defaults.name;
    this.rotation = config.rotation ?? defaults.rotation;
    this.keys = cleanKeys(config.keys);

    const listed = config.models && config.models.length > 0 ? config.models : defaults.models;
    this.models = config.model ? [config.model, ...listed.filter((m) => m !== config.model)] : [...listed];

    this.retryPolicy = {
      maxAttempts: config.maxAttempts ?? defaults.maxAttempts,
      retryDelayMs: config.retryDelayMs ?? defaults.retryDelayMs,
      rateLimitDelayMs: config.rateLimitDelayMs ?? defaults.rateLimitDelayMs,
    };
    this.template = config.promptTemplate ?? deps.promptTemplate ?? defaultTemplate(defaults.promptStyle);

    this.pool = new KeyPool(this.keys, {
      policy: this.rotation,
      minSpacingMs: config.minKeySpacingMs,
      label: this.name,
      clock: deps.clock ?? systemClock,
      waiter: this.waiter,
      observer: this.observer,
      logger: this.logger,
    });
  }

  getModels(): readonly string[] {
    return this.models;
  }

  async validateKey(key: string, signal?: AbortSignal): Promise<boolean> {
    try {
      return await this.adapter.validateKey(key, signal);
    } catch (error) {
      this.logger.debug(`${this.name}: key validation failed: ${getErrorMessage(error)}`);
      return false;
    }
  }

  firstKey(): string | undefined {
    return this.keys[0];
  }

  isConfigured(): boolean {
    return this.keys.length > 0;
  }

  async evaluate(request: EvaluationRequest): Promise<EvaluationOutcome> {
    if (!this.isConfigured()) {
      const error = new ValidationError({
        code: "PROVIDER_NOT_CONFIGURED",
        message: `${this.name}: no API key configured`,
      });
      this.logger.warn(error.message);
      return { kind: "error", reason: error.message };
    }

    try {
      const model = request.model ?? this.models[0] ?? "";
      const stream = request.stream ?? this.config.stream ?? false;
      const prompt = renderPrompt(this.template, {
        question: request.question,
        answer: request.answer,
        reference: truncateReference(request.reference, this.adapter.defaults.referenceLimit),
      });

      return await evaluateWithRetry(
        async (key, attempt) => {
          this.logger.debug(`${this.name}: attempt ${attempt} with model ${model}`);
          // Streamed text goes to the caller; a spinner would overwrite it
          const handle = request.onChunk ? undefined : this.observer.begin(`${this.name}: evaluating`);
          try {
            const reply = await this.adapter.complete({
              key,
              model,
              prompt,
              stream,
              onChunk: request.onChunk,
              signal: request.signal,
            });
            if (reply.thinking) this.logger.debug(`${this.name}: thinking: ${reply.thinking}`);
            const { outcome, tier } = normalizeResponse(reply.text);
            this.logger.debug(`${this.name}: ${outcome.kind} (${tier})`);
            return outcome;
          } finally {
            handle?.stop();
          }
        },
        {
          pool: this.pool,
          policy: this.retryPolicy,
          label: this.name,
          waiter: this.waiter,
          observer: this.observer,
          logger: this.logger,
          signal: request.signal,
        },
      );
    } catch (error) {
      return { kind: "error", reason: `${this.name}: ${getErrorMessage(error)}` };
    }
  }

  getInfo(): ProviderInfo {
    return {
      id: this.id,
      name: this.name,
      type: this.type,
      configured: this.isConfigured(),
      models: this.models,
      defaultModel: this.models[0] ?? "",
      keyCount: this.keys.length,
      rotation: this.rotation,
      baseUrl: this.adapter.baseUrl(),
    };
  }

  /** Rotation state with masked keys, for status displays */
  keyPoolSnapshot(): KeyPoolSnapshot {
    return this.pool.snapshot();
  }
}
