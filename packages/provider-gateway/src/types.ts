/**
 * Core types for @veracity/provider-gateway
 *
 * A uniform contract over heterogeneous LLM backends that judge whether an
 * answer is consistent with a reference document.
 */

// ---------------------------------------------------------------------------
// Outcome
// ---------------------------------------------------------------------------

export type Verdict = "consistent" | "inconsistent" | "uncertain";

/**
 * The only value that crosses the registry boundary. Every failure path of
 * an evaluation ends in `{ kind: "error" }`.
 */
export type EvaluationOutcome =
  | { readonly kind: "consistent"; readonly justification: string }
  | { readonly kind: "inconsistent"; readonly justification: string }
  | { readonly kind: "uncertain"; readonly justification: string }
  | { readonly kind: "error"; readonly reason: string };

export type OutcomeKind = EvaluationOutcome["kind"];

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type BackendType = "gemini" | "openai" | "anthropic" | "dify" | "iflow";

/** auto: rotate before every call. manual: rotate only when forced by a failure. */
export type RotationPolicy = "auto" | "manual";

/** Immutable snapshot read once when the provider is constructed. */
export interface ProviderConfig {
  readonly id: string;
  readonly type: BackendType;
  readonly name?: string;
  /** Ordered; insertion order is rotation order */
  readonly keys: readonly string[];
  readonly model?: string;
  /** Overrides the backend's built-in model list */
  readonly models?: readonly string[];
  readonly baseUrl?: string;
  readonly rotation?: RotationPolicy;
  /** Minimum time between two uses of the same key under auto rotation. Default: 60s */
  readonly minKeySpacingMs?: number;
  readonly maxAttempts?: number;
  /** Fixed wait after a transient failure */
  readonly retryDelayMs?: number;
  /** Cooldown applied when a rate limit carries no usable delay */
  readonly rateLimitDelayMs?: number;
  readonly timeoutMs?: number;
  readonly stream?: boolean;
  /** Dify application id, sent with each chat message */
  readonly appId?: string;
  /** Enable extended thinking on models that support it */
  readonly showThinking?: boolean;
  /** Custom prompt template with {question}, {ai_answer} and {source_document} */
  readonly promptTemplate?: string;
}

// ---------------------------------------------------------------------------
// Evaluation request
// ---------------------------------------------------------------------------

export interface EvaluationRequest {
  readonly question: string;
  readonly answer: string;
  readonly reference: string;
  readonly model?: string;
  /** Overrides the provider's configured streaming flag */
  readonly stream?: boolean;
  /** Receives streamed text as it arrives */
  readonly onChunk?: (text: string) => void;
  readonly signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Provider contract
// ---------------------------------------------------------------------------

export interface ProviderInfo {
  readonly id: string;
  readonly name: string;
  readonly type: BackendType;
  readonly configured: boolean;
  readonly models: readonly string[];
  readonly defaultModel: string;
  readonly keyCount: number;
  readonly rotation: RotationPolicy;
  readonly baseUrl: string;
}

/**
 * Capability set every backend satisfies. Implementations never throw out of
 * `evaluate` or `validateKey`.
 */
export interface EvaluationProvider {
  readonly id: string;
  readonly name: string;
  readonly type: BackendType;
  /** Never empty; the first element is the default */
  getModels(): readonly string[];
  /** Live, low-cost credential check. Does not touch rotation state. */
  validateKey(key: string, signal?: AbortSignal): Promise<boolean>;
  /** The first key of the pool, used by validation reports */
  firstKey(): string | undefined;
  isConfigured(): boolean;
  evaluate(request: EvaluationRequest): Promise<EvaluationOutcome>;
  getInfo(): ProviderInfo;
}

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

export type FailureCategory = "auth" | "rate_limit" | "transient" | "fatal" | "aborted";

export interface FailureClassification {
  readonly category: FailureCategory;
  readonly reason: string;
  readonly retryAfterMs?: number;
}

// ---------------------------------------------------------------------------
// Registry reports
// ---------------------------------------------------------------------------

export interface ConfigurationSummary {
  readonly total: number;
  readonly configured: number;
  readonly currentId: string | undefined;
}

export interface ProviderStatistics extends ConfigurationSummary {
  readonly providers: Readonly<
    Record<
      string,
      {
        readonly name: string;
        readonly type: BackendType;
        readonly configured: boolean;
        readonly modelsCount: number;
        readonly defaultModel: string;
        readonly keyCount: number;
      }
    >
  >;
}

export type ValidationStatus = "valid" | "invalid" | "unconfigured";

export interface ValidationReport {
  readonly total: number;
  readonly valid: number;
  readonly invalid: number;
  readonly unconfigured: number;
  readonly results: Readonly<
    Record<string, { readonly name: string; readonly status: ValidationStatus; readonly message: string }>
  >;
}

export interface ProviderChoice {
  readonly id: string;
  readonly name: string;
  readonly type: BackendType;
  readonly configured: boolean;
  readonly current: boolean;
}
