import type { Logger } from "../logger.js";
import type { PromptStyle } from "../prompts.js";
import type { BackendType, RotationPolicy } from "../types.js";

/** Construction-time settings shared by every backend */
export interface BackendSettings {
  readonly baseUrl?: string;
  readonly timeoutMs: number;
  readonly logger: Logger;
  readonly appId?: string;
  readonly showThinking?: boolean;
}

/** Built-in defaults a provider config may override */
export interface BackendDefaults {
  readonly name: string;
  readonly baseUrl: string;
  readonly models: readonly string[];
  readonly rotation: RotationPolicy;
  readonly maxAttempts: number;
  readonly retryDelayMs: number;
  readonly rateLimitDelayMs: number;
  readonly promptStyle: PromptStyle;
  /** Reference documents are cut to this many characters */
  readonly referenceLimit?: number;
}

/** One live call with one key */
export interface BackendCall {
  readonly key: string;
  readonly model: string;
  readonly prompt: string;
  readonly stream: boolean;
  readonly onChunk?: (text: string) => void;
  readonly signal?: AbortSignal;
}

export interface BackendReply {
  readonly text: string;
  /** Extended-thinking output, when the backend produced any */
  readonly thinking?: string;
}

/**
 * Protocol adapter for one backend type. Failures are thrown as
 * @veracity/errors instances so the retry orchestrator can classify them.
 */
export interface BackendAdapter {
  readonly type: BackendType;
  readonly defaults: BackendDefaults;
  /** Effective endpoint; may change after a protocol upgrade */
  baseUrl(): string;
  complete(call: BackendCall): Promise<BackendReply>;
  /** Resolves true on success; throws on rejection or network failure */
  validateKey(key: string, signal?: AbortSignal): Promise<boolean>;
}
