/**
 * MockEvaluationProvider for testing @veracity/provider-gateway consumers.
 *
 * Sequences through pre-configured outcomes in order and records every
 * request. Types are declared structurally so this package does not depend
 * on the gateway.
 */

export type MockBackendType = "gemini" | "openai" | "anthropic" | "dify" | "iflow";

export type MockOutcome =
  | { readonly kind: "consistent"; readonly justification: string }
  | { readonly kind: "inconsistent"; readonly justification: string }
  | { readonly kind: "uncertain"; readonly justification: string }
  | { readonly kind: "error"; readonly reason: string };

export interface MockEvaluationRequest {
  readonly question: string;
  readonly answer: string;
  readonly reference: string;
  readonly model?: string;
}

export interface MockProviderOptions {
  readonly name?: string;
  readonly type?: MockBackendType;
  readonly keys?: readonly string[];
  readonly models?: readonly string[];
  /** Keys that `validateKey` accepts. Default: every configured key */
  readonly validKeys?: readonly string[];
}

export class MockEvaluationProvider {
  readonly id: string;
  readonly name: string;
  readonly type: MockBackendType;
  readonly calls: MockEvaluationRequest[] = [];
  readonly validatedKeys: string[] = [];
  private readonly outcomes: MockOutcome[];
  private readonly keys: readonly string[];
  private readonly models: readonly string[];
  private readonly validKeys: ReadonlySet<string>;
  private callIndex = 0;

  constructor(id: string, outcomes: MockOutcome[] = [], options: MockProviderOptions = {}) {
    this.id = id;
    this.name = options.name ?? id;
    this.type = options.type ?? "openai";
    this.outcomes = outcomes;
    this.keys = options.keys ?? ["test-key"];
    this.models = options.models ?? ["mock-model"];
    this.validKeys = new Set(options.validKeys ?? this.keys);
  }

  getModels(): readonly string[] {
    return this.models;
  }

  async validateKey(key: string): Promise<boolean> {
    this.validatedKeys.push(key);
    return this.validKeys.has(key);
  }

  firstKey(): string | undefined {
    return this.keys[0];
  }

  isConfigured(): boolean {
    return this.keys.length > 0;
  }

  async evaluate(request: MockEvaluationRequest): Promise<MockOutcome> {
    this.calls.push(request);
    const outcome = this.outcomes[this.callIndex];
    this.callIndex++;
    return outcome ?? { kind: "error", reason: `no outcome scripted for call #${this.callIndex}` };
  }

  getInfo() {
    return {
      id: this.id,
      name: this.name,
      type: this.type,
      configured: this.isConfigured(),
      models: this.models,
      defaultModel: this.models[0] ?? "mock-model",
      keyCount: this.keys.length,
      rotation: "manual" as const,
      baseUrl: "http://mock.invalid",
    };
  }

  get callCount(): number {
    return this.calls.length;
  }

  get lastRequest(): MockEvaluationRequest | undefined {
    return this.calls[this.calls.length - 1];
  }
}
