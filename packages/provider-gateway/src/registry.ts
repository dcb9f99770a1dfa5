import { getErrorMessage, isExpectedError, wrapError } from "@veracity/errors";
import { type Logger, silentLogger } from "./logger.js";
import { GatewayProvider, type GatewayProviderDeps } from "./provider.js";
import { EVALUATE_SPAN, withSpan } from "./telemetry.js";
import type {
  ConfigurationSummary,
  EvaluationOutcome,
  EvaluationProvider,
  EvaluationRequest,
  ProviderChoice,
  ProviderConfig,
  ProviderStatistics,
  ValidationReport,
  ValidationStatus,
} from "./types.js";

export const PROVIDER_UNAVAILABLE_REASON = "provider unavailable";
export const PROVIDER_UNCONFIGURED_REASON = "provider unconfigured";

/** Builds a provider from its config; may throw, in which case the config is skipped. */
export type ProviderFactory = (config: ProviderConfig) => EvaluationProvider;

export interface ProviderRegistryOptions {
  readonly logger?: Logger;
  /** Passed to every GatewayProvider the default factory builds */
  readonly providerDeps?: GatewayProviderDeps;
  readonly factory?: ProviderFactory;
}

export interface GatewayEvaluationRequest extends EvaluationRequest {
  /** Defaults to the current selection */
  readonly providerId?: string;
}

/**
 * Process-wide set of providers with one current selection.
 *
 * Construction registers every config and auto-selects; no network call is
 * made until `evaluate` or a validation report is requested.
 */
export class ProviderRegistry {
  private readonly providers = new Map<string, EvaluationProvider>();
  private readonly logger: Logger;
  private readonly factory: ProviderFactory;
  private currentId: string | undefined;

  constructor(configs: readonly ProviderConfig[] = [], options: ProviderRegistryOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    const deps: GatewayProviderDeps = { logger: this.logger, ...options.providerDeps };
    this.factory = options.factory ?? ((config) => new GatewayProvider(config, deps));

    for (const config of configs) this.register(config);
    this.autoSelect();
  }

  /**
   * Build and store a provider. Returns its id, or `undefined` when
   * construction failed or the id is taken.
   */
  register(config: ProviderConfig): string | undefined {
    let provider: EvaluationProvider;
    try {
      provider = this.factory(config);
    } catch (error) {
      this.logger.error(`failed to initialize provider "${config.id}": ${getErrorMessage(error)}`);
      return undefined;
    }
    return this.add(provider);
  }

  /** Store an already constructed provider. */
  add(provider: EvaluationProvider): string | undefined {
    if (this.providers.has(provider.id)) {
      this.logger.warn(`provider "${provider.id}" is already registered, ignoring duplicate`);
      return undefined;
    }
    this.providers.set(provider.id, provider);
    this.logger.info(
      `registered ${provider.name} (${provider.id})${provider.isConfigured() ? "" : " without API keys"}`,
    );
    return provider.id;
  }

  /**
   * First configured provider, else the first registered one. Only the
   * cheap configuration check runs here.
   */
  autoSelect(): string | undefined {
    let fallback: string | undefined;
    for (const provider of this.providers.values()) {
      fallback ??= provider.id;
      if (provider.isConfigured()) {
        this.currentId = provider.id;
        return provider.id;
      }
    }
    if (fallback !== undefined) {
      this.logger.warn(`no provider has API keys configured, defaulting to "${fallback}"`);
    }
    this.currentId = fallback;
    return fallback;
  }

  switch(id: string): boolean {
    if (!this.providers.has(id)) return false;
    this.currentId = id;
    this.logger.info(`switched to provider "${id}"`);
    return true;
  }

  getCurrentId(): string | undefined {
    return this.currentId;
  }

  /** The provider with `id`, or the current one when omitted */
  getProvider(id?: string): EvaluationProvider | undefined {
    const target = id ?? this.currentId;
    return target === undefined ? undefined : this.providers.get(target);
  }

  hasConfiguredProviders(): boolean {
    for (const provider of this.providers.values()) {
      if (provider.isConfigured()) return true;
    }
    return false;
  }

  /**
   * Judge one answer. Always resolves; every failure is an `error` outcome.
   */
  async evaluate(request: GatewayEvaluationRequest): Promise<EvaluationOutcome> {
    const provider = this.getProvider(request.providerId);
    if (!provider) return { kind: "error", reason: PROVIDER_UNAVAILABLE_REASON };
    if (!provider.isConfigured()) return { kind: "error", reason: PROVIDER_UNCONFIGURED_REASON };

    const model = request.model ?? provider.getModels()[0] ?? "";
    return withSpan(
      EVALUATE_SPAN,
      { "veracity.provider.id": provider.id, "veracity.provider.type": provider.type, "veracity.model": model },
      async (span) => {
        let outcome: EvaluationOutcome;
        try {
          outcome = await provider.evaluate({ ...request, model });
        } catch (error) {
          const wrapped = wrapError(error);
          const line = `${provider.name}: ${wrapped.code}: ${wrapped.message}`;
          if (isExpectedError(wrapped)) this.logger.warn(line);
          else this.logger.error(line);
          outcome = { kind: "error", reason: `${provider.name}: ${wrapped.message}` };
        }
        span.setAttribute("veracity.outcome", outcome.kind);
        return outcome;
      },
    );
  }

  getConfigurationSummary(): ConfigurationSummary {
    let configured = 0;
    for (const provider of this.providers.values()) {
      if (provider.isConfigured()) configured++;
    }
    return { total: this.providers.size, configured, currentId: this.currentId };
  }

  getStatistics(): ProviderStatistics {
    const providers: Record<string, ProviderStatistics["providers"][string]> = {};
    for (const provider of this.providers.values()) {
      const info = provider.getInfo();
      providers[provider.id] = {
        name: info.name,
        type: info.type,
        configured: info.configured,
        modelsCount: info.models.length,
        defaultModel: info.defaultModel,
        keyCount: info.keyCount,
      };
    }
    return { ...this.getConfigurationSummary(), providers };
  }

  /** Registration order, for selection menus */
  listProviders(): ProviderChoice[] {
    return [...this.providers.values()].map((provider) => ({
      id: provider.id,
      name: provider.name,
      type: provider.type,
      configured: provider.isConfigured(),
      current: provider.id === this.currentId,
    }));
  }

  /**
   * Live check of the first key of every configured provider. Network-bound;
   * providers are checked one after another.
   */
  async validationReport(signal?: AbortSignal): Promise<ValidationReport> {
    const results: Record<string, ValidationReport["results"][string]> = {};
    const counts: Record<ValidationStatus, number> = { valid: 0, invalid: 0, unconfigured: 0 };

    for (const provider of this.providers.values()) {
      const key = provider.firstKey();
      let status: ValidationStatus;
      let message: string;

      if (!provider.isConfigured() || key === undefined) {
        status = "unconfigured";
        message = "no API key configured";
      } else if (await provider.validateKey(key, signal)) {
        status = "valid";
        message = "API key accepted";
      } else {
        status = "invalid";
        message = "API key rejected or backend unreachable";
      }

      counts[status]++;
      results[provider.id] = { name: provider.name, status, message };
      this.logger.info(`validation: ${provider.name}: ${status}`);
    }

    return { total: this.providers.size, ...counts, results };
  }

  /**
   * Validate on demand and select the first provider whose key is accepted.
   * Leaves the selection unchanged when none is.
   */
  async switchToFirstValid(signal?: AbortSignal): Promise<string | undefined> {
    const report = await this.validationReport(signal);
    for (const id of this.providers.keys()) {
      if (report.results[id]?.status === "valid") {
        this.switch(id);
        return id;
      }
    }
    this.logger.warn("no provider passed validation");
    return undefined;
  }
}
