import { createTerminalIndicator, type IndicatorStream } from "./indicator.js";
import { createLogger, type Logger } from "./logger.js";
import { ProviderRegistry } from "./registry.js";
import type { GatewayConfig } from "./validation.js";
import { silentObserver, type Waiter, type WaitObserver } from "./wait.js";

export interface CreateGatewayOptions {
  readonly logger?: Logger;
  /** Replaces the terminal indicator chosen from `config.waiting` */
  readonly observer?: WaitObserver;
  /** Where the terminal indicator draws. Default: process.stderr */
  readonly stream?: IndicatorStream;
  readonly waiter?: Waiter;
}

/**
 * Wire a registry from a loaded configuration: logger at the configured
 * level, terminal indicator when waiting indicators are enabled.
 */
export function createGateway(config: GatewayConfig, options: CreateGatewayOptions = {}): ProviderRegistry {
  const logger = options.logger ?? createLogger("gateway", { level: config.logLevel });
  const observer =
    options.observer ??
    (config.waiting.enabled
      ? createTerminalIndicator({ stream: options.stream, text: config.waiting.text, delayMs: config.waiting.delayMs })
      : silentObserver);

  return new ProviderRegistry(config.providers, {
    logger,
    providerDeps: {
      observer,
      promptTemplate: config.prompt.template,
      ...(options.waiter ? { waiter: options.waiter } : {}),
    },
  });
}
