import type { RotationPolicy } from "./types.js";
import { type Logger, maskKey, silentLogger } from "./logger.js";
import { Mutex } from "./mutex.js";
import {
  type Clock,
  observedWait,
  silentObserver,
  sleep,
  systemClock,
  type Waiter,
  type WaitObserver,
} from "./wait.js";

export interface KeyPoolOptions {
  /** Default: "auto" */
  readonly policy?: RotationPolicy;
  /** Minimum time between two uses of one key. Default: 60s */
  readonly minSpacingMs?: number;
  /** Shown in waiting indicators and logs */
  readonly label?: string;
  readonly clock?: Clock;
  readonly waiter?: Waiter;
  readonly observer?: WaitObserver;
  readonly logger?: Logger;
}

export interface KeySnapshot {
  readonly key: string;
  readonly lastUsedAt: number;
  readonly cooldownUntil: number;
  readonly cooldownRemainingMs: number;
  readonly current: boolean;
}

export interface KeyPoolSnapshot {
  readonly size: number;
  readonly policy: RotationPolicy;
  readonly currentIndex: number;
  readonly keys: readonly KeySnapshot[];
}

interface KeyState {
  readonly key: string;
  lastUsedAt: number;
  cooldownUntil: number;
}

type ScanResult =
  | { readonly kind: "selected"; readonly key: string; readonly waitMs: number }
  | { readonly kind: "cooling"; readonly waitMs: number };

/**
 * Rotation-managed credentials for one provider.
 *
 * State per key: last use and cooldown expiry. Scan-and-select runs inside
 * the mutex; every wait (spacing or cooldown) happens after the lock is
 * released, with the chosen key already stamped so concurrent callers see
 * it as taken.
 */
export class KeyPool {
  static readonly DEFAULT_SPACING_MS = 60_000;

  private readonly states: readonly KeyState[];
  private readonly mutex = new Mutex();
  private readonly clock: Clock;
  private readonly waiter: Waiter;
  private readonly observer: WaitObserver;
  private readonly logger: Logger;
  private readonly label: string;
  private readonly minSpacingMs: number;
  private index = 0;
  private firstUse = true;

  readonly policy: RotationPolicy;

  constructor(keys: readonly string[], options: KeyPoolOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.waiter = options.waiter ?? sleep;
    this.observer = options.observer ?? silentObserver;
    this.logger = options.logger ?? silentLogger;
    this.label = options.label ?? "key-pool";
    this.minSpacingMs = options.minSpacingMs ?? KeyPool.DEFAULT_SPACING_MS;
    this.policy = options.policy ?? "auto";

    const now = this.clock.now();
    this.states = keys.map((key) => ({ key, lastUsedAt: now, cooldownUntil: 0 }));
  }

  get size(): number {
    return this.states.length;
  }

  get currentIndex(): number {
    return this.index;
  }

  /**
   * Key for the next live call. Auto policy rotates first; manual policy
   * stays on the current key, sitting out its cooldown if it has one.
   */
  async acquire(signal?: AbortSignal): Promise<string | undefined> {
    if (this.states.length === 0) return undefined;
    if (this.policy === "auto") return this.rotate(false, signal);

    const held = await this.mutex.runExclusive(() => {
      const state = this.states[this.index];
      if (!state) return undefined;
      const now = this.clock.now();
      const waitMs = Math.max(0, state.cooldownUntil - now);
      state.lastUsedAt = now + waitMs;
      this.firstUse = false;
      return { key: state.key, waitMs };
    });
    if (!held) return undefined;

    if (held.waitMs > 0) {
      this.logger.info(`${this.label}: key ${maskKey(held.key)} cooling down, waiting ${seconds(held.waitMs)}s`);
      await observedWait(this.waiter, this.observer, `${this.label}: key cooling down`, held.waitMs, signal);
    }
    return held.key;
  }

  /**
   * Move to another key.
   *
   * Forced: advance one position, ignoring cooldown and spacing.
   * Otherwise: first key (after the current one) whose cooldown has expired,
   * waiting for the spacing floor if it was used recently. When every key is
   * cooling down, wait for the earliest expiry and scan once more.
   */
  async rotate(force = false, signal?: AbortSignal): Promise<string | undefined> {
    if (this.states.length === 0) return undefined;
    if (force) return this.mutex.runExclusive(() => this.advance());

    const first = await this.mutex.runExclusive(() => this.scan(false));
    if (first.kind === "selected") {
      if (first.waitMs > 0) {
        this.logger.info(
          `${this.label}: key ${maskKey(first.key)} used recently, waiting ${seconds(first.waitMs)}s`,
        );
        await observedWait(this.waiter, this.observer, `${this.label}: spacing key use`, first.waitMs, signal);
      }
      return first.key;
    }

    this.logger.info(`${this.label}: all keys cooling down, waiting ${seconds(first.waitMs)}s`);
    await observedWait(this.waiter, this.observer, `${this.label}: all keys cooling down`, first.waitMs, signal);

    // The cooldown wait already exceeds any spacing the key still owed.
    const second = await this.mutex.runExclusive(() => this.scan(true));
    if (second.kind === "selected") return second.key;
    return this.mutex.runExclusive(() => this.advance());
  }

  /** Put `key` out of non-forced rotation for `delayMs`. */
  markCooldown(key: string, delayMs: number): void {
    const until = this.clock.now() + Math.max(0, delayMs);
    for (const state of this.states) {
      if (state.key === key) state.cooldownUntil = until;
    }
    this.logger.debug(`${this.label}: key ${maskKey(key)} cooling down for ${seconds(delayMs)}s`);
  }

  cooldownRemaining(key: string): number {
    const state = this.states.find((s) => s.key === key);
    if (!state) return 0;
    return Math.max(0, state.cooldownUntil - this.clock.now());
  }

  snapshot(): KeyPoolSnapshot {
    const now = this.clock.now();
    return {
      size: this.states.length,
      policy: this.policy,
      currentIndex: this.index,
      keys: this.states.map((state, i) => ({
        key: maskKey(state.key),
        lastUsedAt: state.lastUsedAt,
        cooldownUntil: state.cooldownUntil,
        cooldownRemainingMs: Math.max(0, state.cooldownUntil - now),
        current: i === this.index,
      })),
    };
  }

  private advance(): string | undefined {
    this.index = (this.index + 1) % this.states.length;
    const state = this.states[this.index];
    if (!state) return undefined;
    state.lastUsedAt = this.clock.now();
    this.logger.debug(`${this.label}: forced rotation to key #${this.index + 1}`);
    return state.key;
  }

  private scan(skipSpacing: boolean): ScanResult {
    const now = this.clock.now();
    const count = this.states.length;
    let earliest = Number.POSITIVE_INFINITY;

    for (let step = 1; step <= count; step++) {
      const idx = (this.index + step) % count;
      const state = this.states[idx];
      if (!state) continue;

      const remaining = Math.max(0, state.cooldownUntil - now);
      if (remaining > 0) {
        earliest = Math.min(earliest, remaining);
        continue;
      }

      let waitMs = 0;
      if (this.firstUse) {
        this.firstUse = false;
      } else if (!skipSpacing && count > 1) {
        waitMs = Math.max(0, this.minSpacingMs - (now - state.lastUsedAt));
      }
      this.index = idx;
      state.lastUsedAt = now + waitMs;
      return { kind: "selected", key: state.key, waitMs };
    }

    return { kind: "cooling", waitMs: earliest };
  }
}

function seconds(ms: number): string {
  return (ms / 1000).toFixed(1);
}
