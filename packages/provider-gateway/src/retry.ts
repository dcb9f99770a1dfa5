/**
 * Retry orchestration for one logical evaluation.
 *
 * Per attempt: take a key from the pool, call the backend, classify any
 * failure. Rate limits cool the key down and move on, transient failures
 * wait a fixed delay and move on, auth and fatal failures end the loop.
 */

import { friendlyErrorMessage } from "@veracity/errors";
import { classifyFailure } from "./classify.js";
import type { KeyPool } from "./key-pool.js";
import { type Logger, maskKey, silentLogger } from "./logger.js";
import type { EvaluationOutcome, FailureClassification } from "./types.js";
import { observedWait, silentObserver, sleep, type Waiter, type WaitObserver } from "./wait.js";

export const CANCELLED_REASON = "evaluation cancelled";
export const NO_CLIENT_REASON = "no available client";
export const EXHAUSTED_PREFIX = "retries exhausted: ";

export interface RetryPolicy {
  readonly maxAttempts: number;
  /** Wait after a transient failure, and after finding no key */
  readonly retryDelayMs: number;
  /** Cooldown for a rate-limited key when the backend gave no delay */
  readonly rateLimitDelayMs: number;
}

export interface RetryOptions {
  readonly pool: KeyPool;
  readonly policy: RetryPolicy;
  readonly label: string;
  readonly waiter?: Waiter;
  readonly observer?: WaitObserver;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
}

/** One backend call with one key. Throws on failure; never retries itself. */
export type Attempt = (key: string, attempt: number) => Promise<EvaluationOutcome>;

function errorOutcome(reason: string): EvaluationOutcome {
  return { kind: "error", reason };
}

function fatalReason(failure: FailureClassification): string {
  if (failure.category !== "auth") return failure.reason;
  return `${friendlyErrorMessage(failure.reason, 401)} (${failure.reason})`;
}

/**
 * Run `attempt` until it succeeds, hits a non-retryable failure, or
 * `policy.maxAttempts` calls have been made. Always resolves.
 */
export async function evaluateWithRetry(attempt: Attempt, options: RetryOptions): Promise<EvaluationOutcome> {
  const { pool, policy, label, signal } = options;
  const waiter = options.waiter ?? sleep;
  const observer = options.observer ?? silentObserver;
  const logger = options.logger ?? silentLogger;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  // Under auto rotation the next acquire already moves away from a cooling
  // key; forcing as well would skip a key and trip the spacing floor.
  const moveOn = async (): Promise<void> => {
    if (pool.policy === "manual") await pool.rotate(true, signal);
  };

  let lastReason = "no attempt made";

  try {
    for (let n = 1; n <= maxAttempts; n++) {
      const isLast = n === maxAttempts;
      const key = await pool.acquire(signal);

      if (key === undefined) {
        lastReason = NO_CLIENT_REASON;
        if (isLast) return errorOutcome(NO_CLIENT_REASON);
        logger.warn(`${label}: no key available, retrying in ${policy.retryDelayMs}ms`);
        await observedWait(waiter, observer, `${label}: waiting for a key`, policy.retryDelayMs, signal);
        continue;
      }

      try {
        return await attempt(key, n);
      } catch (error) {
        if (signal?.aborted) return errorOutcome(CANCELLED_REASON);

        const failure = classifyFailure(error);
        lastReason = failure.reason;

        switch (failure.category) {
          case "aborted":
            return errorOutcome(CANCELLED_REASON);

          case "auth":
          case "fatal":
            logger.error(`${label}: ${failure.reason}`);
            return errorOutcome(fatalReason(failure));

          case "rate_limit": {
            const delayMs = failure.retryAfterMs ?? policy.rateLimitDelayMs;
            logger.warn(
              `${label}: key ${maskKey(key)} rate limited (attempt ${n}/${maxAttempts}), cooling down ${delayMs}ms`,
            );
            pool.markCooldown(key, delayMs);
            if (!isLast) await moveOn();
            break;
          }

          case "transient":
            logger.warn(`${label}: attempt ${n}/${maxAttempts} failed: ${failure.reason}`);
            if (!isLast) {
              await observedWait(waiter, observer, `${label}: retrying`, policy.retryDelayMs, signal);
              await moveOn();
            }
            break;
        }
      }
    }
  } catch (error) {
    // Waits and key acquisition only fail when the caller cancels
    if (signal?.aborted) return errorOutcome(CANCELLED_REASON);
    return errorOutcome(classifyFailure(error).reason);
  }

  return errorOutcome(`${EXHAUSTED_PREFIX}${lastReason}`);
}
