import { VeracityError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { VeracityErrorOptions } from "../types.js";

type RateLimitCode = CodesForBase<"RateLimitError">;

/**
 * Resource exhaustion. `retryAfterMs` carries the delay the backend asked
 * for, when it said one.
 */
export class RateLimitError<C extends RateLimitCode = "PROVIDER_RATE_LIMITED"> extends VeracityError {
  readonly _tag = "RateLimitError" as const;
  override readonly code: C;
  readonly retryAfterMs: number | undefined;

  constructor(options: VeracityErrorOptions<C> & { retryAfterMs?: number | undefined }) {
    super(options);
    this.code = options.code;
    this.retryAfterMs = options.retryAfterMs;
  }
}
