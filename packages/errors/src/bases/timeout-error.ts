import { VeracityError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { VeracityErrorOptions } from "../types.js";

type TimeoutCode = CodesForBase<"TimeoutError">;

export class TimeoutError<C extends TimeoutCode = "PROVIDER_TIMEOUT"> extends VeracityError {
  readonly _tag = "TimeoutError" as const;
  override readonly code: C;
  readonly timeoutMs: number | undefined;

  constructor(options: VeracityErrorOptions<C> & { timeoutMs?: number | undefined }) {
    super(options);
    this.code = options.code;
    this.timeoutMs = options.timeoutMs;
  }
}
