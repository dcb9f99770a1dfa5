import { VeracityError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { VeracityErrorOptions } from "../types.js";

type InternalCode = CodesForBase<"InternalError">;

/**
 * Bugs and unknown failures. Not expected in normal operation.
 */
export class InternalError<C extends InternalCode = "INTERNAL_ERROR"> extends VeracityError {
  readonly _tag = "InternalError" as const;
  override readonly code: C;

  constructor(options: VeracityErrorOptions<C>) {
    super(options);
    this.code = options.code;
  }
}
