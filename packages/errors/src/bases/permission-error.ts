import { VeracityError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { VeracityErrorOptions } from "../types.js";

type PermissionCode = CodesForBase<"PermissionError">;

/**
 * Credential rejected or account not allowed to make the call.
 * Never worth retrying with the same key.
 */
export class PermissionError<C extends PermissionCode = "PROVIDER_AUTH_FAILED"> extends VeracityError {
  readonly _tag = "PermissionError" as const;
  override readonly code: C;

  constructor(options: VeracityErrorOptions<C>) {
    super(options);
    this.code = options.code;
  }
}
