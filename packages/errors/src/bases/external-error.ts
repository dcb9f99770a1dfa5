import { VeracityError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { VeracityErrorOptions } from "../types.js";

type ExternalCode = CodesForBase<"ExternalError">;

/**
 * Errors caused by runtime failures in external dependencies.
 * HTTP 500/502/503. The `.code` field discriminates the specific error;
 * `httpStatus` of the failed upstream response is kept in `upstreamStatus`.
 */
export class ExternalError<C extends ExternalCode = "PROVIDER_ERROR"> extends VeracityError {
  readonly _tag = "ExternalError" as const;
  override readonly code: C;
  readonly upstreamStatus: number | undefined;

  constructor(options: VeracityErrorOptions<C> & { upstreamStatus?: number | undefined }) {
    super(options);
    this.code = options.code;
    this.upstreamStatus = options.upstreamStatus;
  }
}
