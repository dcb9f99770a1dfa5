import { VeracityError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { ValidationIssue, VeracityErrorOptions } from "../types.js";

type ValidationCode = CodesForBase<"ValidationError">;

/**
 * Errors caused by invalid input or configuration.
 * HTTP 400-class. The `.code` field discriminates the specific error.
 */
export class ValidationError<
  C extends ValidationCode = "CONFIG_INVALID",
> extends VeracityError {
  readonly _tag = "ValidationError" as const;
  override readonly code: C;

  /** Structured validation issues (populated for schema failures) */
  readonly issues: readonly ValidationIssue[];

  constructor(options: VeracityErrorOptions<C> & { issues?: readonly ValidationIssue[] }) {
    super(options);
    this.code = options.code;
    this.issues = options.issues ?? [];
  }
}
