import {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";
import type { VeracityErrorOptions } from "./types.js";

/**
 * Serialized form of a VeracityError, safe to log or send over the wire.
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly metadata?: Readonly<Record<string, string>>;
  readonly traceId?: string;
  readonly timestamp: string;
}

/**
 * Root of the error hierarchy. Concrete errors extend one of the base types
 * in `bases/`, which fix `_tag` and narrow `code`.
 */
export abstract class VeracityError extends Error {
  abstract readonly _tag: BaseErrorType;
  readonly code: ErrorCode;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly metadata: Readonly<Record<string, string>> | undefined;
  readonly traceId: string | undefined;
  readonly timestamp: string;

  protected constructor(options: VeracityErrorOptions<ErrorCode>) {
    super(options.message, options.cause ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    const entry: ErrorCatalogEntry = ERROR_CATALOG[options.code];
    this.code = options.code;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.metadata = options.metadata;
    this.traceId = options.traceId;
    this.timestamp = new Date().toISOString();
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      domain: this.domain,
      isExpected: this.isExpected,
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.traceId ? { traceId: this.traceId } : {}),
      timestamp: this.timestamp,
    };
  }
}

export function isVeracityError(error: unknown): error is VeracityError {
  return error instanceof VeracityError;
}
