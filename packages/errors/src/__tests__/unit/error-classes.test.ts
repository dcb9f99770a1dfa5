import { describe, expect, it } from "vitest";
import {
  ExternalError,
  hasCode,
  InternalError,
  isExpectedError,
  isExternalError,
  isPermissionError,
  isRateLimitError,
  isTimeoutError,
  isValidationError,
  PermissionError,
  RateLimitError,
  TimeoutError,
  ValidationError,
  VeracityError,
  getErrorMessage,
  wrapError,
} from "../../index.js";

describe("base types: options object constructor", () => {
  it("ValidationError with code + issues", () => {
    const error = new ValidationError({
      code: "CONFIG_INVALID",
      message: "Invalid config",
      metadata: { file: "gateway.yaml" },
      traceId: "t1",
      issues: [{ field: "providers.0.type", message: "bad enum", code: "invalid_enum_value" }],
    });

    expect(error._tag).toBe("ValidationError");
    expect(error.code).toBe("CONFIG_INVALID");
    expect(error.httpStatus).toBe(400);
    expect(error.grpcCode).toBe("INVALID_ARGUMENT");
    expect(error.domain).toBe("config");
    expect(error.isExpected).toBe(true);
    expect(error.issues).toHaveLength(1);
    expect(error.metadata).toEqual({ file: "gateway.yaml" });
    expect(error.traceId).toBe("t1");
    expect(error.name).toBe("ValidationError");
    expect(error).toBeInstanceOf(VeracityError);
    expect(error).toBeInstanceOf(Error);
  });

  it("RateLimitError carries the suggested delay", () => {
    const error = new RateLimitError({
      code: "PROVIDER_RATE_LIMITED",
      message: "slow down",
      retryAfterMs: 18_000,
    });
    expect(error._tag).toBe("RateLimitError");
    expect(error.retryAfterMs).toBe(18_000);
    expect(error.grpcCode).toBe("RESOURCE_EXHAUSTED");
  });

  it("ExternalError keeps the upstream status and cause", () => {
    const cause = new Error("socket hang up");
    const error = new ExternalError({
      code: "PROVIDER_ERROR",
      message: "HTTP 502",
      upstreamStatus: 502,
      cause,
    });
    expect(error.upstreamStatus).toBe(502);
    expect(error.cause).toBe(cause);
    expect(error.isExpected).toBe(false);
  });

  it("toJSON omits absent optional fields", () => {
    const error = new PermissionError({ code: "PROVIDER_AUTH_FAILED", message: "bad key" });
    const json = error.toJSON();
    expect(json).toMatchObject({
      _tag: "PermissionError",
      name: "PermissionError",
      code: "PROVIDER_AUTH_FAILED",
      message: "bad key",
      httpStatus: 401,
    });
    expect("metadata" in json).toBe(false);
    expect("traceId" in json).toBe(false);
  });
});

describe("guards", () => {
  const errors = {
    validation: new ValidationError({ code: "CONFIG_INVALID", message: "v" }),
    permission: new PermissionError({ code: "PROVIDER_QUOTA_EXCEEDED", message: "p" }),
    rateLimit: new RateLimitError({ code: "PROVIDER_RATE_LIMITED", message: "r" }),
    timeout: new TimeoutError({ code: "PROVIDER_TIMEOUT", message: "t", timeoutMs: 1000 }),
    external: new ExternalError({ code: "PROVIDER_UNAVAILABLE", message: "e" }),
  };

  it("each guard matches exactly one base type", () => {
    expect(isValidationError(errors.validation)).toBe(true);
    expect(isPermissionError(errors.permission)).toBe(true);
    expect(isRateLimitError(errors.rateLimit)).toBe(true);
    expect(isTimeoutError(errors.timeout)).toBe(true);
    expect(isExternalError(errors.external)).toBe(true);

    expect(isRateLimitError(errors.external)).toBe(false);
    expect(isPermissionError(new Error("plain"))).toBe(false);
  });

  it("hasCode narrows on the code literal", () => {
    expect(hasCode(errors.permission, "PROVIDER_QUOTA_EXCEEDED")).toBe(true);
    expect(hasCode(errors.permission, "PROVIDER_AUTH_FAILED")).toBe(false);
  });

  it("isExpectedError reads the catalog flag", () => {
    expect(isExpectedError(errors.rateLimit)).toBe(true);
    expect(isExpectedError(errors.external)).toBe(false);
    expect(isExpectedError({ isExpected: true })).toBe(false);
  });
});

describe("wrapError / getErrorMessage", () => {
  it("returns VeracityErrors unchanged", () => {
    const error = new InternalError({ code: "INTERNAL_ERROR", message: "boom" });
    expect(wrapError(error)).toBe(error);
  });

  it("wraps plain errors as InternalError", () => {
    const wrapped = wrapError(new TypeError("bad"), "trace-1");
    expect(wrapped).toBeInstanceOf(InternalError);
    expect(wrapped.message).toBe("bad");
    expect(wrapped.metadata).toEqual({ originalName: "TypeError" });
    expect(wrapped.traceId).toBe("trace-1");
  });

  it("wraps non-errors with a fallback message", () => {
    expect(wrapError("text").message).toBe("text");
    expect(wrapError(42).message).toBe("An unknown error occurred");
  });

  it("extracts messages", () => {
    expect(getErrorMessage(new Error("x"))).toBe("x");
    expect(getErrorMessage("y")).toBe("y");
    expect(getErrorMessage(undefined)).toBe("An unknown error occurred");
  });
});
