import { describe, expect, it } from "vitest";
import {
  BattleMetricsRateLimitedError,
  ERROR_CATALOG,
  getCatalogEntry,
  getErrorMessage,
  InternalError,
  isValidErrorCode,
  wrapError,
} from "../../index.js";

describe("ERROR_CATALOG", () => {
  it("should have valid HTTP status codes for all entries", () => {
    for (const entry of Object.values(ERROR_CATALOG)) {
      expect(entry.httpStatus).toBeGreaterThanOrEqual(400);
      expect(entry.httpStatus).toBeLessThan(600);
    }
  });

  it("should use UPPER_SNAKE_CASE codes", () => {
    for (const code of Object.keys(ERROR_CATALOG)) {
      expect(code).toMatch(/^[A-Z]+(_[A-Z]+)*$/);
    }
  });
});

describe("catalog utilities", () => {
  it("getCatalogEntry returns the entry for a code", () => {
    expect(getCatalogEntry("CORRELATION_INPUT_INVALID").baseType).toBe("ValidationError");
  });

  it("isValidErrorCode accepts known codes only", () => {
    expect(isValidErrorCode("BATTLEMETRICS_UNAUTHORIZED")).toBe(true);
    expect(isValidErrorCode("NOPE")).toBe(false);
    expect(isValidErrorCode("toString")).toBe(false);
  });
});

describe("wrapError", () => {
  it("passes package errors through", () => {
    const error = new BattleMetricsRateLimitedError("/sessions");
    expect(wrapError(error)).toBe(error);
  });

  it("wraps plain errors as InternalError", () => {
    const wrapped = wrapError(new TypeError("bad"));

    expect(wrapped).toBeInstanceOf(InternalError);
    expect(wrapped.message).toBe("bad");
    expect(wrapped.metadata).toEqual({ originalName: "TypeError" });
  });

  it("wraps non-errors", () => {
    expect(wrapError("oops").message).toBe("oops");
    expect(wrapError(42).message).toBe("An unknown error occurred");
  });
});

describe("getErrorMessage", () => {
  it("extracts messages from errors and strings", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom");
    expect(getErrorMessage("text")).toBe("text");
    expect(getErrorMessage(null)).toBe("An unknown error occurred");
  });
});
