/**
 * Unit tests for ActionError and error classification.
 */

import { describe, it, expect } from "vitest";
import {
  ActionError,
  ErrInvalidAction,
  ErrServerError,
  errorMessage,
  isDescribableError,
  toErrorDescriptor,
} from "./errors.js";

// ── Mocks ───────────────────────────────────────────────────────────

class QuotaError extends Error {
  toErrorDescriptor() {
    return { code: "QuotaExceeded", message: "too many calls" };
  }
}

// ── Tests ───────────────────────────────────────────────────────────

describe("ActionError", () => {
  it("should keep code and message", () => {
    const err = new ActionError({ code: "Conflict", message: "name taken", status: 409 });
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("ActionError");
    expect(err.code).toBe("Conflict");
    expect(err.message).toBe("name taken");
    expect(err.status).toBe(409);
  });

  it("withMessage should return a copy with the same code", () => {
    const err = ErrInvalidAction.withMessage("invalid action 'x'");
    expect(err).not.toBe(ErrInvalidAction);
    expect(err.code).toBe("InvalidAction");
    expect(err.message).toBe("invalid action 'x'");
    expect(ErrInvalidAction.message).toBe("invalid action");
  });

  it("withMessage should carry details and cause", () => {
    const cause = new Error("root");
    const err = ErrServerError.withMessage("wrapped", { details: { k: 1 }, cause });
    expect(err.details).toEqual({ k: 1 });
    expect(err.cause).toBe(cause);
  });
});

describe("toErrorDescriptor", () => {
  it("should return an empty descriptor for undefined and null", () => {
    expect(toErrorDescriptor(undefined)).toEqual({ code: "", message: "" });
    expect(toErrorDescriptor(null)).toEqual({ code: "", message: "" });
  });

  it("should copy an ActionError verbatim", () => {
    const err = new ActionError({ code: "InvalidParameter", message: "Name: Required" });
    expect(toErrorDescriptor(err)).toEqual({ code: "InvalidParameter", message: "Name: Required" });
  });

  it("should use the descriptor of a describable error", () => {
    expect(toErrorDescriptor(new QuotaError("ignored"))).toEqual({
      code: "QuotaExceeded",
      message: "too many calls",
    });
  });

  it("should wrap any other error as ServerError", () => {
    expect(toErrorDescriptor(new Error("boom"))).toEqual({ code: "ServerError", message: "boom" });
    expect(toErrorDescriptor("oops")).toEqual({ code: "ServerError", message: "oops" });
  });
});

describe("isDescribableError", () => {
  it("should detect the toErrorDescriptor capability", () => {
    expect(isDescribableError(new QuotaError())).toBe(true);
    expect(isDescribableError({ toErrorDescriptor: "no" })).toBe(false);
    expect(isDescribableError(new Error("x"))).toBe(false);
    expect(isDescribableError(null)).toBe(false);
  });
});

describe("errorMessage", () => {
  it("should read the message of errors and stringify anything else", () => {
    expect(errorMessage(new Error("a"))).toBe("a");
    expect(errorMessage("b")).toBe("b");
    expect(errorMessage(42)).toBe("42");
  });
});
