import { describe, it, expect } from "@jest/globals";
import {
  AuthenticationFailure,
  ConnectivityFailure,
  describeError,
  GenericProviderError,
  isAuthenticationFailure,
  isRecoverableFeedError,
  isRecoverableProviderError,
  ParseFailure,
  RetryExhausted,
  ValidationFailure,
} from "../errors";

describe("provider errors", () => {
  it("should carry a category and status code", () => {
    const error = new RetryExhausted("Rate limited", 429);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("RetryExhausted");
    expect(error.category).toBe("retry-exhausted");
    expect(error.statusCode).toBe(429);
  });

  it("should keep the cause", () => {
    const cause = new TypeError("fetch failed");
    const error = new ConnectivityFailure("Network error", undefined, { cause });

    expect(error.cause).toBe(cause);
  });

  it("should treat everything but auth as recoverable", () => {
    expect(isRecoverableProviderError(new ConnectivityFailure("x"))).toBe(true);
    expect(isRecoverableProviderError(new GenericProviderError("x", 500))).toBe(
      true,
    );
    expect(isRecoverableProviderError(new AuthenticationFailure("x", 401))).toBe(
      false,
    );
    expect(isRecoverableProviderError(new Error("x"))).toBe(false);
  });

  it("should let a single feed skip malformed responses", () => {
    expect(isRecoverableFeedError(new ValidationFailure("bad shape"))).toBe(true);
    expect(isRecoverableFeedError(new RetryExhausted("x", 429))).toBe(true);
    expect(isRecoverableFeedError(new ParseFailure("bad date"))).toBe(false);
    expect(isRecoverableFeedError(new AuthenticationFailure("x", 401))).toBe(
      false,
    );
  });

  it("should narrow authentication failures", () => {
    expect(isAuthenticationFailure(new AuthenticationFailure("x", 403))).toBe(
      true,
    );
    expect(isAuthenticationFailure(new ConnectivityFailure("x"))).toBe(false);
  });
});

describe("describeError", () => {
  it("should include the class name and status", () => {
    expect(describeError(new GenericProviderError("HTTP 500", 500))).toBe(
      "GenericProviderError (500): HTTP 500",
    );
    expect(describeError(new ConnectivityFailure("offline"))).toBe(
      "ConnectivityFailure: offline",
    );
  });

  it("should fall back to the message or string value", () => {
    expect(describeError(new ParseFailure("bad date", ""))).toBe("bad date");
    expect(describeError("plain")).toBe("plain");
  });
});
