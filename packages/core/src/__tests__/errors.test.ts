import { describe, it, expect } from "vitest";
import {
  isAbortError,
  isTransientNetworkError,
  classifyError,
  errorMessage,
  ProviderConfigError,
} from "../errors.js";

describe("isAbortError", () => {
  it("detects DOMException AbortError", () => {
    expect(isAbortError(new DOMException("Aborted", "AbortError"))).toBe(true);
  });

  it("detects the TimeoutError raised by AbortSignal.timeout", () => {
    expect(isAbortError(new DOMException("timed out", "TimeoutError"))).toBe(true);
  });

  it("returns false for regular errors", () => {
    expect(isAbortError(new Error("nope"))).toBe(false);
  });
});

describe("isTransientNetworkError", () => {
  it("detects ECONNREFUSED", () => {
    const err = Object.assign(new Error("refused"), { code: "ECONNREFUSED" });
    expect(isTransientNetworkError(err)).toBe(true);
  });

  it("detects fetch failed TypeError with transient cause", () => {
    const cause = Object.assign(new Error("dns"), { code: "ENOTFOUND" });
    const err = new TypeError("fetch failed", { cause });
    expect(isTransientNetworkError(err)).toBe(true);
  });

  it("detects transient error in cause chain", () => {
    const inner = Object.assign(new Error("reset"), { code: "ECONNRESET" });
    const outer = new Error("wrapper", { cause: inner });
    expect(isTransientNetworkError(outer)).toBe(true);
  });

  it("detects AggregateError with transient element", () => {
    const transient = Object.assign(new Error("timeout"), { code: "ETIMEDOUT" });
    const agg = new AggregateError([new Error("other"), transient]);
    expect(isTransientNetworkError(agg)).toBe(true);
  });

  it("returns false for non-network errors and nullish values", () => {
    expect(isTransientNetworkError(new Error("something else"))).toBe(false);
    expect(isTransientNetworkError(null)).toBe(false);
    expect(isTransientNetworkError(undefined)).toBe(false);
  });
});

describe("classifyError", () => {
  it("classifies a missing provider key as config", () => {
    expect(classifyError(new ProviderConfigError("OPENAI_API_KEY is not set"))).toBe("config");
  });

  it("classifies fatal errors", () => {
    const err = Object.assign(new Error("oom"), { code: "ERR_OUT_OF_MEMORY" });
    expect(classifyError(err)).toBe("fatal");
  });

  it("classifies transient errors", () => {
    const err = Object.assign(new Error("host"), { code: "EHOSTUNREACH" });
    expect(classifyError(err)).toBe("transient");
  });

  it("classifies timeouts as abort", () => {
    expect(classifyError(new DOMException("timed out", "TimeoutError"))).toBe("abort");
  });

  it("classifies unknown errors", () => {
    expect(classifyError(new Error("mystery"))).toBe("unknown");
  });
});

describe("errorMessage", () => {
  it("reads the message of an Error", () => {
    expect(errorMessage(new Error("Connection timeout"))).toBe("Connection timeout");
  });

  it("passes strings through", () => {
    expect(errorMessage("plain")).toBe("plain");
  });

  it("falls back for other values", () => {
    expect(errorMessage({ weird: true })).toBe("Unknown error");
  });
});
