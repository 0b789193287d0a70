import { describe, test, expect } from "vitest";
import { classifyError, buildErrorHint, HttpStatusError } from "../errors";

describe("classifyError", () => {
  test("returns 'cancelled' for AbortError", () => {
    const err = new DOMException("The operation was aborted", "AbortError");
    expect(classifyError(err)).toBe("cancelled");
  });

  test("returns 'cancelled' for cancelled message", () => {
    expect(classifyError(new Error("Request cancelled"))).toBe("cancelled");
  });

  test("returns 'transient_network' for connection failures", () => {
    expect(classifyError(new Error("connect ECONNREFUSED 127.0.0.1:8080"))).toBe("transient_network");
    expect(classifyError(new Error("read ECONNRESET"))).toBe("transient_network");
    expect(classifyError(new Error("getaddrinfo ENOTFOUND api.example.com"))).toBe("transient_network");
    expect(classifyError(new Error("fetch failed"))).toBe("transient_network");
  });

  test("classifies HTTP statuses", () => {
    expect(classifyError(new HttpStatusError(401, "", "test"))).toBe("auth_failed");
    expect(classifyError(new HttpStatusError(403, "", "test"))).toBe("auth_failed");
    expect(classifyError(new HttpStatusError(429, "slow down", "test"))).toBe("throttled");
    expect(classifyError(new HttpStatusError(400, "bad field", "test"))).toBe("invalid_request");
    expect(classifyError(new HttpStatusError(503, "", "test"))).toBe("transient_network");
    expect(classifyError(new HttpStatusError(404, "", "test"))).toBe("unknown");
  });

  test("a 400 about context length is context_length_exceeded", () => {
    const err = new HttpStatusError(400, '{"error":{"code":"context_length_exceeded"}}', "test");
    expect(classifyError(err)).toBe("context_length_exceeded");
  });

  test("falls back to message heuristics", () => {
    expect(classifyError(new Error("Invalid API key"))).toBe("auth_failed");
    expect(classifyError(new Error("rate limit reached"))).toBe("throttled");
    expect(classifyError(new Error("prompt is too long"))).toBe("context_length_exceeded");
    expect(classifyError(new Error("something odd"))).toBe("unknown");
    expect(classifyError("not an error")).toBe("unknown");
  });

  test("HttpStatusError carries the status and body in its message", () => {
    expect(new HttpStatusError(500, "oops", "lmstudio").message).toBe("lmstudio API error: Status 500\nBody: oops");
  });
});

describe("buildErrorHint", () => {
  test("points at the base URL for network failures", () => {
    expect(buildErrorHint("transient_network", "lmstudio", "http://localhost:1234/v1")).toBe(
      " — is lmstudio reachable at http://localhost:1234/v1?",
    );
  });

  test("mentions the key for auth failures", () => {
    expect(buildErrorHint("auth_failed", "openai", "https://api.openai.com/v1")).toBe(
      " — check the configured API key",
    );
  });

  test("is empty otherwise", () => {
    expect(buildErrorHint("throttled", "openai", "https://api.openai.com/v1")).toBe("");
  });
});
