// Error classification for OpenAI-compatible providers.
//
// Split into two categories:
//   Transport errors: connectivity problems (server not running, DNS, timeout)
//   Provider errors: the server responded but rejected the request (auth, rate limit, etc.)

import type { ProviderErrorCode } from "@wayfarer/core";

/** Non-2xx response from the Chat Completions endpoint. */
export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
    providerName: string,
  ) {
    super(`${providerName} API error: Status ${status}\nBody: ${body}`);
    this.name = "HttpStatusError";
  }
}

function mentionsContextLength(text: string): boolean {
  return (
    text.includes("context length") ||
    text.includes("context_length") ||
    text.includes("maximum context") ||
    text.includes("too long")
  );
}

function classifyStatus(err: HttpStatusError): ProviderErrorCode {
  const body = err.body.toLowerCase();
  if (err.status === 401 || err.status === 403) return "auth_failed";
  if (err.status === 429) return "throttled";
  if (err.status === 400 || err.status === 413 || err.status === 422) {
    return mentionsContextLength(body) ? "context_length_exceeded" : "invalid_request";
  }
  if (err.status >= 500) return "transient_network";
  return "unknown";
}

/**
 * Map a caught error to a normalized ProviderErrorCode.
 * HTTP status errors are classified by status; anything else (network-level
 * errors such as ECONNREFUSED, aborts) by its message.
 */
export function classifyError(err: unknown): ProviderErrorCode {
  if (err instanceof HttpStatusError) {
    return classifyStatus(err);
  }

  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    const name = err.name.toLowerCase();

    // Cancellation (check before network; AbortError is not a transport failure)
    if (name === "aborterror" || name === "timeouterror" || msg.includes("aborted") || msg.includes("cancelled")) {
      return "cancelled";
    }

    if (
      msg.includes("econnrefused") ||
      msg.includes("econnreset") ||
      msg.includes("enotfound") ||
      msg.includes("etimedout") ||
      msg.includes("network") ||
      msg.includes("fetch failed")
    ) {
      return "transient_network";
    }

    if (msg.includes("api key") || msg.includes("unauthorized") || msg.includes("forbidden")) {
      return "auth_failed";
    }

    if (msg.includes("rate limit") || msg.includes("quota")) {
      return "throttled";
    }

    if (mentionsContextLength(msg)) {
      return "context_length_exceeded";
    }
  }
  return "unknown";
}

/**
 * Build a human-readable error hint for local servers (where the user
 * needs to know if their server is actually running).
 */
export function buildErrorHint(
  code: ProviderErrorCode,
  providerName: string,
  baseUrl: string,
): string {
  if (code === "transient_network") {
    return ` — is ${providerName} reachable at ${baseUrl}?`;
  }
  if (code === "auth_failed") {
    return " — check the configured API key";
  }
  return "";
}
