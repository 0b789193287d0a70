// Redirect-validating fetch: every hop is checked by the URL guard before
// it is requested, and the whole chain shares one deadline

import { WayfarerError, errorMessage } from "@wayfarer/core";
import { validateUrl, type HostResolver } from "./url-guard";

export const MAX_REDIRECTS = 5;
export const DEFAULT_TIMEOUT_MS = 30_000;

const REDIRECT_STATUSES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308]);

export class FetchError extends WayfarerError {
  constructor(
    message: string,
    public readonly url: string,
    cause?: unknown,
  ) {
    super(message, "FETCH_ERROR", cause);
    this.name = "FetchError";
  }
}

export interface FetchChainOptions {
  readonly maxRedirects?: number;
  readonly timeoutMs?: number;
  readonly headers?: Record<string, string>;
  readonly resolve?: HostResolver;
}

export interface FetchChainResult {
  /** Final 2xx response; its body has not been read. */
  readonly response: Response;
  readonly finalUrl: string;
  readonly redirects: number;
}

export function isRedirectStatus(status: number): boolean {
  return REDIRECT_STATUSES.has(status);
}

function isTimeout(e: unknown): boolean {
  return e instanceof Error && (e.name === "TimeoutError" || e.name === "AbortError");
}

async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) await response.body.cancel();
}

/**
 * Fetch `url`, following at most `maxRedirects` redirects by hand.
 * Rejects with FetchError when any hop fails validation, a redirect has no
 * Location, the limit is exceeded, the deadline passes or the final status
 * is not 2xx.
 */
export async function fetchWithRedirectValidation(
  url: string,
  options: FetchChainOptions = {},
): Promise<FetchChainResult> {
  const maxRedirects = options.maxRedirects ?? MAX_REDIRECTS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const signal = AbortSignal.timeout(timeoutMs);

  let current = url;
  let redirects = 0;

  for (;;) {
    const check = await validateUrl(current, { resolve: options.resolve });
    if (!check.valid) {
      throw new FetchError(redirects === 0 ? check.reason : `Redirect blocked: ${check.reason}`, current);
    }

    let response: Response;
    try {
      response = await fetch(current, { headers: options.headers, redirect: "manual", signal });
    } catch (e) {
      if (isTimeout(e)) {
        throw new FetchError(`Request timed out after ${timeoutMs}ms`, current, e);
      }
      throw new FetchError(`Network error: ${errorMessage(e)}`, current, e);
    }

    if (isRedirectStatus(response.status)) {
      const location = response.headers.get("location");
      await discardBody(response);
      if (!location) {
        throw new FetchError(`Redirect ${response.status} without Location header`, current);
      }
      if (redirects >= maxRedirects) {
        throw new FetchError(`Too many redirects (max ${maxRedirects})`, current);
      }
      redirects++;
      try {
        current = new URL(location, current).toString();
      } catch (e) {
        throw new FetchError(`Invalid redirect Location: ${location}`, current, e);
      }
      continue;
    }

    if (!response.ok) {
      await discardBody(response);
      throw new FetchError(`HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`, current);
    }

    return { response, finalUrl: current, redirects };
  }
}
