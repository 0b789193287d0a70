// WebFetchTool: fetch a URL through the SSRF guard and return readable
// content as a JSON payload. Never throws; failures come back as
// {"error", "url"} so the model can see what went wrong.

import type { JsonSchema, Logger, Tool } from "@wayfarer/core";
import { errorMessage, numberArg, stringArg, validateSchema } from "@wayfarer/core";
import { extractContent, type ExtractMode } from "./extract";
import { DEFAULT_TIMEOUT_MS, MAX_REDIRECTS, fetchWithRedirectValidation } from "./fetcher";
import type { HostResolver } from "./url-guard";

const DEFAULT_MAX_CHARS = 50_000;
const MIN_MAX_CHARS = 100;
const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; Wayfarer/0.1; +https://example.invalid/wayfarer)";
const ACCEPT = "text/html,application/xhtml+xml,application/json,text/plain;q=0.9,*/*;q=0.8";

export interface WebFetchOptions {
  readonly maxChars?: number;
  readonly maxRedirects?: number;
  readonly timeoutMs?: number;
  readonly userAgent?: string;
  /** Hostname resolver used by the URL guard; DNS when omitted. */
  readonly resolve?: HostResolver;
  readonly logger?: Logger;
}

export interface WebFetchSuccess {
  readonly url: string;
  readonly finalUrl: string;
  readonly status: number;
  readonly extractor: string;
  readonly truncated: boolean;
  readonly length: number;
  readonly text: string;
}

export interface WebFetchFailure {
  readonly error: string;
  readonly url: string;
}

export type WebFetchPayload = WebFetchSuccess | WebFetchFailure;

export class WebFetchTool implements Tool {
  readonly name = "web_fetch";
  readonly description =
    "Fetch a URL and extract readable content. HTML is converted to markdown or plain text; JSON is pretty-printed.";
  readonly parameters: JsonSchema = {
    type: "object",
    properties: {
      url: { type: "string", description: "URL to fetch (http or https)" },
      extractMode: {
        type: "string",
        enum: ["markdown", "text"],
        description: "Output format for HTML pages (default markdown)",
      },
      maxChars: {
        type: "integer",
        minimum: MIN_MAX_CHARS,
        description: "Maximum characters of content to return",
      },
    },
    required: ["url"],
  };

  private readonly maxChars: number;
  private readonly maxRedirects: number;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly resolve?: HostResolver;
  private readonly logger?: Logger;

  constructor(options: WebFetchOptions = {}) {
    this.maxChars = options.maxChars ?? DEFAULT_MAX_CHARS;
    this.maxRedirects = options.maxRedirects ?? MAX_REDIRECTS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.resolve = options.resolve;
    this.logger = options.logger?.child({ component: "WebFetchTool" });
  }

  validate(args: Record<string, unknown>): string[] {
    return validateSchema(this.parameters, args);
  }

  async execute(args: Record<string, unknown>): Promise<string> {
    return JSON.stringify(await this.fetch(args));
  }

  /** Same as execute(), without serializing the payload. */
  async fetch(args: Record<string, unknown>): Promise<WebFetchPayload> {
    const url = stringArg(args, "url") ?? "";
    const extractMode: ExtractMode = stringArg(args, "extractMode") === "text" ? "text" : "markdown";
    const maxChars = Math.max(MIN_MAX_CHARS, numberArg(args, "maxChars") ?? this.maxChars);

    try {
      const { response, finalUrl } = await fetchWithRedirectValidation(url, {
        maxRedirects: this.maxRedirects,
        timeoutMs: this.timeoutMs,
        resolve: this.resolve,
        headers: { "User-Agent": this.userAgent, Accept: ACCEPT },
      });

      const body = await response.text();
      const extracted = extractContent({
        body,
        contentType: response.headers.get("content-type") ?? "",
        url: finalUrl,
        extractMode,
        maxChars,
      });

      this.logger?.debug("Fetched URL", {
        url,
        finalUrl,
        status: response.status,
        extractor: extracted.extractor,
        length: extracted.text.length,
      });

      return {
        url,
        finalUrl,
        status: response.status,
        extractor: extracted.extractor,
        truncated: extracted.truncated,
        length: extracted.text.length,
        text: extracted.text,
      };
    } catch (e) {
      this.logger?.warn("Fetch failed", { url, error: errorMessage(e) });
      return { error: errorMessage(e), url };
    }
  }
}
