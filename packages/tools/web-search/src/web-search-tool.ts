// WebSearchTool: ranked web results (title, URL, snippet) from the Brave
// Search API. Failures are returned as "Error: ..." text, never thrown.

import { z } from "zod";
import type { JsonSchema, Logger, Tool } from "@wayfarer/core";
import { errorMessage, numberArg, stringArg, validateSchema } from "@wayfarer/core";

const DEFAULT_MAX_RESULTS = 5;
const MAX_COUNT = 10;
const DEFAULT_TIMEOUT_MS = 10_000;

export const BRAVE_BASE_URL = "https://api.search.brave.com/res/v1/web/search";

const FRESHNESS = ["pd", "pw", "pm", "py"] as const;
export type Freshness = (typeof FRESHNESS)[number];

export interface WebSearchOptions {
  /** Brave subscription token; the tool reports an error on use without one. */
  readonly apiKey?: string | null;
  readonly maxResults?: number;
  readonly timeoutMs?: number;
  readonly logger?: Logger;
}

const BraveResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().optional(),
            url: z.string().optional(),
            description: z.string().optional(),
            age: z.string().optional(),
          }),
        )
        .default([]),
    })
    .optional(),
});

export interface SearchResult {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
  readonly published?: string;
}

/** Clamp a requested result count to 1..10. */
export function clampCount(count: number | undefined, fallback: number): number {
  return Math.min(Math.max(Math.trunc(count ?? fallback), 1), MAX_COUNT);
}

export function formatResults(query: string, results: readonly SearchResult[]): string {
  if (results.length === 0) {
    return `No results for: ${query}`;
  }

  let out = `Web search results for: "${query}"\n\n`;
  results.forEach((r, i) => {
    out += `${i + 1}) ${r.title}\n`;
    out += `   URL: ${r.url}\n`;
    if (r.published) out += `   Published: ${r.published}\n`;
    if (r.snippet) out += `   Snippet: ${r.snippet}\n`;
    out += "\n";
  });
  return out.trimEnd();
}

function isFreshness(value: string | undefined): value is Freshness {
  return FRESHNESS.some((f) => f === value);
}

export class WebSearchTool implements Tool {
  readonly name = "web_search";
  readonly description = "Search the web. Returns titles, URLs, and snippets.";
  readonly parameters: JsonSchema = {
    type: "object",
    properties: {
      query: { type: "string", minLength: 1, description: "Search query" },
      count: { type: "integer", description: "Number of results (1-10)" },
      freshness: {
        type: "string",
        enum: FRESHNESS,
        description: "Limit to the past day (pd), week (pw), month (pm) or year (py)",
      },
    },
    required: ["query"],
  };

  private readonly apiKey: string | null;
  private readonly maxResults: number;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(options: WebSearchOptions = {}) {
    this.apiKey = options.apiKey || null;
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger?.child({ component: "WebSearchTool" });
  }

  validate(args: Record<string, unknown>): string[] {
    return validateSchema(this.parameters, args);
  }

  async execute(args: Record<string, unknown>): Promise<string> {
    const query = stringArg(args, "query") ?? "";
    const count = clampCount(numberArg(args, "count"), this.maxResults);
    const freshness = stringArg(args, "freshness");

    if (!this.apiKey) {
      return "Error: BRAVE_API_KEY is not configured";
    }

    try {
      const params = new URLSearchParams({ q: query, count: String(count) });
      if (isFreshness(freshness)) params.set("freshness", freshness);

      const response = await fetch(`${BRAVE_BASE_URL}?${params}`, {
        headers: {
          "X-Subscription-Token": this.apiKey,
          Accept: "application/json",
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        if (response.status === 401 || response.status === 403) {
          return `Error: Brave API authentication failed (HTTP ${response.status}). Check BRAVE_API_KEY.`;
        }
        if (response.status === 429) {
          return "Error: Brave API rate limit exceeded. Please wait and try again.";
        }
        return `Error: Brave API returned HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`;
      }

      const parsed = BraveResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        return "Error: Unexpected response from Brave API";
      }

      const results = (parsed.data.web?.results ?? []).slice(0, count).map((r) => ({
        title: r.title ?? "(untitled)",
        url: r.url ?? "",
        snippet: r.description ?? "",
        published: r.age,
      }));

      this.logger?.debug("Search completed", { query, count, results: results.length });
      return formatResults(query, results);
    } catch (e) {
      this.logger?.warn("Search failed", { query, error: errorMessage(e) });
      return `Error: Web search failed: ${errorMessage(e)}`;
    }
  }
}
