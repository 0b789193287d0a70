import { describe, expect, test } from "vitest";
import { WayfarerConfigSchema, HttpUrlSchema } from "../schema";
import { defaultConfig } from "../defaults";
import { redactConfig } from "../redact";

describe("WayfarerConfigSchema", () => {
  test("parses empty object to full defaults", () => {
    const config = WayfarerConfigSchema.parse({});
    expect(config.logLevel).toBe("info");
    expect(config.agent).toEqual({
      model: null,
      maxIterations: 20,
      temperature: 0.7,
      maxTokens: 4096,
      memoryWindow: 50,
      systemPrompt: null,
    });
    expect(config.provider.baseUrl).toBe("http://localhost:1234/v1");
    expect(config.provider.apiKey).toBeNull();
    expect(config.memory.path).toBe("data/wayfarer.db");
    expect(config.tools.webFetch).toEqual({ enabled: true, maxChars: 50_000, maxRedirects: 5, timeoutMs: 30_000 });
    expect(config.tools.webSearch).toEqual({ enabled: true, braveApiKey: null, maxResults: 5 });
    expect(config.channels.cli.enabled).toBe(true);
  });

  test("defaultConfig matches the schema defaults", () => {
    expect(defaultConfig()).toEqual(WayfarerConfigSchema.parse({}));
  });

  test("accepts partial overrides", () => {
    const config = WayfarerConfigSchema.parse({
      agent: { maxIterations: 5 },
      tools: { webSearch: { enabled: false } },
    });
    expect(config.agent.maxIterations).toBe(5);
    expect(config.agent.memoryWindow).toBe(50);
    expect(config.tools.webSearch.enabled).toBe(false);
    expect(config.tools.webFetch.enabled).toBe(true);
  });

  test("rejects out-of-range values", () => {
    expect(WayfarerConfigSchema.safeParse({ agent: { maxIterations: 0 } }).success).toBe(false);
    expect(WayfarerConfigSchema.safeParse({ agent: { temperature: 3 } }).success).toBe(false);
    expect(WayfarerConfigSchema.safeParse({ tools: { webFetch: { maxChars: 99 } } }).success).toBe(false);
    expect(WayfarerConfigSchema.safeParse({ tools: { webSearch: { maxResults: 11 } } }).success).toBe(false);
    expect(WayfarerConfigSchema.safeParse({ logLevel: "verbose" }).success).toBe(false);
  });
});

describe("HttpUrlSchema", () => {
  test("accepts http and https", () => {
    expect(HttpUrlSchema.safeParse("https://api.example.com/v1").success).toBe(true);
    expect(HttpUrlSchema.safeParse("http://localhost:1234").success).toBe(true);
  });

  test("rejects other schemes and garbage", () => {
    expect(HttpUrlSchema.safeParse("ftp://example.com").success).toBe(false);
    expect(HttpUrlSchema.safeParse("not a url").success).toBe(false);
  });
});

describe("redactConfig", () => {
  test("masks secrets that are set and leaves the input alone", () => {
    const config = WayfarerConfigSchema.parse({
      provider: { apiKey: "test-secret" },
    });
    const redacted = redactConfig(config);

    expect(redacted.provider.apiKey).toBe("[redacted]");
    expect(redacted.tools.webSearch.braveApiKey).toBeNull();
    expect(config.provider.apiKey).toBe("test-secret");
  });
});
