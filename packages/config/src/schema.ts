import { z } from "zod";
import { LOG_LEVELS } from "@wayfarer/core";

export const HttpUrlSchema = z
  .string()
  .refine((value) => {
    try {
      const url = new URL(value);
      return url.protocol === "http:" || url.protocol === "https:";
    } catch {
      return false;
    }
  }, "Invalid URL (expected http:// or https://)");

export const LogLevelEnum = z.enum(LOG_LEVELS);

const AgentSchema = z.object({
  /** Overrides provider.model when set. */
  model: z.string().min(1).nullable().default(null),
  maxIterations: z.number().int().positive().default(20),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().default(4096),
  memoryWindow: z.number().int().min(2).default(50),
  systemPrompt: z.string().nullable().default(null),
});

const ProviderSchema = z.object({
  name: z.string().default("openai-compat"),
  baseUrl: HttpUrlSchema.default("http://localhost:1234/v1"),
  apiKey: z.string().nullable().default(null),
  model: z.string().min(1).default("gpt-4o-mini"),
});

const MemorySchema = z.object({
  path: z.string().min(1).default("data/wayfarer.db"),
});

const WebFetchSchema = z.object({
  enabled: z.boolean().default(true),
  maxChars: z.number().int().min(100).default(50_000),
  maxRedirects: z.number().int().min(0).max(20).default(5),
  timeoutMs: z.number().int().positive().default(30_000),
});

const WebSearchSchema = z.object({
  enabled: z.boolean().default(true),
  braveApiKey: z.string().nullable().default(null),
  maxResults: z.number().int().min(1).max(10).default(5),
});

const ToolsSchema = z.object({
  webFetch: WebFetchSchema.default({}),
  webSearch: WebSearchSchema.default({}),
});

const CliChannelSchema = z.object({
  enabled: z.boolean().default(true),
});

const ChannelsSchema = z.object({
  cli: CliChannelSchema.default({}),
});

export const WayfarerConfigSchema = z.object({
  logLevel: LogLevelEnum.default("info"),
  agent: AgentSchema.default({}),
  provider: ProviderSchema.default({}),
  memory: MemorySchema.default({}),
  tools: ToolsSchema.default({}),
  channels: ChannelsSchema.default({}),
});
