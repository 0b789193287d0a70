// Wire types for the OpenAI-compatible Chat Completions API (snake_case).
// Requests are typed; responses are validated with zod before use.

import { z } from "zod";

export interface WireToolDef {
  type: "function";
  function: { name: string; description: string; parameters: unknown };
}

export interface WireToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export type WireMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: WireToolCall[]; reasoning_content?: string }
  | { role: "tool"; tool_call_id: string; name?: string; content: string };

export interface WireRequest {
  model: string;
  messages: WireMessage[];
  tools?: WireToolDef[];
  tool_choice?: "auto";
  temperature?: number;
  max_tokens?: number;
}

const WireResponseToolCallSchema = z.object({
  id: z.string().optional(),
  type: z.string().optional(),
  function: z.object({
    name: z.string(),
    arguments: z.string().nullish(),
  }),
});

// Some "compatible" servers put reasoning in `reasoning`, others in `reasoning_content`
const WireResponseMessageSchema = z.object({
  content: z.string().nullish(),
  reasoning: z.string().nullish(),
  reasoning_content: z.string().nullish(),
  tool_calls: z.array(WireResponseToolCallSchema).nullish(),
});

export const WireResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: WireResponseMessageSchema,
        finish_reason: z.string().nullish(),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .nullish(),
});

export type WireResponse = z.infer<typeof WireResponseSchema>;
export type WireResponseMessage = z.infer<typeof WireResponseMessageSchema>;
