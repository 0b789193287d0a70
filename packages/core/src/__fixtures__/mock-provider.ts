// Test fixture: mock provider that replays scripted responses

import type { ChatMessage, ChatRequest, LLMResponse, Provider, ToolCall } from "../types";

export type ScriptedResponse = LLMResponse | Error;

export class MockProvider implements Provider {
  readonly name = "mock";
  readonly defaultModel = "mock-model";
  public callHistory: ChatRequest[] = [];
  private script: ScriptedResponse[];

  /** Responses are consumed in order; once exhausted the default text reply is returned. */
  constructor(script: ScriptedResponse[] = []) {
    this.script = [...script];
  }

  async chat(request: ChatRequest): Promise<LLMResponse> {
    this.callHistory.push({ ...request, messages: [...request.messages] });

    const next = this.script.shift();
    if (next instanceof Error) throw next;
    return next ?? textResponse("Hello from mock provider.");
  }

  /** Queue more responses after the current script. */
  enqueue(...responses: ScriptedResponse[]): void {
    this.script.push(...responses);
  }

  /** Messages sent with the last call. */
  lastCall(): ChatMessage[] | undefined {
    return this.callHistory.at(-1)?.messages;
  }
}

export function textResponse(content: string | null): LLMResponse {
  return { content, toolCalls: [], finishReason: "stop" };
}

export function toolResponse(toolCalls: ToolCall[], content: string | null = null): LLMResponse {
  return { content, toolCalls, finishReason: "tool_calls" };
}
