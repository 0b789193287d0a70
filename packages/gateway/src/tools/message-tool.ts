// MessageTool: lets the model send a message to a channel/chat.
// Defaults to the conversation the current turn came from.

import type { ContextualTool, JsonSchema, MessageBus } from "@wayfarer/core";
import { stringArg, validateSchema } from "@wayfarer/core";

export class MessageTool implements ContextualTool {
  readonly name = "message";
  readonly description =
    "Send a message to the user. Use this to deliver something outside the normal reply, or to reach a different channel or chat.";
  readonly parameters: JsonSchema = {
    type: "object",
    properties: {
      content: { type: "string", minLength: 1, description: "The message text" },
      channel: { type: "string", description: "Target channel (defaults to the current one)" },
      chatId: { type: "string", description: "Target chat (defaults to the current one)" },
    },
    required: ["content"],
  };

  private defaultChannel = "";
  private defaultChatId = "";

  constructor(private readonly bus: MessageBus) {}

  setContext(channel: string, chatId: string): void {
    this.defaultChannel = channel;
    this.defaultChatId = chatId;
  }

  validate(args: Record<string, unknown>): string[] {
    return validateSchema(this.parameters, args);
  }

  async execute(args: Record<string, unknown>): Promise<string> {
    const content = stringArg(args, "content") ?? "";
    const channel = stringArg(args, "channel") || this.defaultChannel;
    const chatId = stringArg(args, "chatId") || this.defaultChatId;

    if (!channel || !chatId) {
      return "Error: No target channel/chat specified";
    }

    await this.bus.publishOutbound({ channel, chatId, content });
    return `Message sent to ${channel}:${chatId}`;
  }
}
