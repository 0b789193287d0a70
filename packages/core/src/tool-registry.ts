// ToolRegistry: maps tool names to capabilities, validates and executes calls

import type { Tool, ToolDefinition, ToolOutcome } from "./types";
import { isContextualTool, ok, err, errorMessage } from "./types";

export class ToolRegistry {
  private tools = new Map<string, Tool>();

  /**
   * Register a tool. A tool with the same name replaces the earlier one and
   * keeps its position in the definition order.
   */
  register(tool: Tool): void {
    this.tools.set(tool.name, tool);
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get names(): string[] {
    return Array.from(this.tools.keys());
  }

  get size(): number {
    return this.tools.size;
  }

  /** Definitions in registration order. */
  getDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map(({ name, description, parameters }) => ({
      name,
      description,
      parameters,
    }));
  }

  /** Pass the current turn's routing info to tools that want it. */
  setContext(channel: string, chatId: string): void {
    for (const tool of this.tools.values()) {
      if (isContextualTool(tool)) tool.setContext(channel, chatId);
    }
  }

  /**
   * Execute a tool by name.
   * Never rejects -- a missing tool, invalid arguments and thrown errors all
   * come back as an error outcome whose text is meant for the model.
   * Output is returned as the tool produced it; each tool owns its size budget.
   */
  async execute(name: string, args: Record<string, unknown>): Promise<ToolOutcome> {
    const tool = this.tools.get(name);
    if (!tool) {
      return err(`Error: Tool "${name}" not found. Available tools: ${this.names.join(", ") || "none"}`);
    }

    try {
      const violations = tool.validate(args);
      if (violations.length > 0) {
        return err(`Error: Invalid parameters for tool "${name}": ${violations.join("; ")}`);
      }

      return ok(await tool.execute(args));
    } catch (e) {
      return err(`Error executing "${name}": ${errorMessage(e)}`);
    }
  }
}

/** Collapse an outcome to the text handed back to the provider. */
export function outcomeText(outcome: ToolOutcome): string {
  return outcome.ok ? outcome.value : outcome.error;
}
