// Argument validation against the JSON Schema subset tools advertise,
// plus defineTool() for building a Tool from a definition and handler.

import type { JsonSchema, Tool, ToolDefinition } from "./types";

export type ToolHandler = (args: Record<string, unknown>) => Promise<string>;

function typeOf(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "number") return Number.isInteger(value) ? "integer" : "number";
  return typeof value;
}

function matchesType(value: unknown, type: string): boolean {
  const actual = typeOf(value);
  if (type === "number") return actual === "number" || actual === "integer";
  return actual === type;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate `value` against `schema`. Returns one message per violation;
 * `path` names the parameter in messages ("parameter" at the root).
 */
export function validateSchema(schema: JsonSchema, value: unknown, path = "parameter"): string[] {
  const errors: string[] = [];

  if (schema.type !== undefined) {
    const types = typeof schema.type === "string" ? [schema.type] : schema.type;
    if (!types.some((t) => matchesType(value, t))) {
      errors.push(`${path} should be ${types.join(" or ")}`);
      return errors;
    }
  }

  if (schema.enum && !schema.enum.some((option) => option === value)) {
    errors.push(`${path} must be one of ${schema.enum.map((o) => JSON.stringify(o)).join(", ")}`);
  }

  if (typeof value === "number") {
    if (schema.minimum !== undefined && value < schema.minimum) {
      errors.push(`${path} must be >= ${schema.minimum}`);
    }
    if (schema.maximum !== undefined && value > schema.maximum) {
      errors.push(`${path} must be <= ${schema.maximum}`);
    }
  }

  if (typeof value === "string") {
    if (schema.minLength !== undefined && value.length < schema.minLength) {
      errors.push(`${path} must be at least ${schema.minLength} chars`);
    }
    if (schema.maxLength !== undefined && value.length > schema.maxLength) {
      errors.push(`${path} must be at most ${schema.maxLength} chars`);
    }
  }

  if (Array.isArray(value)) {
    if (schema.minItems !== undefined && value.length < schema.minItems) {
      errors.push(`${path} must have at least ${schema.minItems} items`);
    }
    if (schema.maxItems !== undefined && value.length > schema.maxItems) {
      errors.push(`${path} must have at most ${schema.maxItems} items`);
    }
    if (schema.items) {
      const itemSchema = schema.items;
      value.forEach((item, i) => {
        errors.push(...validateSchema(itemSchema, item, `${path}[${i}]`));
      });
    }
  }

  if (isRecord(value)) {
    for (const key of schema.required ?? []) {
      if (!(key in value) || value[key] === undefined) {
        errors.push(`missing required ${path === "parameter" ? key : `${path}.${key}`}`);
      }
    }
    for (const [key, propSchema] of Object.entries(schema.properties ?? {})) {
      if (value[key] === undefined) continue;
      const childPath = path === "parameter" ? key : `${path}.${key}`;
      errors.push(...validateSchema(propSchema, value[key], childPath));
    }
  }

  return errors;
}

export interface ToolSpec extends ToolDefinition {
  readonly execute: ToolHandler;
  /** Replaces schema validation when a tool needs custom rules. */
  readonly validate?: (args: Record<string, unknown>) => string[];
}

/**
 * Build a Tool from its definition and handler. Arguments are validated
 * against `parameters` unless the spec supplies its own validator.
 */
export function defineTool(spec: ToolSpec): Tool {
  const { name, description, parameters, execute } = spec;
  const validate = spec.validate ?? ((args: Record<string, unknown>) => validateSchema(parameters, args));
  return { name, description, parameters, validate, execute };
}

/** Read a string argument that the schema has already checked. */
export function stringArg(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" ? value : undefined;
}

/** Read a numeric argument that the schema has already checked. */
export function numberArg(args: Record<string, unknown>, key: string): number | undefined {
  const value = args[key];
  return typeof value === "number" ? value : undefined;
}
