import { readFile } from "node:fs/promises";
import JSON5 from "json5";
import { ConfigError, err, errorMessage, ok, type Result } from "@wayfarer/core";
import { WayfarerConfigSchema } from "./schema";
import type { WayfarerConfig } from "./types";

export type Env = Readonly<Record<string, string | undefined>>;

export interface LoadConfigOptions {
  /** JSON5 file to read; a missing file means defaults. */
  readonly path?: string;
  readonly env?: Env;
}

/** Environment variable → config path. Values are applied after the file. */
export const ENV_OVERRIDES: ReadonlyArray<readonly [string, readonly string[]]> = [
  ["WAYFARER_LOG_LEVEL", ["logLevel"]],
  ["WAYFARER_MODEL", ["agent", "model"]],
  ["WAYFARER_PROVIDER_BASE_URL", ["provider", "baseUrl"]],
  ["WAYFARER_API_KEY", ["provider", "apiKey"]],
  ["WAYFARER_MEMORY_PATH", ["memory", "path"]],
  ["BRAVE_API_KEY", ["tools", "webSearch", "braveApiKey"]],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Copy of `target` with `value` written at `path`, creating objects on the way. */
function setPath(target: Record<string, unknown>, path: readonly string[], value: string): Record<string, unknown> {
  const [head, ...rest] = path;
  if (head === undefined) return target;
  if (rest.length === 0) return { ...target, [head]: value };
  const child = target[head];
  return { ...target, [head]: setPath(isRecord(child) ? child : {}, rest, value) };
}

export function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  let result = raw;
  for (const [name, path] of ENV_OVERRIDES) {
    const value = env[name];
    if (value) result = setPath(result, path, value);
  }
  return result;
}

async function readConfigFile(path: string): Promise<Result<Record<string, unknown>, ConfigError>> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (e) {
    if (isRecord(e) && e.code === "ENOENT") return ok({});
    return err(new ConfigError(`Cannot read config file ${path}: ${errorMessage(e)}`, e));
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(text);
  } catch (e) {
    return err(new ConfigError(`Invalid JSON5 in ${path}: ${errorMessage(e)}`, e));
  }
  if (!isRecord(parsed)) {
    return err(new ConfigError(`Config file ${path} must contain an object`));
  }
  return ok(parsed);
}

/**
 * Load the effective configuration: defaults, then the JSON5 file, then
 * environment overrides. Never throws.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Result<WayfarerConfig, ConfigError>> {
  let raw: Record<string, unknown> = {};
  if (options.path) {
    const file = await readConfigFile(options.path);
    if (!file.ok) return file;
    raw = file.value;
  }

  const result = WayfarerConfigSchema.safeParse(applyEnvOverrides(raw, options.env ?? {}));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    return err(new ConfigError(`Invalid config: ${issues.join("; ")}`, result.error));
  }
  return ok(result.data);
}
