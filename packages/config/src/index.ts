export { WayfarerConfigSchema, HttpUrlSchema, LogLevelEnum } from "./schema";
export type { WayfarerConfig } from "./types";
export { defaultConfig } from "./defaults";
export { redactConfig, REDACTED } from "./redact";
export { loadConfig, applyEnvOverrides, ENV_OVERRIDES, type Env, type LoadConfigOptions } from "./load";
