import { WayfarerConfigSchema } from "./schema";
import type { WayfarerConfig } from "./types";

export function defaultConfig(): WayfarerConfig {
  return WayfarerConfigSchema.parse({});
}
