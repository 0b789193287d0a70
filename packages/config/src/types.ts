import type { z } from "zod";
import type { WayfarerConfigSchema } from "./schema";

export type WayfarerConfig = z.infer<typeof WayfarerConfigSchema>;
