import type { WayfarerConfig } from "./types";

export const REDACTED = "[redacted]";

function mask(value: string | null): string | null {
  return value === null ? null : REDACTED;
}

/** Copy of `config` that is safe to log: every secret that is set is masked. */
export function redactConfig(config: WayfarerConfig): WayfarerConfig {
  return {
    ...config,
    provider: { ...config.provider, apiKey: mask(config.provider.apiKey) },
    tools: {
      ...config.tools,
      webSearch: { ...config.tools.webSearch, braveApiKey: mask(config.tools.webSearch.braveApiKey) },
    },
  };
}
