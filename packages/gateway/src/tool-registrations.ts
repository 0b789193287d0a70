// Tool registrations: builds the ToolRegistry from config

import type { Logger, MessageBus } from "@wayfarer/core";
import { ToolRegistry } from "@wayfarer/core";
import type { WayfarerConfig } from "@wayfarer/config";
import { WebFetchTool, type HostResolver } from "@wayfarer/tool-web-fetch";
import { WebSearchTool } from "@wayfarer/tool-web-search";
import { MessageTool } from "./tools/message-tool";

export interface ToolRegistrationDeps {
  readonly config: WayfarerConfig;
  readonly bus: MessageBus;
  readonly logger: Logger;
  /** Hostname resolver for the fetch guard; DNS when omitted. */
  readonly resolve?: HostResolver;
}

/**
 * Build a ToolRegistry with the message tool and every web tool enabled in
 * config. Registration order is the order definitions reach the provider.
 */
export function buildToolRegistry(deps: ToolRegistrationDeps): ToolRegistry {
  const { config, bus, logger } = deps;
  const registry = new ToolRegistry();
  const log = logger.child({ component: "ToolRegistrations" });

  registry.register(new MessageTool(bus));

  // ── web_search ─────────────────────────────────────────────────────
  const search = config.tools.webSearch;
  if (search.enabled) {
    if (!search.braveApiKey) {
      log.warn("web_search registered without a Brave API key; calls will report an error");
    }
    registry.register(
      new WebSearchTool({
        apiKey: search.braveApiKey,
        maxResults: search.maxResults,
        logger,
      }),
    );
  } else {
    log.debug("web_search not registered (disabled in config)");
  }

  // ── web_fetch ──────────────────────────────────────────────────────
  const fetchCfg = config.tools.webFetch;
  if (fetchCfg.enabled) {
    registry.register(
      new WebFetchTool({
        maxChars: fetchCfg.maxChars,
        maxRedirects: fetchCfg.maxRedirects,
        timeoutMs: fetchCfg.timeoutMs,
        resolve: deps.resolve,
        logger,
      }),
    );
  } else {
    log.debug("web_fetch not registered (disabled in config)");
  }

  log.info("Tools registered", { tools: registry.names });
  return registry;
}
