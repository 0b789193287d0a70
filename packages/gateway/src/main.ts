// @wayfarer/gateway entry point: load config, start the gateway, stop on signal

import { ConsoleLogger, errorMessage } from "@wayfarer/core";
import { loadConfig } from "@wayfarer/config";
import { createGateway } from "./gateway";

const configResult = await loadConfig({
  path: process.env.WAYFARER_CONFIG ?? "wayfarer.json5",
  env: process.env,
});

if (!configResult.ok) {
  console.error("Configuration error:", configResult.error.message);
  process.exit(1);
}

const config = configResult.value;
const logger = new ConsoleLogger(config.logLevel);

const gateway = await createGateway({ config, logger });
await gateway.start();

// Guard against a second signal while stopping
let shuttingDown = false;
const shutdown = async () => {
  if (shuttingDown) return;
  shuttingDown = true;
  await gateway.stop();
  process.exit(0);
};

const onSignal = () => {
  shutdown().catch((e: unknown) => {
    logger.error("Shutdown failed", { error: errorMessage(e) });
    process.exit(1);
  });
};

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);
