/**
 * Demo action server process.
 * Loads config, serves the demo actions over node:http and shuts down on
 * SIGINT / SIGTERM.
 */

import "dotenv/config";
import { createServer } from "node:http";
import { loadServerConfig } from "./config.js";
import { createDemoService } from "./demo.js";
import { createNodeJSLogger } from "./logger.js";

const SERVICE_NAME = "actionkit-server";

async function main(): Promise<void> {
  const loggerFactory = createNodeJSLogger(SERVICE_NAME);
  const log = loggerFactory.get(`${SERVICE_NAME}:main`);

  const config = loadServerConfig({ log });
  const svc = createDemoService({ config: config.service, loggerFactory });
  const server = createServer(svc.listener());

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, config.host, () => resolve());
  });
  log.info?.(
    { host: config.host, port: config.port, actions: svc.services(), aliases: Object.fromEntries(svc.mappings()) },
    `${SERVICE_NAME}:main - Started`
  );

  const shutdown = (signal: string): void => {
    log.info?.({ signal }, `${SERVICE_NAME}:main - Shutting down`);
    server.close((err) => {
      if (err) {
        log.error?.({ error: err.message }, `${SERVICE_NAME}:main - Close failed`);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
  console.error(`${SERVICE_NAME}:main - Fatal:`, err);
  process.exit(1);
});
