#!/usr/bin/env node
// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

/**
 * Debug static server entry point. Configured through DEBUG_SERVER_* variables;
 * serves the working directory on port 80 unless told otherwise.
 *
 * Run: DEBUG_SERVER_PORT=9999 node dist/main.js
 */
import { optionsFromEnv, resolveConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { createLogger } from "./logging.js";
import { DebugStaticServer } from "./server.js";
import type { ServerConfig } from "./types.js";

async function main(): Promise<void> {
  const { options, warnings } = optionsFromEnv();

  let config: ServerConfig;
  try {
    config = resolveConfig(options);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      process.stderr.write(`Debug server configuration error: ${err.message}.\n`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const logger = createLogger({ level: config.logLevel });
  for (const warning of warnings) logger.warn(warning);

  const server = new DebugStaticServer(config, { logger });
  const address = await server.listen();
  console.log(`serving ${config.root} on http://${address.address}:${address.port}`);

  const stop = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error(`Shutdown failed: ${String(err)}`);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));
}

main().catch((err: unknown) => {
  process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
  process.exit(1);
});
