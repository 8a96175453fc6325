#!/usr/bin/env npx tsx
/**
 * Body composition web server
 *
 * Usage:
 *   npx tsx packages/server/src/server.ts [options]
 *
 * Options:
 *   --log-level      Set log level (debug|info|warn|error), overrides LOG_LEVEL
 *   --help, -h       Show this help message
 */

import { serve } from "@hono/node-server";
import { config as loadEnv } from "dotenv";
import { loadConfig, type AppConfig } from "./lib/config.js";
import { ConfigurationError, describeError } from "./lib/errors.js";
import {
  LOG_LEVELS,
  isLogLevel,
  maskIdentifier,
  setLogLevel,
  setupLogger,
  type LogLevel,
} from "./lib/logger.js";
import { GarminConnectClient } from "./services/garmin-connect/api-client.js";
import { parseGarminTokens } from "./services/garmin-connect/types.js";
import { SessionManager } from "./session/session-manager.js";
import { FileTokenStore } from "./session/token-store.js";
import { createApp } from "./web/app.js";

const logger = setupLogger("server");

function printUsage(): void {
  console.log("Usage: npx tsx packages/server/src/server.ts [options]");
  console.log("");
  console.log("Options:");
  console.log(`  --log-level    Set log level (${LOG_LEVELS.join("|")})`);
  console.log("  --help, -h     Show this help message");
}

async function main(): Promise<void> {
  loadEnv();

  // Parse args
  const args = process.argv.slice(2);
  let logLevelOverride: LogLevel | null = null;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      printUsage();
      process.exit(0);
    }

    if (arg === "--log-level" && args[i + 1]) {
      const level = args[i + 1];
      if (!isLogLevel(level)) {
        console.error(`Invalid --log-level value. Must be one of: ${LOG_LEVELS.join(", ")}`);
        process.exit(1);
      }
      logLevelOverride = level;
      i++;
      continue;
    }
  }

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`[ERROR] ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  setLogLevel(logLevelOverride ?? config.logLevel);

  const api = new GarminConnectClient({ domain: config.domain });
  const store = new FileTokenStore(config.tokenPath, parseGarminTokens);
  const sessions = new SessionManager({
    api,
    store,
    credentials: { email: config.email, password: config.password },
  });

  logger.info(`Garmin account: ${maskIdentifier(config.email)} (${config.domain})`);
  logger.info(`Token file: ${config.tokenPath}`);

  try {
    const session = await sessions.getSession();
    logger.info(`Garmin Connect session ready (${session.source})`);
  } catch (error) {
    logger.warn(`Could not establish a session at startup: ${describeError(error)}`);
    logger.warn("Will retry on the first submission");
  }

  const app = createApp({ api, sessions, secretKey: config.secretKey });

  const server = serve(
    { fetch: app.fetch, port: config.port, hostname: config.host },
    (info) => logger.info(`Listening on http://${config.host}:${info.port}`)
  );

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close((error) => {
      if (error) {
        logger.error(`Error while closing the server: ${describeError(error)}`);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  logger.error(`Server failed: ${describeError(error)}`);
  process.exit(1);
});
