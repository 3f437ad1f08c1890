#!/usr/bin/env node
import { loadConfig, validateConfig } from "./infrastructure/config/Config.js";
import { PinoLogger } from "./infrastructure/logging/PinoLogger.js";
import { AxiosTransport } from "./infrastructure/http/AxiosTransport.js";
import { FixtureTransport } from "./infrastructure/http/FixtureTransport.js";
import { AsyncClimate } from "./application/climate/AsyncClimate.js";
import { SyncClimate } from "./application/climate/SyncClimate.js";
import { ClimatePoller, type RefreshableClimate } from "./application/ClimatePoller.js";

/**
 * Main entry point for the climate agent
 */
async function main(): Promise<void> {
  const config = loadConfig();
  validateConfig(config);

  const logger = new PinoLogger({
    name: config.agent.name,
    level: config.logging.level,
    pretty: config.logging.pretty,
  });

  try {
    let climate: RefreshableClimate;
    if (config.agent.fixturesDir) {
      logger.info("Climate agent starting with recorded fixtures", {
        fixturesDir: config.agent.fixturesDir,
      });
      climate = new SyncClimate(
        new FixtureTransport(
          config.agent.fixturesDir,
          logger.child({ component: "FixtureTransport" })
        ),
        logger.child({ component: "SyncClimate" })
      );
    } else {
      logger.info("Climate agent starting", { apiUrl: config.api.baseUrl });
      climate = new AsyncClimate(
        new AxiosTransport(
          {
            baseUrl: config.api.baseUrl,
            accessToken: config.api.accessToken,
            timeout: config.api.timeout,
          },
          logger.child({ component: "AxiosTransport" })
        ),
        logger.child({ component: "AsyncClimate" })
      );
    }

    const poller = new ClimatePoller(
      climate,
      { interval: config.agent.refreshInterval },
      logger
    );

    const shutdown = (): void => {
      logger.info("Shutting down...");
      poller.stop();
      process.exit(0);
    };

    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);

    poller.start();
    logger.info("Climate agent running. Press Ctrl+C to stop.");
  } catch (error) {
    logger.fatal("Failed to start agent", error);
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error("Unhandled error:", error);
  process.exit(1);
});
