import dotenv from "dotenv";
dotenv.config();

import { ServiceContainer } from "@di/ServiceContainer";
import { IWebInterfaceService } from "@core/interfaces";
import { isSuccess } from "@core/types";
import { getLogger, setLogLevel } from "@utils/logger";

const logger = getLogger("Main");

/**
 * Main Entry Point
 *
 * 1. Loads the configuration
 * 2. Starts the wakeup and notification state machines
 * 3. Starts the diagnostics API when enabled
 * 4. Sets up graceful shutdown
 */
async function main() {
  logger.info("🚀 Starting network recommendation service...\n");

  const container = ServiceContainer.getInstance();

  const configService = container.getConfigService();
  const configResult = await configService.initialize();
  if (!isSuccess(configResult)) {
    logger.error("Failed to load configuration:", configResult.error.message);
    process.exit(1);
  }
  const config = configService.getConfig();
  setLogLevel(config.logging.level);
  logger.info("✓ Configuration loaded\n");

  container.startStateMachines();
  logger.info("✓ Wakeup and notification state machines running\n");

  let webService: IWebInterfaceService | null = null;
  if (config.web.enabled) {
    webService = container.getWebService();
    const webResult = await webService.start();
    if (!isSuccess(webResult)) {
      logger.error("Failed to start diagnostics API:", webResult.error.message);
      container.dispose();
      process.exit(1);
    }
    logger.info(`✓ Diagnostics API available at ${webService.getServerUrl()}\n`);
  } else {
    logger.info("Diagnostics API disabled");
  }

  setupGracefulShutdown(container, webService);
  logger.info("✅ Ready");
}

/**
 * Setup handlers for graceful shutdown
 */
function setupGracefulShutdown(
  container: ServiceContainer,
  webService: IWebInterfaceService | null,
): void {
  const shutdown = async (signal: string) => {
    logger.info(`\n${signal} received. Shutting down gracefully...`);

    // Force exit after 5 seconds if graceful shutdown hangs
    const forceExitTimeout = setTimeout(() => {
      logger.warn("Shutdown timed out, forcing exit");
      process.exit(1);
    }, 5000);

    if (webService?.isRunning()) {
      logger.info("Stopping diagnostics API...");
      const stopResult = await webService.stop();
      if (!isSuccess(stopResult)) {
        logger.error(stopResult.error.message);
      }
    }

    logger.info("Stopping state machines...");
    container.dispose();

    clearTimeout(forceExitTimeout);
    logger.info("✓ Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  process.on("uncaughtException", (error) => {
    logger.error("Uncaught exception:", error);
    void shutdown("UNCAUGHT_EXCEPTION");
  });

  process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled rejection:", reason);
    void shutdown("UNHANDLED_REJECTION");
  });
}

main().catch((error) => {
  logger.error("Failed to start application:", error);
  process.exit(1);
});
