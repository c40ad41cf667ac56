import dotenv from "dotenv";
import BrokerService from "./services/broker.service";
import UploaderService from "./services/uploader.service";
import { loadAgentConfig } from "./config";
import logger from "./utils/logger";

// Load environment variables
dotenv.config();

let broker: BrokerService | undefined;

async function startClient(): Promise<void> {
  try {
    const config = loadAgentConfig();
    logger.info(`Starting transfer agent: ${config.agentId}`);
    logger.info(`Staging root: ${config.stagingRoot}`);

    // Connect to broker
    broker = new BrokerService(config.redisUrl);
    await broker.connect();

    const uploader = new UploaderService(broker, {
      stagingRoot: config.stagingRoot,
      concurrency: config.concurrency,
      maxRetries: config.maxRetries,
    });

    // Subscribe to commands
    await broker.subscribeToCommands(config.agentId, (command) => {
      logger.info(`Received command: ${command.cmd}`, {
        jobId: command.jobId,
        loadId: command.loadId,
      });
      uploader.handleCommand(command).catch((error: unknown) => {
        logger.error(`Error handling ${command.cmd} for job ${command.jobId}:`, error);
      });
    });

    logger.info(`Agent ${config.agentId} is ready and listening for commands`);
  } catch (error) {
    logger.error("Failed to start client:", error);
    await broker?.disconnect();
    process.exit(1);
  }
}

// Graceful shutdown
for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    logger.info(`${signal} received, shutting down gracefully...`);
    (broker ? broker.disconnect() : Promise.resolve())
      .catch((error: unknown) => logger.error("Error during shutdown:", error))
      .finally(() => process.exit(0));
  });
}

void startClient();
