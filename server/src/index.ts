import dotenv from "dotenv";
import type { Server } from "http";
import { loadConfig } from "./config";
import { createApp } from "./app";
import { createServices, type Services } from "./container";
import logger from "./utils/logger";

// Load environment variables
dotenv.config();

let services: Services | undefined;
let server: Server | undefined;
let expiryTimer: NodeJS.Timeout | undefined;

async function startServer(): Promise<void> {
  try {
    const config = loadConfig();

    // Initialize services
    logger.info("Initializing services...");
    services = await createServices(config, { connectBroker: true });
    const { storage, broker, manifests, jobs } = services;

    await storage.ensureBucket(config.storage.region);

    // Completion signals from the transfer agent
    await broker.subscribeToEvents((event) => jobs.applyEvent(event));

    if (config.jobStaleAfterSec > 0) {
      const staleAfterMs = config.jobStaleAfterSec * 1000;
      const every = Math.min(60_000, Math.max(1000, staleAfterMs / 4));
      expiryTimer = setInterval(() => {
        jobs.expireStale(staleAfterMs).catch((error: unknown) => {
          logger.error("Error expiring stale jobs:", error);
        });
      }, every);
      logger.info(`Expiring RUNNING jobs after ${config.jobStaleAfterSec}s`);
    }

    // Start HTTP server
    const app = createApp({ manifests, jobs, apiKey: config.apiKey });
    server = app.listen(config.port, "0.0.0.0", () => {
      logger.info(`Server listening on port ${config.port}`);
      logger.info("Server ready to accept requests");
    });
  } catch (error) {
    logger.error("Failed to start server:", error);
    await services?.close();
    process.exit(1);
  }
}

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down gracefully...`);
  clearInterval(expiryTimer);
  await new Promise<void>((resolve) => {
    if (!server) return resolve();
    server.close(() => resolve());
  });
  await services?.close();
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .catch((error: unknown) => logger.error("Error during shutdown:", error))
      .finally(() => process.exit(0));
  });
}

void startServer();
