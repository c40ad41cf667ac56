import { DBService } from "./services/db.service";
import StorageService from "./services/storage.service";
import BrokerService from "./services/broker.service";
import { ManifestService } from "./services/manifest.service";
import { JobService } from "./services/job.service";
import logger from "./utils/logger";
import type { TrackerConfig } from "./config";

export interface Services {
  db: DBService;
  storage: StorageService;
  broker: BrokerService;
  manifests: ManifestService;
  jobs: JobService;
  close(): Promise<void>;
}

/**
 * Wires the services for one process. The broker connection is opened
 * only on request: most commands never talk to the transfer agent.
 */
export async function createServices(
  config: TrackerConfig,
  { connectBroker = false }: { connectBroker?: boolean } = {},
): Promise<Services> {
  const db = new DBService(config.dbPath);
  await db.init();

  const storage = new StorageService(config.storage);
  const broker = new BrokerService(config.redisUrl, config.agentId);
  if (connectBroker) {
    try {
      await broker.connect();
    } catch (error) {
      await db.close();
      throw error;
    }
  }

  const manifests = new ManifestService(db, { overwrite: config.manifestOverwrite });
  const jobs = new JobService(db, manifests, broker, storage, {
    retry: config.jobRetryPolicy,
    cancelRunning: config.cancelRunningJobs,
    presignedExpiresSec: config.presignedExpiresSec,
    prefix: config.storage.prefix,
  });

  return {
    db,
    storage,
    broker,
    manifests,
    jobs,
    async close() {
      await broker.disconnect();
      await db.close();
      logger.debug("Services closed");
    },
  };
}
