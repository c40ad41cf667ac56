import Joi from "joi";
import { createClient } from "redis";
import logger from "../utils/logger";
import { ValidationError } from "../utils/errors";
import type {
  CancelCommand,
  TransferCommand,
  TransferDispatcher,
  TransferEvent,
  UploadCommand,
  UploadCompleteEvent,
  UploadEntryEvent,
  UploadFailedEvent,
} from "../models/transfer.model";
import { ENTRY_STATUSES } from "../models/job.model";

type RedisClient = ReturnType<typeof createClient>;

export const EVENTS_CHANNEL = "events:server";

export function commandsChannel(agentId: string): string {
  return `commands:${agentId}`;
}

const eventBase = {
  jobId: Joi.string().required(),
  loadId: Joi.string().required(),
  timestamp: Joi.string().isoDate().required(),
};

const counters = {
  uploadedFiles: Joi.number().integer().min(0).required(),
  uploadedBytes: Joi.number().integer().min(0).required(),
};

const eventSchema = Joi.alternatives<TransferEvent>().try(
  Joi.object<UploadCompleteEvent>({
    event: Joi.string().valid("upload_complete").required(),
    ...eventBase,
    ...counters,
  }),
  Joi.object<UploadFailedEvent>({
    event: Joi.string().valid("upload_failed").required(),
    ...eventBase,
    ...counters,
    reason: Joi.string().required(),
    failedFiles: Joi.array().items(Joi.string()).default([]),
  }),
  Joi.object<UploadEntryEvent>({
    event: Joi.string().valid("upload_entry").required(),
    ...eventBase,
    path: Joi.string().required(),
    status: Joi.string()
      .valid(...ENTRY_STATUSES)
      .required(),
    size: Joi.number().integer().min(0).required(),
    error: Joi.string().optional(),
  }),
);

/**
 * Redis drops a message nobody is subscribed to, and PUBLISH answers with
 * the number of receivers. Zero means the message is lost.
 */
export function requireReceivers(receivers: number, channel: string): void {
  if (receivers === 0) {
    throw new Error(`nobody is subscribed to ${channel}`);
  }
}

export function parseTransferEvent(message: string): TransferEvent {
  let raw: unknown;
  try {
    raw = JSON.parse(message);
  } catch {
    throw new ValidationError("event is not valid JSON", { operation: "receive-event" });
  }
  const { error, value } = eventSchema.validate(raw, { stripUnknown: true });
  if (error) {
    throw new ValidationError(`malformed event (${error.message})`, { operation: "receive-event" });
  }
  return value;
}

class BrokerService implements TransferDispatcher {
  private publisher: RedisClient;
  private subscriber: RedisClient;
  private isConnected: boolean = false;

  constructor(
    redisUrl: string,
    private readonly agentId: string,
  ) {
    this.publisher = createClient({ url: redisUrl });
    this.subscriber = createClient({ url: redisUrl });

    this.publisher.on("error", (err) =>
      logger.error("Redis Publisher Error:", err),
    );
    this.subscriber.on("error", (err) =>
      logger.error("Redis Subscriber Error:", err),
    );
  }

  async connect(): Promise<void> {
    try {
      await this.publisher.connect();
      await this.subscriber.connect();
      this.isConnected = true;
      logger.info("BrokerService connected to Redis");
    } catch (error) {
      logger.error("Error connecting to Redis:", error);
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.isConnected) return;
    try {
      await this.publisher.quit();
      await this.subscriber.quit();
      this.isConnected = false;
      logger.info("BrokerService disconnected from Redis");
    } catch (error) {
      logger.error("Error disconnecting from Redis:", error);
    }
  }

  async dispatch(command: UploadCommand): Promise<void> {
    await this.publishCommand(command);
  }

  async interrupt(command: CancelCommand): Promise<void> {
    await this.publishCommand(command);
  }

  async subscribeToEvents(
    callback: (event: TransferEvent) => Promise<unknown>,
  ): Promise<void> {
    if (!this.isConnected) {
      throw new Error("BrokerService not connected");
    }

    try {
      await this.subscriber.subscribe(EVENTS_CHANNEL, (message) => {
        let event: TransferEvent;
        try {
          event = parseTransferEvent(message);
        } catch (error) {
          logger.error("Error parsing event message:", error);
          return;
        }

        logger.debug(`Received event from ${EVENTS_CHANNEL}`, {
          event: event.event,
          jobId: event.jobId,
        });
        callback(event).catch((error: unknown) => {
          logger.error(`Error applying ${event.event} for ${event.loadId}:`, error);
        });
      });

      logger.info(`Subscribed to ${EVENTS_CHANNEL}`);
    } catch (error) {
      logger.error("Error subscribing to events:", error);
      throw error;
    }
  }

  private async publishCommand(command: TransferCommand): Promise<void> {
    if (!this.isConnected) {
      throw new Error("BrokerService not connected");
    }

    const channel = commandsChannel(this.agentId);
    try {
      const receivers = await this.publisher.publish(channel, JSON.stringify(command));
      requireReceivers(receivers, channel);
      logger.info(`Published ${command.cmd} command to ${channel}`, {
        jobId: command.jobId,
        loadId: command.loadId,
        receivers,
      });
    } catch (error) {
      logger.error(`Error publishing command to ${channel}:`, error);
      throw error;
    }
  }
}

export default BrokerService;
