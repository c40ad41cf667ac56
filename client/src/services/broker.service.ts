import Joi from "joi";
import { createClient } from "redis";
import logger from "../utils/logger";
import type {
  CancelCommand,
  EventPublisher,
  TransferCommand,
  TransferEvent,
  UploadCommand,
} from "../models/transfer.model";

type RedisClient = ReturnType<typeof createClient>;

const commandSchema = Joi.alternatives<TransferCommand>().try(
  Joi.object<UploadCommand>({
    cmd: Joi.string().valid("upload").required(),
    jobId: Joi.string().required(),
    loadId: Joi.string().required(),
    entries: Joi.array()
      .items(
        Joi.object({
          path: Joi.string().required(),
          objectKey: Joi.string().required(),
          size: Joi.number().integer().min(0).required(),
          presignedUrl: Joi.string().uri().required(),
        }),
      )
      .required(),
    expiresAt: Joi.string().isoDate().required(),
    mock: Joi.boolean().optional(),
  }),
  Joi.object<CancelCommand>({
    cmd: Joi.string().valid("cancel").required(),
    jobId: Joi.string().required(),
    loadId: Joi.string().required(),
  }),
);

export const EVENTS_CHANNEL = "events:server";

/** PUBLISH answers with the number of receivers; zero means the message was dropped. */
export function requireReceivers(receivers: number, channel: string): void {
  if (receivers === 0) {
    throw new Error(`nobody is subscribed to ${channel}`);
  }
}

export function parseCommand(message: string): TransferCommand {
  const { error, value } = commandSchema.validate(JSON.parse(message), {
    stripUnknown: true,
  });
  if (error) {
    throw new Error(`Malformed command: ${error.message}`);
  }
  return value;
}

class BrokerService implements EventPublisher {
  private subscriber: RedisClient;
  private publisher: RedisClient;
  private isConnected: boolean = false;

  constructor(redisUrl: string) {
    this.subscriber = createClient({ url: redisUrl });
    this.publisher = createClient({ url: redisUrl });

    this.subscriber.on("error", (err) =>
      logger.error("Redis Subscriber Error:", err),
    );
    this.publisher.on("error", (err) =>
      logger.error("Redis Publisher Error:", err),
    );
  }

  async connect(): Promise<void> {
    try {
      await this.subscriber.connect();
      await this.publisher.connect();
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
      await this.subscriber.quit();
      await this.publisher.quit();
      this.isConnected = false;
      logger.info("BrokerService disconnected from Redis");
    } catch (error) {
      logger.error("Error disconnecting from Redis:", error);
    }
  }

  async subscribeToCommands(
    agentId: string,
    callback: (command: TransferCommand) => void,
  ): Promise<void> {
    if (!this.isConnected) {
      throw new Error("BrokerService not connected");
    }

    try {
      const channel = `commands:${agentId}`;

      await this.subscriber.subscribe(channel, (message) => {
        let command: TransferCommand;
        try {
          command = parseCommand(message);
        } catch (error) {
          logger.error("Error parsing command message:", error);
          return;
        }
        logger.debug(`Received command from ${channel}`, {
          cmd: command.cmd,
          jobId: command.jobId,
        });
        callback(command);
      });

      logger.info(`Subscribed to ${channel}`);
    } catch (error) {
      logger.error("Error subscribing to commands:", error);
      throw error;
    }
  }

  async publishEvent(event: TransferEvent): Promise<void> {
    if (!this.isConnected) {
      throw new Error("BrokerService not connected");
    }

    try {
      const message = JSON.stringify(event);
      const receivers = await this.publisher.publish(EVENTS_CHANNEL, message);
      requireReceivers(receivers, EVENTS_CHANNEL);
      logger.debug(`Published event to ${EVENTS_CHANNEL}`, {
        event: event.event,
        jobId: event.jobId,
        receivers,
      });
    } catch (error) {
      logger.error(`Error publishing ${event.event} event:`, error);
      throw error;
    }
  }
}

export default BrokerService;
