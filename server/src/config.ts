import Joi from "joi";
import path from "path";
import type { OverwritePolicy } from "./models/manifest.model";
import type { RetryPolicy } from "./models/job.model";
import type { SymlinkPolicy } from "./models/listing.model";
import { ValidationError } from "./utils/errors";

export interface TrackerConfig {
  port: number;
  apiKey?: string;
  dbPath: string;
  redisUrl: string;
  agentId: string;
  storage: {
    endpoint: string;
    useSSL: boolean;
    accessKey: string;
    secretKey: string;
    region: string;
    bucket: string;
    prefix: string;
  };
  presignedExpiresSec: number;
  manifestOverwrite: OverwritePolicy;
  jobRetryPolicy: RetryPolicy;
  cancelRunningJobs: boolean;
  jobStaleAfterSec: number;
  listingTimeoutSec: number;
  localSymlinks: SymlinkPolicy;
}

interface RawEnv {
  SERVER_PORT: number;
  SERVER_API_KEY?: string;
  DB_PATH: string;
  REDIS_URL: string;
  TRANSFER_AGENT_ID: string;
  MINIO_ENDPOINT: string;
  MINIO_USE_SSL: boolean;
  MINIO_ACCESS_KEY: string;
  MINIO_SECRET_KEY: string;
  S3_REGION: string;
  S3_BUCKET: string;
  S3_PREFIX: string;
  PRESIGNED_EXPIRES_SEC: number;
  MANIFEST_OVERWRITE: OverwritePolicy;
  JOB_RETRY_POLICY: RetryPolicy;
  CANCEL_RUNNING_JOBS: boolean;
  JOB_STALE_AFTER_SEC: number;
  LISTING_TIMEOUT_SEC: number;
  LOCAL_SYMLINKS: SymlinkPolicy;
}

const envSchema = Joi.object<RawEnv>({
  SERVER_PORT: Joi.number().port().default(8080),
  SERVER_API_KEY: Joi.string().optional(),
  DB_PATH: Joi.string().default(path.join(process.cwd(), "upload-tracker.db")),
  REDIS_URL: Joi.string()
    .uri({ scheme: ["redis", "rediss"] })
    .default("redis://localhost:6379"),
  TRANSFER_AGENT_ID: Joi.string()
    .pattern(/^[a-zA-Z0-9_-]+$/)
    .default("uploader"),
  MINIO_ENDPOINT: Joi.string().default("localhost:9000"),
  MINIO_USE_SSL: Joi.boolean().default(false),
  MINIO_ACCESS_KEY: Joi.string().default("minioadmin"),
  MINIO_SECRET_KEY: Joi.string().default("minioadmin"),
  S3_REGION: Joi.string().default("us-east-1"),
  S3_BUCKET: Joi.string().default("ingest-uploads"),
  S3_PREFIX: Joi.string().allow("").default(""),
  // S3 caps presigned URLs at seven days
  PRESIGNED_EXPIRES_SEC: Joi.number().integer().min(60).max(604800).default(86400),
  MANIFEST_OVERWRITE: Joi.string().valid("reject", "replace").default("reject"),
  JOB_RETRY_POLICY: Joi.string().valid("reject", "allow").default("reject"),
  CANCEL_RUNNING_JOBS: Joi.boolean().default(true),
  JOB_STALE_AFTER_SEC: Joi.number().integer().min(0).default(0),
  LISTING_TIMEOUT_SEC: Joi.number().integer().min(0).default(0),
  LOCAL_SYMLINKS: Joi.string().valid("follow", "skip").default("follow"),
}).unknown(true);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TrackerConfig {
  const { error, value } = envSchema.validate(env, { abortEarly: false });
  if (error || !value) {
    throw new ValidationError(error ? error.message : "empty environment", {
      operation: "load-config",
    });
  }

  return {
    port: value.SERVER_PORT,
    apiKey: value.SERVER_API_KEY,
    dbPath: value.DB_PATH,
    redisUrl: value.REDIS_URL,
    agentId: value.TRANSFER_AGENT_ID,
    storage: {
      endpoint: value.MINIO_ENDPOINT,
      useSSL: value.MINIO_USE_SSL,
      accessKey: value.MINIO_ACCESS_KEY,
      secretKey: value.MINIO_SECRET_KEY,
      region: value.S3_REGION,
      bucket: value.S3_BUCKET,
      prefix: value.S3_PREFIX,
    },
    presignedExpiresSec: value.PRESIGNED_EXPIRES_SEC,
    manifestOverwrite: value.MANIFEST_OVERWRITE,
    jobRetryPolicy: value.JOB_RETRY_POLICY,
    cancelRunningJobs: value.CANCEL_RUNNING_JOBS,
    jobStaleAfterSec: value.JOB_STALE_AFTER_SEC,
    listingTimeoutSec: value.LISTING_TIMEOUT_SEC,
    localSymlinks: value.LOCAL_SYMLINKS,
  };
}
