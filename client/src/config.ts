import Joi from "joi";

export interface AgentConfig {
  redisUrl: string;
  agentId: string;
  stagingRoot: string;
  concurrency: number;
  maxRetries: number;
}

interface RawEnv {
  REDIS_URL: string;
  AGENT_ID: string;
  STAGING_ROOT: string;
  UPLOAD_CONCURRENCY: number;
  UPLOAD_MAX_RETRIES: number;
}

const envSchema = Joi.object<RawEnv>({
  REDIS_URL: Joi.string()
    .uri({ scheme: ["redis", "rediss"] })
    .default("redis://localhost:6379"),
  AGENT_ID: Joi.string()
    .pattern(/^[a-zA-Z0-9_-]+$/)
    .required(),
  STAGING_ROOT: Joi.string().required(),
  UPLOAD_CONCURRENCY: Joi.number().integer().min(1).max(256).default(4),
  UPLOAD_MAX_RETRIES: Joi.number().integer().min(1).max(20).default(5),
}).unknown(true);

export function loadAgentConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const { error, value } = envSchema.validate(env, { abortEarly: false });
  if (error || !value) {
    throw new Error(`Invalid agent configuration: ${error ? error.message : "empty environment"}`);
  }

  return {
    redisUrl: value.REDIS_URL,
    agentId: value.AGENT_ID,
    stagingRoot: value.STAGING_ROOT,
    concurrency: value.UPLOAD_CONCURRENCY,
    maxRetries: value.UPLOAD_MAX_RETRIES,
  };
}
