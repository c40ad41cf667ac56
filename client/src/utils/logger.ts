import winston from "winston";

const { combine, timestamp, errors, splat, json } = winston.format;

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: process.env.LOG_SILENT === "true",
  defaultMeta: {
    service: "upload-tracker-client",
    agentId: process.env.AGENT_ID,
  },
  format: combine(timestamp(), errors({ stack: true }), splat(), json()),
  transports: [new winston.transports.Console()],
});

export default logger;
