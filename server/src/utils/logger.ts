import winston from "winston";

const { combine, timestamp, errors, splat, json } = winston.format;

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: process.env.LOG_SILENT === "true",
  defaultMeta: { service: "upload-tracker-server" },
  format: combine(timestamp(), errors({ stack: true }), splat(), json()),
  // stdout is reserved for command output
  transports: [
    new winston.transports.Console({
      stderrLevels: Object.keys(winston.config.npm.levels),
    }),
  ],
});

export default logger;
