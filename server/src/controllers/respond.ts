import type { Response } from "express";
import logger from "../utils/logger";
import { HTTP_STATUS, TrackerError } from "../utils/errors";

export function sendError(res: Response, error: unknown, where: string): void {
  if (error instanceof TrackerError) {
    const status = HTTP_STATUS[error.kind];
    if (status >= 500) {
      logger.error(`Error in ${where} controller: ${error.message}`);
    } else {
      logger.warn(`Rejected ${where}: ${error.message}`);
    }
    res.status(status).json(error.toJSON());
    return;
  }

  logger.error(`Error in ${where} controller:`, error);
  res.status(500).json({ error: "Internal server error" });
}

export function sendInvalid(res: Response, what: string, details: string): void {
  res.status(400).json({ error: `Invalid ${what}`, kind: "validation", details });
}
