import { Response } from "express";
import { logger } from "../config/logger";
import { AuthenticationRequiredError, NotFoundError, ValidationError } from "./errors";

/**
 * Answers a request that failed with one of the service errors. Anything
 * unexpected is logged and reported as a 500.
 */
export function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof ValidationError) {
    res.status(400).json({ error: error.message, details: error.details });
    return;
  }

  if (error instanceof NotFoundError) {
    res.status(404).json({ error: error.message });
    return;
  }

  if (error instanceof AuthenticationRequiredError) {
    res.status(401).json({ error: error.message });
    return;
  }

  logger.error({ err: error }, `❌ ${context}`);
  res.status(500).json({ error: "Internal server error" });
}

// Route params are strings; anything that is not a positive integer is never a valid id
export function parseIdParam(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value)) return null;
  const id = Number(value);
  return id > 0 && Number.isSafeInteger(id) ? id : null;
}
