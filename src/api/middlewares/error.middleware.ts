/**
 * Error Middleware
 *
 * Global error handler for the Express API.
 * Check errors keep their classification; anything else is a 500.
 */
import type { Request, Response, NextFunction } from "express";
import {
  CheckError,
  FetchFailedError,
  InvalidScopeError,
} from "../../shared/errors/check.errors";
import { logger } from "../../monitoring/logger";

/** HTTP status for an error raised while serving a request */
export function statusForError(error: Error): number {
  if (error instanceof InvalidScopeError) return 400;
  if (error instanceof FetchFailedError) return 502;
  return 500;
}

/**
 * Global error handler.
 * Logs the error and returns a structured JSON response.
 */
export function errorMiddleware(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status = statusForError(err);

  if (status >= 500) {
    logger.error(
      {
        error: err.message,
        stack: err.stack,
        method: req.method,
        path: req.path,
      },
      "Unhandled API error"
    );
  }

  if (err instanceof CheckError) {
    res.status(status).json({ error: err.message, code: err.code });
    return;
  }

  res.status(500).json({
    error: "Internal Server Error",
    message: process.env.NODE_ENV === "development" ? err.message : undefined,
  });
}
