/**
 * Party Registry API — Error Handling Middleware
 *
 * Centralized error handling for the Express API.  RegistryErrors keep
 * their precise code; the HTTP status follows the error category.
 *
 * @module api/middleware/error-handler
 * @license AGPL-3.0-or-later
 */

import { Request, Response, NextFunction } from "express";
import { RegistryError, type ErrorCategory } from "../../core/errors";
import { createLogger } from "../../utils/logger";

const logger = createLogger("api");

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  "not-found": 404,
  authorization: 403,
  "state-conflict": 409,
  validation: 400,
  "replay-protection": 422,
};

/**
 * Custom API error class.
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    public errorCode: string,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ApiError";
  }
}

/**
 * 404 handler — catches unmatched routes.
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: "NOT_FOUND",
    message: `Route ${req.method} ${req.originalUrl} not found.`,
  });
}

/**
 * Global error handler — catches thrown errors.
 */
export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof RegistryError) {
    res.status(STATUS_BY_CATEGORY[err.category]).json({
      error: err.code,
      message: err.message,
      details: {
        category: err.category,
        ...(err.partyId !== undefined ? { party_id: err.partyId } : {}),
      },
    });
    return;
  }

  if (err instanceof ApiError) {
    res.status(err.statusCode).json({
      error: err.errorCode,
      message: err.message,
      ...(err.details ? { details: err.details } : {}),
    });
    return;
  }

  // Malformed JSON bodies surface as body-parser SyntaxErrors
  if (err instanceof SyntaxError) {
    res.status(400).json({
      error: "INVALID_JSON",
      message: "Request body is not valid JSON.",
    });
    return;
  }

  logger.error("Unexpected error", { error: err.message, stack: err.stack });

  res.status(500).json({
    error: "INTERNAL_ERROR",
    message: "An unexpected error occurred.",
  });
}
