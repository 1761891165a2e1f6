/**
 * Party Registry API — Request Helpers
 *
 * Extracts the calling identity and validates params and bodies.  All
 * failures are thrown as ApiErrors and rendered by the error handler.
 *
 * Authentication is outside this service: whatever sits in front of it
 * asserts the caller through the `X-Identity` header.
 *
 * @module api/middleware/request
 * @license AGPL-3.0-or-later
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import { z } from "zod";
import { ApiError } from "./error-handler";
import type { Identity } from "../../types";

export const IDENTITY_HEADER = "x-identity";

export function requireCaller(req: Request): Identity {
  const caller = req.get(IDENTITY_HEADER)?.trim();
  if (!caller) {
    throw new ApiError(401, "MISSING_IDENTITY", "The X-Identity header is required.");
  }
  return caller;
}

/**
 * Parses a route parameter as a non-negative integer.  Whether the ID
 * exists is left to the registry.
 */
export function parseIntParam(value: string, name: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ApiError(400, "VALIDATION_ERROR", `${name} must be a non-negative integer.`);
  }
  return Number(value);
}

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.join(".");
    throw new ApiError(
      400,
      "VALIDATION_ERROR",
      path ? `${path}: ${issue.message}` : issue.message
    );
  }
  return parsed.data;
}

/**
 * Forwards rejections of an async handler to the error middleware.
 */
export function asyncRoute(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
