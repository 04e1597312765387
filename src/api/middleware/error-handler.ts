// ---------------------------------------------------------------------------
// Hono error handler: maps domain errors to HTTP responses.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import {
  AuthenticationError,
  SaveDataNotFoundError,
  SaveDataValidationError,
} from "../../core/errors.js";
import type { AppEnv } from "../env.js";

/**
 * Hono `onError` handler that inspects the thrown error and returns an
 * appropriate HTTP status code with a JSON body.
 *
 * Validation and auth messages only describe the caller's own input, so
 * they are returned as-is. Anything else is logged and, in production,
 * replaced with a generic message.
 *
 * Mapping:
 * - `SaveDataValidationError` -> 400 Bad Request
 * - `AuthenticationError`     -> 401 Unauthorized
 * - `SaveDataNotFoundError`   -> 404 Not Found
 * - Everything else           -> 500 Internal Server Error
 */
export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  if (err instanceof SaveDataValidationError) {
    return c.json({ error: err.message, type: "validation_error" }, 400);
  }

  if (err instanceof AuthenticationError) {
    return c.json({ error: err.message, type: "authentication_error" }, 401);
  }

  if (err instanceof SaveDataNotFoundError) {
    return c.json({ error: err.message, type: "not_found" }, 404);
  }

  c.get("logger")?.error({ err }, "request failed");

  const isProduction = process.env["NODE_ENV"] === "production";
  const message = isProduction ? "Internal server error" : err.message;

  return c.json({ error: message, type: "internal_error" }, 500);
}
