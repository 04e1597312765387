// ---------------------------------------------------------------------------
// Request ID middleware for Hono.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import type { Context, Next } from "hono";
import type { AppEnv } from "../env.js";

/** Client-supplied IDs are only trusted in this shape (log injection). */
const SAFE_REQUEST_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/;

/**
 * Returns a Hono middleware that tags every request with an ID, reusing a
 * well-formed incoming `X-Request-ID` or generating a UUID.
 *
 * The ID is stored as `"requestId"` on the context and echoed in the
 * `X-Request-ID` response header.
 */
export function requestIdMiddleware(): (
  c: Context<AppEnv>,
  next: Next,
) => Promise<void> {
  return async (c: Context<AppEnv>, next: Next): Promise<void> => {
    const existing = c.req.header("x-request-id");
    const requestId =
      existing && SAFE_REQUEST_ID_RE.test(existing)
        ? existing
        : randomUUID();

    c.set("requestId", requestId);
    c.header("X-Request-ID", requestId);

    await next();
  };
}
