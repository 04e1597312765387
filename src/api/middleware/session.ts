// ---------------------------------------------------------------------------
// Session middleware: resolves the Authorization token to an account.
// ---------------------------------------------------------------------------

import type { Context, Next } from "hono";
import type { SessionResolver, SessionToken } from "../../core/types.js";
import { AuthenticationError } from "../../core/errors.js";
import type { AppEnv } from "../env.js";

const BASE64_RE = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Decode the raw `Authorization` header value. Clients send the session
 * token as standard base64 with no scheme prefix.
 */
export function decodeSessionToken(header: string | undefined): SessionToken | null {
  const value = header?.trim() ?? "";
  if (value === "" || value.length % 4 !== 0 || !BASE64_RE.test(value)) {
    return null;
  }
  return new Uint8Array(Buffer.from(value, "base64")) as SessionToken;
}

/**
 * Creates a Hono middleware that rejects requests without a live session and
 * stores the owning account on the context as `"accountId"`.
 *
 * Failures are thrown as {@link AuthenticationError} for the error handler.
 */
export function sessionMiddleware(
  resolver: SessionResolver,
): (c: Context<AppEnv>, next: Next) => Promise<void> {
  return async (c: Context<AppEnv>, next: Next): Promise<void> => {
    const token = decodeSessionToken(c.req.header("authorization"));
    if (!token) {
      throw new AuthenticationError("missing or malformed session token");
    }

    const accountId = await resolver.fetchAccountIdFromToken(token);
    if (!accountId) {
      throw new AuthenticationError("unknown or expired session token");
    }

    c.set("accountId", accountId);
    await next();
  };
}
