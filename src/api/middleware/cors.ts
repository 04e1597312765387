// ---------------------------------------------------------------------------
// CORS policy middleware for Hono.
// ---------------------------------------------------------------------------

import type { Context, Next } from "hono";
import type { CorsConfig } from "../../core/types.js";

/** Response headers advertised by one policy. */
export interface CorsPolicy {
  allowOrigin: string;
  allowHeaders: string;
  allowMethods: string;
}

/** Only the configured game client may call the API. */
export function productionCorsPolicy(allowedOrigin: string): CorsPolicy {
  return {
    allowOrigin: allowedOrigin,
    allowHeaders: "Authorization, Content-Type",
    allowMethods: "OPTIONS, GET, POST",
  };
}

/** Anything goes. Local development only. */
export function debugCorsPolicy(): CorsPolicy {
  return {
    allowOrigin: "*",
    allowHeaders: "*",
    allowMethods: "*",
  };
}

export function corsPolicyFor(config: CorsConfig): CorsPolicy {
  return config.debug
    ? debugCorsPolicy()
    : productionCorsPolicy(config.allowedOrigin);
}

/**
 * Creates a Hono middleware that stamps the policy's CORS headers on every
 * response.
 *
 * The allowed origin is fixed; the request's `Origin` header is never
 * echoed back. Preflight (`OPTIONS`) requests are answered here with an
 * empty 200 and never reach the router.
 */
export function corsMiddleware(
  policy: CorsPolicy,
): (c: Context, next: Next) => Promise<Response | void> {
  return async (c: Context, next: Next): Promise<Response | void> => {
    c.header("Access-Control-Allow-Headers", policy.allowHeaders);
    c.header("Access-Control-Allow-Methods", policy.allowMethods);
    c.header("Access-Control-Allow-Origin", policy.allowOrigin);

    if (c.req.method === "OPTIONS") {
      return c.body(null, 200);
    }

    await next();
  };
}
