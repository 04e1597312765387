// ---------------------------------------------------------------------------
// Health check route.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { AppEnv } from "../env.js";

const startedAt = Date.now();

/**
 * Mounts `GET /health`, a basic liveness probe. Does not touch the database.
 */
export function healthRoutes(): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", (c) => {
    const uptimeMs = Date.now() - startedAt;
    return c.json({
      status: "ok",
      uptime: uptimeMs,
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
