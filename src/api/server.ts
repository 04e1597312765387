// ---------------------------------------------------------------------------
// Hono application factory.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type pino from "pino";
import type { CorsConfig, SessionResolver } from "../core/types.js";
import type { SaveDataService } from "../savedata/save-data-service.js";
import type { AppEnv } from "./env.js";

import { corsMiddleware, corsPolicyFor } from "./middleware/cors.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { createRequestLogger } from "../logging/context.js";
import { errorHandler } from "./middleware/error-handler.js";

import { saveDataRoutes } from "./routes/savedata.js";
import { healthRoutes } from "./routes/health.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface AppDependencies {
  saveDataService: SaveDataService;
  sessions: SessionResolver;
  logger: pino.Logger;
  cors: CorsConfig;
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Create and configure the Hono application.
 *
 * Middleware stack (applied in order):
 * 1. CORS headers; preflight requests end here.
 * 2. Request ID generation (`X-Request-ID`).
 * 3. Request-scoped child logger attached to context.
 * 4. Route handlers (save-data routes add the session check).
 * 5. Global error handler (maps domain errors to HTTP status codes).
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ── Global middleware ──────────────────────────────────────────────────

  app.use("*", corsMiddleware(corsPolicyFor(deps.cors)));
  app.use("*", requestIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));

  // ── Routes ────────────────────────────────────────────────────────────

  app.route(
    "/savedata",
    saveDataRoutes({
      saveDataService: deps.saveDataService,
      sessions: deps.sessions,
    }),
  );

  app.route("/health", healthRoutes());

  // ── Error handler ─────────────────────────────────────────────────────

  app.onError(errorHandler);

  return app;
}
