// ---------------------------------------------------------------------------
// Save-game server -- application bootstrap.
// ---------------------------------------------------------------------------

import type { Hono } from "hono";
import type pg from "pg";
import type pino from "pino";

import type { AppConfig } from "./core/types.js";
import type { AppEnv } from "./api/env.js";
import { createPool, initSchema } from "./db/pool.js";
import { PgSaveDataStore } from "./db/pg-save-data-store.js";
import { SaveDataService } from "./savedata/save-data-service.js";
import { createApp } from "./api/server.js";

export interface BuiltApp {
  app: Hono<AppEnv>;
  pool: pg.Pool;
}

/**
 * Wire the database, store, service, and HTTP app together.
 *
 * Rejects if the schema cannot be applied, which is how an unreachable or
 * misconfigured database surfaces at startup.
 */
export async function buildApp(
  config: AppConfig,
  logger: pino.Logger,
): Promise<BuiltApp> {
  // 1. Database
  const pool = createPool(config.database, logger.child({ module: "db" }));
  try {
    await initSchema(pool);
  } catch (err) {
    await pool.end();
    throw err;
  }
  logger.info(
    { dbproto: config.database.proto, dbaddr: config.database.addr, dbname: config.database.database },
    "database ready",
  );

  // 2. Persistence + service
  const store = new PgSaveDataStore(pool);
  const saveDataService = new SaveDataService(
    store,
    logger.child({ module: "savedata" }),
  );

  // 3. HTTP app
  const app = createApp({
    saveDataService,
    sessions: store,
    logger,
    cors: config.cors,
  });

  return { app, pool };
}
