// ---------------------------------------------------------------------------
// Postgres connection pool construction and schema bootstrap.
// ---------------------------------------------------------------------------

import pg from "pg";
import type pino from "pino";
import { readFileSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import type { DatabaseConfig } from "../core/types.js";
import { ListenProtocol } from "../core/types.js";
import { splitHostPort } from "../net/address.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const DEFAULT_PG_PORT = 5432;

/**
 * Translate the `-db*` settings into pool options.
 *
 * Over TCP `addr` is `host[:port]`. Over a unix socket `addr` is the
 * directory holding the server's socket file, which is how pg expects it.
 */
export function buildPoolConfig(db: DatabaseConfig): pg.PoolConfig {
  const common: pg.PoolConfig = {
    user: db.user,
    password: db.password,
    database: db.database,
    max: 8,
  };

  if (db.proto === ListenProtocol.UNIX) {
    return { ...common, host: db.addr, port: DEFAULT_PG_PORT };
  }

  const { host, port } = splitHostPort(db.addr);
  return {
    ...common,
    host: host ?? "localhost",
    port: port ?? DEFAULT_PG_PORT,
  };
}

export function createPool(db: DatabaseConfig, logger: pino.Logger): pg.Pool {
  const pool = new pg.Pool(buildPoolConfig(db));
  // Dead idle clients are dropped and replaced by the pool; the event only
  // needs a listener so it does not crash the process.
  pool.on("error", (err) => {
    logger.error({ err }, "postgres pool background error");
  });
  return pool;
}

export async function initSchema(pool: pg.Pool): Promise<void> {
  const sql = readFileSync(join(__dirname, "schema.sql"), "utf-8");
  await pool.query(sql);
}
