// ---------------------------------------------------------------------------
// Save-data routes: get, update, and delete one save record.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { SessionResolver } from "../../core/types.js";
import { InvalidSaveDataError } from "../../core/errors.js";
import type { SaveDataService } from "../../savedata/save-data-service.js";
import { sessionMiddleware } from "../middleware/session.js";
import type { AppEnv } from "../env.js";

/** Dependencies required by save-data routes. */
export interface SaveDataRouteDeps {
  saveDataService: SaveDataService;
  sessions: SessionResolver;
}

const INT_RE = /^-?\d+$/;

/** Parsed `datatype` / `slot` query pair, or the reason it was rejected. */
type SaveQuery =
  | { ok: true; dataType: number; slot: number }
  | { ok: false; reason: string };

/** `datatype` is required; `slot` defaults to 0 and only matters for sessions. */
export function parseSaveQuery(
  rawDataType: string | undefined,
  rawSlot: string | undefined,
): SaveQuery {
  if (rawDataType === undefined || !INT_RE.test(rawDataType)) {
    return { ok: false, reason: "Missing or non-integer query parameter: datatype" };
  }
  if (rawSlot !== undefined && !INT_RE.test(rawSlot)) {
    return { ok: false, reason: "Non-integer query parameter: slot" };
  }
  return {
    ok: true,
    dataType: Number(rawDataType),
    slot: rawSlot === undefined ? 0 : Number(rawSlot),
  };
}

/**
 * Mounts save-data endpoints, all behind the session middleware:
 *
 * - `GET  /savedata/get?datatype=&slot=`    -- Fetch one save as JSON.
 * - `POST /savedata/update?datatype=&slot=` -- Replace one save with the body.
 * - `GET  /savedata/delete?datatype=&slot=` -- Delete one save.
 */
export function saveDataRoutes(deps: SaveDataRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.use("*", sessionMiddleware(deps.sessions));

  // ── GET /savedata/get ────────────────────────────────────────────────

  app.get("/get", async (c) => {
    const query = parseSaveQuery(c.req.query("datatype"), c.req.query("slot"));
    if (!query.ok) {
      return c.json({ error: query.reason, type: "validation_error" }, 400);
    }

    const result = await deps.saveDataService.get(
      c.get("accountId"),
      query.dataType,
      query.slot,
    );
    if (!result.ok) throw result.error;

    return c.json(result.value);
  });

  // ── POST /savedata/update ────────────────────────────────────────────

  app.post("/update", async (c) => {
    const query = parseSaveQuery(c.req.query("datatype"), c.req.query("slot"));
    if (!query.ok) {
      return c.json({ error: query.reason, type: "validation_error" }, 400);
    }

    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      throw new InvalidSaveDataError("body is not valid JSON", { cause: err });
    }

    const result = await deps.saveDataService.update(
      c.get("accountId"),
      query.dataType,
      query.slot,
      body,
    );
    if (!result.ok) throw result.error;

    return c.body(null, 200);
  });

  // ── GET /savedata/delete ─────────────────────────────────────────────

  app.get("/delete", async (c) => {
    const query = parseSaveQuery(c.req.query("datatype"), c.req.query("slot"));
    if (!query.ok) {
      return c.json({ error: query.reason, type: "validation_error" }, 400);
    }

    const result = await deps.saveDataService.delete(
      c.get("accountId"),
      query.dataType,
      query.slot,
    );
    if (!result.ok) throw result.error;

    return c.body(null, 200);
  });

  return app;
}
