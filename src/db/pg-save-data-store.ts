// ---------------------------------------------------------------------------
// Postgres-backed save-data store.
// ---------------------------------------------------------------------------

import type pg from "pg";
import type {
  AccountId,
  SaveData,
  SaveDataStore,
  SessionResolver,
  SessionToken,
} from "../core/types.js";

/** The slice of `pg.Pool` the store uses. */
export type Queryable = Pick<pg.Pool, "query">;

function toBytea(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * {@link SaveDataStore} and {@link SessionResolver} over the tables in
 * `schema.sql`. Save payloads are stored as JSONB and come back parsed.
 *
 * Driver errors are not caught here; callers see them as thrown.
 */
export class PgSaveDataStore implements SaveDataStore, SessionResolver {
  constructor(private readonly db: Queryable) {}

  // ── Accounts & sessions ──────────────────────────────────────────────────

  async updateAccountLastActivity(accountId: AccountId): Promise<void> {
    await this.db.query(
      "UPDATE accounts SET last_activity = NOW() WHERE uuid = $1",
      [toBytea(accountId)],
    );
  }

  async fetchAccountIdFromToken(token: SessionToken): Promise<AccountId | null> {
    const res = await this.db.query<{ uuid: Buffer }>(
      "SELECT uuid FROM sessions WHERE token = $1 AND expire_at > NOW()",
      [toBytea(token)],
    );
    const row = res.rows[0];
    return row ? (new Uint8Array(row.uuid) as AccountId) : null;
  }

  // ── System save ──────────────────────────────────────────────────────────

  async readSystemSaveData(accountId: AccountId): Promise<SaveData | null> {
    const res = await this.db.query<{ data: SaveData }>(
      "SELECT data FROM system_saves WHERE uuid = $1",
      [toBytea(accountId)],
    );
    return res.rows[0]?.data ?? null;
  }

  async storeSystemSaveData(accountId: AccountId, data: SaveData): Promise<void> {
    await this.db.query(
      `INSERT INTO system_saves (uuid, data, updated_at)
       VALUES ($1, $2::jsonb, NOW())
       ON CONFLICT (uuid) DO UPDATE SET
         data = EXCLUDED.data,
         updated_at = EXCLUDED.updated_at`,
      [toBytea(accountId), JSON.stringify(data)],
    );
  }

  async deleteSystemSaveData(accountId: AccountId): Promise<void> {
    await this.db.query("DELETE FROM system_saves WHERE uuid = $1", [
      toBytea(accountId),
    ]);
  }

  // ── Session saves ────────────────────────────────────────────────────────

  async readSessionSaveData(
    accountId: AccountId,
    slot: number,
  ): Promise<SaveData | null> {
    const res = await this.db.query<{ data: SaveData }>(
      "SELECT data FROM session_saves WHERE uuid = $1 AND slot = $2",
      [toBytea(accountId), slot],
    );
    return res.rows[0]?.data ?? null;
  }

  async storeSessionSaveData(
    accountId: AccountId,
    slot: number,
    data: SaveData,
  ): Promise<void> {
    await this.db.query(
      `INSERT INTO session_saves (uuid, slot, data, updated_at)
       VALUES ($1, $2, $3::jsonb, NOW())
       ON CONFLICT (uuid, slot) DO UPDATE SET
         data = EXCLUDED.data,
         updated_at = EXCLUDED.updated_at`,
      [toBytea(accountId), slot, JSON.stringify(data)],
    );
  }

  async deleteSessionSaveData(accountId: AccountId, slot: number): Promise<void> {
    await this.db.query(
      "DELETE FROM session_saves WHERE uuid = $1 AND slot = $2",
      [toBytea(accountId), slot],
    );
  }
}
