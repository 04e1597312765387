// ---------------------------------------------------------------------------
// Core types for the save-game server.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Branded primitives ──────────────────────────────────────────────────────

/** Opaque account identifier. Never inspected, only forwarded. */
export type AccountId = Uint8Array & { readonly __brand: "AccountId" };

/** Raw session token bytes as sent by the client. */
export type SessionToken = Uint8Array & { readonly __brand: "SessionToken" };

// ── Enums ───────────────────────────────────────────────────────────────────

export const SaveDataType = {
  SYSTEM: 0,
  SESSION: 1,
} as const;
export type SaveDataType = (typeof SaveDataType)[keyof typeof SaveDataType];

/** Number of session save slots per account. */
export const SESSION_SLOT_COUNT = 5;

export const ListenProtocol = {
  TCP: "tcp",
  UNIX: "unix",
} as const;
export type ListenProtocol =
  (typeof ListenProtocol)[keyof typeof ListenProtocol];

// ── Save data ───────────────────────────────────────────────────────────────

/** Save payload as stored. The server does not interpret its contents. */
export type SaveData = Record<string, unknown>;

// ── Result ──────────────────────────────────────────────────────────────────

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/** A {@link Result} with no success value. */
export type Outcome<E = Error> = { ok: true } | { ok: false; error: E };

// ── Persistence contract ────────────────────────────────────────────────────

/**
 * Everything the save-data service needs from the database.
 * Methods reject with the driver's error on failure.
 */
export interface SaveDataStore {
  updateAccountLastActivity(accountId: AccountId): Promise<void>;

  readSystemSaveData(accountId: AccountId): Promise<SaveData | null>;
  storeSystemSaveData(accountId: AccountId, data: SaveData): Promise<void>;
  deleteSystemSaveData(accountId: AccountId): Promise<void>;

  readSessionSaveData(accountId: AccountId, slot: number): Promise<SaveData | null>;
  storeSessionSaveData(accountId: AccountId, slot: number, data: SaveData): Promise<void>;
  deleteSessionSaveData(accountId: AccountId, slot: number): Promise<void>;
}

/** Resolves a client session token to the account that owns it. */
export interface SessionResolver {
  fetchAccountIdFromToken(token: SessionToken): Promise<AccountId | null>;
}

// ── Config types ────────────────────────────────────────────────────────────

/** Contents of `config.yml`. */
export interface FileConfig {
  server: {
    host: string;
    origin: string;
  };
  database: {
    user: string;
    pass: string;
    database: string;
    host: string;
  };
}

export interface ListenTarget {
  proto: ListenProtocol;
  addr: string;
}

export interface TlsConfig {
  certPath: string;
  keyPath: string;
}

export interface DatabaseConfig {
  user: string;
  password: string;
  proto: ListenProtocol;
  addr: string;
  database: string;
}

export interface CorsConfig {
  debug: boolean;
  allowedOrigin: string;
}

/** Fully resolved startup configuration (file defaults + flags). */
export interface AppConfig {
  env: "development" | "staging" | "production";
  debug: boolean;
  logLevel: string;
  listen: ListenTarget;
  tls: TlsConfig | null;
  database: DatabaseConfig;
  cors: CorsConfig;
}
