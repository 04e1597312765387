// ---------------------------------------------------------------------------
// Save-data service: dispatches get / update / delete by data type and slot.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type {
  AccountId,
  Outcome,
  Result,
  SaveData,
  SaveDataStore,
} from "../core/types.js";
import { SaveDataType, SESSION_SLOT_COUNT } from "../core/types.js";
import {
  InvalidDataTypeError,
  InvalidSaveDataError,
  SaveDataNotFoundError,
  SlotOutOfRangeError,
} from "../core/errors.js";
import type { SaveDataValidationError } from "../core/errors.js";

// ── Types ──────────────────────────────────────────────────────────────────

/** A validated save location. */
export type SaveTarget =
  | { type: typeof SaveDataType.SYSTEM }
  | { type: typeof SaveDataType.SESSION; slot: number };

// ── Validation ─────────────────────────────────────────────────────────────

/**
 * Turn a raw `(dataType, slot)` pair into a {@link SaveTarget}.
 * The slot is only looked at for session saves.
 */
export function resolveSaveTarget(
  dataType: number,
  slot: number,
): Result<SaveTarget, SaveDataValidationError> {
  switch (dataType) {
    case SaveDataType.SYSTEM:
      return { ok: true, value: { type: SaveDataType.SYSTEM } };

    case SaveDataType.SESSION:
      if (!Number.isInteger(slot) || slot < 0 || slot >= SESSION_SLOT_COUNT) {
        return { ok: false, error: new SlotOutOfRangeError(slot) };
      }
      return { ok: true, value: { type: SaveDataType.SESSION, slot } };

    default:
      return { ok: false, error: new InvalidDataTypeError(dataType) };
  }
}

function isSaveData(value: unknown): value is SaveData {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err), { cause: err });
}

// ── SaveDataService ────────────────────────────────────────────────────────

/**
 * Reads, writes, and deletes an account's save data.
 *
 * Every operation first records account activity. That update is advisory:
 * a failure is logged and the operation carries on regardless.
 *
 * Validation failures come back as `{ ok: false }` values without touching
 * the store. Store failures come back the same way, carrying the store's own
 * error object. Nothing is retried.
 */
export class SaveDataService {
  constructor(
    private readonly store: SaveDataStore,
    private readonly logger: pino.Logger,
  ) {}

  // ── Public API ───────────────────────────────────────────────────────────

  async get(
    accountId: AccountId,
    dataType: number,
    slot: number,
  ): Promise<Result<SaveData>> {
    await this.touchAccount(accountId);

    const target = resolveSaveTarget(dataType, slot);
    if (!target.ok) return target;
    const where = target.value;

    try {
      const data =
        where.type === SaveDataType.SYSTEM
          ? await this.store.readSystemSaveData(accountId)
          : await this.store.readSessionSaveData(accountId, where.slot);

      if (data === null) {
        return {
          ok: false,
          error: new SaveDataNotFoundError(
            where.type,
            where.type === SaveDataType.SESSION ? where.slot : null,
          ),
        };
      }

      return { ok: true, value: data };
    } catch (err) {
      return { ok: false, error: toError(err) };
    }
  }

  async update(
    accountId: AccountId,
    dataType: number,
    slot: number,
    data: unknown,
  ): Promise<Outcome> {
    await this.touchAccount(accountId);

    const target = resolveSaveTarget(dataType, slot);
    if (!target.ok) return target;
    const where = target.value;

    if (!isSaveData(data)) {
      return { ok: false, error: new InvalidSaveDataError("expected a JSON object") };
    }

    try {
      if (where.type === SaveDataType.SYSTEM) {
        await this.store.storeSystemSaveData(accountId, data);
      } else {
        await this.store.storeSessionSaveData(accountId, where.slot, data);
      }
      return { ok: true };
    } catch (err) {
      return { ok: false, error: toError(err) };
    }
  }

  /**
   * Delete one save record. System deletes ignore `slot`; session deletes
   * reject a slot outside `[0, SESSION_SLOT_COUNT)`.
   */
  async delete(
    accountId: AccountId,
    dataType: number,
    slot: number,
  ): Promise<Outcome> {
    await this.touchAccount(accountId);

    const target = resolveSaveTarget(dataType, slot);
    if (!target.ok) return target;
    const where = target.value;

    try {
      if (where.type === SaveDataType.SYSTEM) {
        await this.store.deleteSystemSaveData(accountId);
      } else {
        await this.store.deleteSessionSaveData(accountId, where.slot);
      }
      return { ok: true };
    } catch (err) {
      return { ok: false, error: toError(err) };
    }
  }

  // ── Internals ────────────────────────────────────────────────────────────

  private async touchAccount(accountId: AccountId): Promise<void> {
    try {
      await this.store.updateAccountLastActivity(accountId);
    } catch (err) {
      this.logger.error(
        { err: toError(err) },
        "failed to update account last activity",
      );
    }
  }
}
