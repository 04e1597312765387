// ---------------------------------------------------------------------------
// Tests for the save-data service (get / update / delete dispatch).
// ---------------------------------------------------------------------------

import { describe, it, expect, vi } from "vitest";
import pino from "pino";

import {
  SaveDataService,
  resolveSaveTarget,
} from "../../../src/savedata/save-data-service.js";
import {
  InvalidDataTypeError,
  InvalidSaveDataError,
  SaveDataNotFoundError,
  SlotOutOfRangeError,
} from "../../../src/core/errors.js";
import type { AccountId, SaveData } from "../../../src/core/types.js";
import { SESSION_SLOT_COUNT } from "../../../src/core/types.js";

// ── Helpers ────────────────────────────────────────────────────────────────

const ACCOUNT = new Uint8Array([0xde, 0xad, 0xbe, 0xef]) as AccountId;

function createFakeStore() {
  return {
    updateAccountLastActivity: vi.fn(async (): Promise<void> => {}),
    readSystemSaveData: vi.fn(async (): Promise<SaveData | null> => null),
    storeSystemSaveData: vi.fn(async (): Promise<void> => {}),
    deleteSystemSaveData: vi.fn(async (): Promise<void> => {}),
    readSessionSaveData: vi.fn(async (): Promise<SaveData | null> => null),
    storeSessionSaveData: vi.fn(async (): Promise<void> => {}),
    deleteSessionSaveData: vi.fn(async (): Promise<void> => {}),
  };
}

type FakeStore = ReturnType<typeof createFakeStore>;

function persistenceCalls(store: FakeStore): number {
  return (
    store.readSystemSaveData.mock.calls.length +
    store.storeSystemSaveData.mock.calls.length +
    store.deleteSystemSaveData.mock.calls.length +
    store.readSessionSaveData.mock.calls.length +
    store.storeSessionSaveData.mock.calls.length +
    store.deleteSessionSaveData.mock.calls.length
  );
}

function createService(store: FakeStore = createFakeStore()) {
  const logger = pino({ level: "silent" });
  return { service: new SaveDataService(store, logger), store, logger };
}

// ── resolveSaveTarget ──────────────────────────────────────────────────────

describe("resolveSaveTarget", () => {
  it("resolves a system save regardless of slot", () => {
    expect(resolveSaveTarget(0, 42)).toEqual({ ok: true, value: { type: 0 } });
  });

  it("resolves a session save with its slot", () => {
    expect(resolveSaveTarget(1, 3)).toEqual({
      ok: true,
      value: { type: 1, slot: 3 },
    });
  });

  it("rejects a fractional slot", () => {
    const result = resolveSaveTarget(1, 1.5);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(SlotOutOfRangeError);
  });
});

// ── delete ─────────────────────────────────────────────────────────────────

describe("SaveDataService.delete", () => {
  it.each([2, -1, 99])(
    "rejects data type %i without touching save records",
    async (dataType) => {
      const { service, store } = createService();

      const result = await service.delete(ACCOUNT, dataType, 0);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(InvalidDataTypeError);
      expect(result.error.message).toBe("invalid data type");
      expect(persistenceCalls(store)).toBe(0);
    },
  );

  it.each([-1, SESSION_SLOT_COUNT, SESSION_SLOT_COUNT + 1, 1000])(
    "rejects session slot %i as out of range",
    async (slot) => {
      const { service, store } = createService();

      const result = await service.delete(ACCOUNT, 1, slot);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      const err = result.error;
      expect(err).toBeInstanceOf(SlotOutOfRangeError);
      expect(err.message).toBe(`slot id ${slot} out of range`);
      if (err instanceof SlotOutOfRangeError) expect(err.slot).toBe(slot);
      expect(persistenceCalls(store)).toBe(0);
    },
  );

  it.each([0, 1, 2, 3, 4])(
    "deletes session slot %i with exactly one store call",
    async (slot) => {
      const { service, store } = createService();

      const result = await service.delete(ACCOUNT, 1, slot);

      expect(result).toEqual({ ok: true });
      expect(store.deleteSessionSaveData).toHaveBeenCalledTimes(1);
      expect(store.deleteSessionSaveData).toHaveBeenCalledWith(ACCOUNT, slot);
      expect(persistenceCalls(store)).toBe(1);
    },
  );

  it.each([-7, 0, 3, 99])(
    "deletes the system save and ignores slot %i",
    async (slot) => {
      const { service, store } = createService();

      const result = await service.delete(ACCOUNT, 0, slot);

      expect(result).toEqual({ ok: true });
      expect(store.deleteSystemSaveData).toHaveBeenCalledTimes(1);
      expect(store.deleteSystemSaveData).toHaveBeenCalledWith(ACCOUNT);
      expect(persistenceCalls(store)).toBe(1);
    },
  );

  it("records account activity before dispatching", async () => {
    const { service, store } = createService();

    await service.delete(ACCOUNT, 1, 2);

    expect(store.updateAccountLastActivity).toHaveBeenCalledWith(ACCOUNT);
    const activityOrder = store.updateAccountLastActivity.mock.invocationCallOrder[0];
    const deleteOrder = store.deleteSessionSaveData.mock.invocationCallOrder[0];
    expect(activityOrder).toBeLessThan(deleteOrder ?? 0);
  });

  it("still deletes when the activity update fails, and logs the failure", async () => {
    const store = createFakeStore();
    store.updateAccountLastActivity.mockRejectedValueOnce(new Error("db gone"));
    const { service, logger } = createService(store);
    const errorSpy = vi.spyOn(logger, "error");

    const result = await service.delete(ACCOUNT, 0, 0);

    expect(result).toEqual({ ok: true });
    expect(store.deleteSystemSaveData).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("passes a store error through as the same object", async () => {
    const store = createFakeStore();
    const dbError = new Error("connection reset");
    store.deleteSessionSaveData.mockRejectedValueOnce(dbError);
    const { service } = createService(store);

    const result = await service.delete(ACCOUNT, 1, 0);

    expect(result).toEqual({ ok: false, error: dbError });
    if (!result.ok) expect(result.error).toBe(dbError);
    expect(store.deleteSessionSaveData).toHaveBeenCalledTimes(1);
  });

  it("does not retry a failed delete", async () => {
    const store = createFakeStore();
    store.deleteSystemSaveData.mockRejectedValue(new Error("timeout"));
    const { service } = createService(store);

    await service.delete(ACCOUNT, 0, 0);

    expect(store.deleteSystemSaveData).toHaveBeenCalledTimes(1);
  });
});

// ── get ────────────────────────────────────────────────────────────────────

describe("SaveDataService.get", () => {
  it("returns the stored system save", async () => {
    const store = createFakeStore();
    store.readSystemSaveData.mockResolvedValueOnce({ playTime: 120 });
    const { service } = createService(store);

    const result = await service.get(ACCOUNT, 0, 4);

    expect(result).toEqual({ ok: true, value: { playTime: 120 } });
    expect(store.readSystemSaveData).toHaveBeenCalledWith(ACCOUNT);
  });

  it("returns not-found for an empty session slot", async () => {
    const { service, store } = createService();

    const result = await service.get(ACCOUNT, 1, 2);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SaveDataNotFoundError);
    expect(result.error.message).toBe("save data not found for slot 2");
    expect(store.readSessionSaveData).toHaveBeenCalledWith(ACCOUNT, 2);
  });

  it("rejects an out-of-range slot before reading", async () => {
    const { service, store } = createService();

    const result = await service.get(ACCOUNT, 1, 7);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(SlotOutOfRangeError);
    expect(persistenceCalls(store)).toBe(0);
  });
});

// ── update ─────────────────────────────────────────────────────────────────

describe("SaveDataService.update", () => {
  it("stores a session save in the requested slot", async () => {
    const { service, store } = createService();

    const result = await service.update(ACCOUNT, 1, 3, { wave: 12 });

    expect(result).toEqual({ ok: true });
    expect(store.storeSessionSaveData).toHaveBeenCalledWith(ACCOUNT, 3, { wave: 12 });
    expect(persistenceCalls(store)).toBe(1);
  });

  it("stores the system save", async () => {
    const { service, store } = createService();

    const result = await service.update(ACCOUNT, 0, 0, { unlocked: ["a"] });

    expect(result).toEqual({ ok: true });
    expect(store.storeSystemSaveData).toHaveBeenCalledWith(ACCOUNT, { unlocked: ["a"] });
  });

  it.each([
    { payload: null },
    { payload: 5 },
    { payload: "text" },
    { payload: [1, 2] },
  ])(
    "rejects $payload as a save payload",
    async ({ payload }) => {
      const { service, store } = createService();

      const result = await service.update(ACCOUNT, 0, 0, payload);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error).toBeInstanceOf(InvalidSaveDataError);
      expect(persistenceCalls(store)).toBe(0);
    },
  );

  it("rejects an unknown data type before checking the payload", async () => {
    const { service } = createService();

    const result = await service.update(ACCOUNT, 3, 0, "not an object");

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(InvalidDataTypeError);
  });
});
