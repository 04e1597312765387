// ---------------------------------------------------------------------------
// Error hierarchy for the save-game server.
// ---------------------------------------------------------------------------

import type { SaveDataType } from "./types.js";

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all save-game server domain errors.
 */
export class SaveServerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SaveServerError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Request validation ──────────────────────────────────────────────────────

/**
 * A save-data request was rejected before reaching the database.
 */
export class SaveDataValidationError extends SaveServerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SaveDataValidationError";
  }
}

/** The data type discriminator is neither system nor session. */
export class InvalidDataTypeError extends SaveDataValidationError {
  public readonly dataType: number;

  constructor(dataType: number, options?: ErrorOptions) {
    super("invalid data type", options);
    this.name = "InvalidDataTypeError";
    this.dataType = dataType;
  }
}

/** A session slot outside `[0, SESSION_SLOT_COUNT)`. */
export class SlotOutOfRangeError extends SaveDataValidationError {
  public readonly slot: number;

  constructor(slot: number, options?: ErrorOptions) {
    super(`slot id ${slot} out of range`, options);
    this.name = "SlotOutOfRangeError";
    this.slot = slot;
  }
}

/** The uploaded save payload is not a JSON object. */
export class InvalidSaveDataError extends SaveDataValidationError {
  constructor(reason: string, options?: ErrorOptions) {
    super(`invalid save data: ${reason}`, options);
    this.name = "InvalidSaveDataError";
  }
}

// ── Lookup ──────────────────────────────────────────────────────────────────

/** No save record exists for the requested type/slot. */
export class SaveDataNotFoundError extends SaveServerError {
  public readonly dataType: SaveDataType;
  public readonly slot: number | null;

  constructor(dataType: SaveDataType, slot: number | null, options?: ErrorOptions) {
    super(
      slot === null ? "save data not found" : `save data not found for slot ${slot}`,
      options,
    );
    this.name = "SaveDataNotFoundError";
    this.dataType = dataType;
    this.slot = slot;
  }
}

// ── Auth ────────────────────────────────────────────────────────────────────

/** Missing, malformed, or unknown session token. */
export class AuthenticationError extends SaveServerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AuthenticationError";
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends SaveServerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
