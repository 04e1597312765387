// ---------------------------------------------------------------------------
// config.yml loader.
// Reads the YAML file, validates it with Zod, and returns a typed FileConfig
// whose values become the defaults for the command-line flags.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parse } from "yaml";
import type { CorsConfig, FileConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

export const DEFAULT_CONFIG_PATH = "config.yml";

/** Production CORS origin used when `server.origin` is absent. */
export const DEFAULT_ALLOWED_ORIGIN = "http://localhost:8000";

// ── Zod schemas ─────────────────────────────────────────────────────────────

/**
 * YAML turns `pass: 1234` into a number and `pass:` into null. Credentials are
 * always strings, and a blank or absent key reads as "" so a flag can supply it.
 */
const scalar = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined ? "" : String(v)));

/** An absent or empty section reads as `{}`, so its keys take their defaults. */
function section<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess((v) => v ?? {}, z.object(shape));
}

export const FileConfigSchema = z.object({
  server: section({
    host: scalar,
    origin: z
      .string()
      .url()
      .nullish()
      .transform((v) => v ?? DEFAULT_ALLOWED_ORIGIN),
  }),
  database: section({
    user: scalar,
    pass: scalar,
    database: scalar,
    host: scalar,
  }),
});

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Resolve which config file to read: `SAVEGAME_CONFIG` if set, otherwise
 * `config.yml` in the working directory.
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(env["SAVEGAME_CONFIG"] ?? DEFAULT_CONFIG_PATH);
}

/**
 * Load and validate the config file.
 *
 * @throws ConfigurationError if the file cannot be read, is not valid YAML,
 *   or does not match {@link FileConfigSchema}.
 */
export function loadFileConfig(filePath: string): FileConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`cannot read config file: ${message}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`malformed YAML in ${filePath}: ${message}`, { cause: err });
  }

  const validated = FileConfigSchema.safeParse(parsed);
  if (!validated.success) {
    const issues = validated.error.issues
      .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`invalid config in ${filePath}: ${issues}`);
  }

  return validated.data;
}

/**
 * True when production CORS will answer with {@link DEFAULT_ALLOWED_ORIGIN},
 * i.e. `server.origin` was left out and debug mode is off.
 */
export function usesDefaultOrigin(cors: CorsConfig): boolean {
  return !cors.debug && cors.allowedOrigin === DEFAULT_ALLOWED_ORIGIN;
}
