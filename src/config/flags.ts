// ---------------------------------------------------------------------------
// Command-line flags. File config supplies the defaults; flags override.
// ---------------------------------------------------------------------------

import { parseArgs } from "node:util";
import type { AppConfig, FileConfig, ListenProtocol } from "../core/types.js";
import { ListenProtocol as Protocols } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

const BOOLEAN_FLAGS = new Set(["debug"]);
const STRING_FLAGS = new Set([
  "proto",
  "addr",
  "tlscert",
  "tlskey",
  "dbuser",
  "dbpass",
  "dbproto",
  "dbaddr",
  "dbname",
]);

/**
 * Accept `-name`, `-name=value`, and `-debug=true|false` alongside the
 * `--name` form parseArgs understands. Only known flag names are rewritten.
 * A value that itself starts with `-` must be given as `-dbpass=-x`.
 */
export function normalizeArgv(argv: readonly string[]): string[] {
  const out: string[] = [];
  for (const arg of argv) {
    const match = /^--?([a-z]+)(?:=(.*))?$/.exec(arg);
    const name = match?.[1];
    if (!match || name === undefined) {
      out.push(arg);
      continue;
    }

    const value = match[2];
    if (BOOLEAN_FLAGS.has(name)) {
      if (value === undefined || value === "true") out.push(`--${name}`);
      else if (value !== "false") out.push(arg);
      continue;
    }

    if (STRING_FLAGS.has(name)) {
      out.push(value === undefined ? `--${name}` : `--${name}=${value}`);
      continue;
    }

    out.push(arg);
  }
  return out;
}

function parseProtocol(flag: string, value: string): ListenProtocol {
  if (value === Protocols.TCP || value === Protocols.UNIX) return value;
  throw new ConfigurationError(`-${flag} must be "tcp" or "unix", got "${value}"`);
}

function resolveEnv(nodeEnv: string | undefined): AppConfig["env"] {
  return nodeEnv === "production" || nodeEnv === "staging" ? nodeEnv : "development";
}

/** Flags whose config.yml default is blank must then be given explicitly. */
function requireValue(flag: string, value: string): string {
  if (value === "") {
    throw new ConfigurationError(`-${flag} is required: set it in config.yml or pass it as a flag`);
  }
  return value;
}

function readArgs(argv: readonly string[], file: FileConfig) {
  try {
    return parseArgs({
      args: normalizeArgv(argv),
      options: {
        debug: { type: "boolean", default: false },
        proto: { type: "string", default: Protocols.TCP },
        addr: { type: "string", default: file.server.host },
        tlscert: { type: "string", default: "" },
        tlskey: { type: "string", default: "" },
        dbuser: { type: "string", default: file.database.user },
        dbpass: { type: "string", default: file.database.pass },
        dbproto: { type: "string", default: Protocols.TCP },
        dbaddr: { type: "string", default: file.database.host },
        dbname: { type: "string", default: file.database.database },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`invalid flags: ${message}`, { cause: err });
  }
}

/**
 * Parse the process arguments into the final {@link AppConfig}.
 *
 * @throws ConfigurationError on unknown flags, a bad protocol name, a TLS
 *   certificate given without its key, or a listen or database setting that
 *   is blank in both config.yml and the flags.
 */
export function parseFlags(
  argv: readonly string[],
  file: FileConfig,
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const values = readArgs(argv, file);

  const debug = values.debug ?? false;
  const tlsCert = values.tlscert ?? "";
  const tlsKey = values.tlskey ?? "";

  if (tlsCert !== "" && tlsKey === "") {
    throw new ConfigurationError("-tlskey is required when -tlscert is set");
  }

  const listenAddr = requireValue("addr", values.addr ?? file.server.host);
  const dbUser = requireValue("dbuser", values.dbuser ?? file.database.user);
  const dbAddr = requireValue("dbaddr", values.dbaddr ?? file.database.host);
  const dbName = requireValue("dbname", values.dbname ?? file.database.database);

  return {
    env: resolveEnv(env["NODE_ENV"]),
    debug,
    logLevel: env["LOG_LEVEL"] ?? (debug ? "debug" : "info"),
    listen: {
      proto: parseProtocol("proto", values.proto ?? Protocols.TCP),
      addr: listenAddr,
    },
    tls: tlsCert === "" ? null : { certPath: tlsCert, keyPath: tlsKey },
    database: {
      user: dbUser,
      password: values.dbpass ?? file.database.pass,
      proto: parseProtocol("dbproto", values.dbproto ?? Protocols.TCP),
      addr: dbAddr,
      database: dbName,
    },
    cors: {
      debug,
      allowedOrigin: file.server.origin,
    },
  };
}
