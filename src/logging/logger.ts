// ---------------------------------------------------------------------------
// Process-wide pino logger.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { AppConfig } from "../core/types.js";

/** Credential fields that must never reach log output. */
export const REDACTED_PATHS = [
  "*.password",
  "*.pass",
  "*.dbpass",
  "req.headers.authorization",
];

/**
 * Root logger for the server. JSON lines by default; `-debug` switches to
 * pino-pretty on stdout. Credentials under {@link REDACTED_PATHS} are
 * censored in both modes.
 *
 * `destination` bypasses the transport and receives raw JSON lines.
 */
export function createLogger(
  config: Pick<AppConfig, "logLevel" | "debug">,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: config.logLevel,
    base: { service: "savegame-server", pid: process.pid },
    redact: { paths: REDACTED_PATHS, censor: "[REDACTED]" },
  };

  if (destination !== undefined) {
    return pino(options, destination);
  }

  if (!config.debug) {
    return pino(options);
  }

  return pino({
    ...options,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "SYS:HH:MM:ss.l", ignore: "pid,service" },
    },
  });
}
