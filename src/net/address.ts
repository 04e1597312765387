// ---------------------------------------------------------------------------
// host:port address parsing shared by the listener and the database pool.
// ---------------------------------------------------------------------------

import { ConfigurationError } from "../core/errors.js";

export interface HostPort {
  /** `undefined` means "all interfaces" for a listener. */
  host: string | undefined;
  port: number | undefined;
}

function parsePort(raw: string, addr: string): number {
  if (!/^\d{1,5}$/.test(raw)) {
    throw new ConfigurationError(`invalid port in address "${addr}"`);
  }
  const port = Number(raw);
  if (port > 65_535) {
    throw new ConfigurationError(`invalid port in address "${addr}"`);
  }
  return port;
}

/**
 * Split an address of the form `host:port`, `:port`, `[ipv6]:port`, or a
 * bare host.
 *
 * @example
 * splitHostPort(":8001")          // { host: undefined, port: 8001 }
 * splitHostPort("db.local")       // { host: "db.local", port: undefined }
 * splitHostPort("[::1]:5432")     // { host: "::1", port: 5432 }
 */
export function splitHostPort(addr: string): HostPort {
  const trimmed = addr.trim();

  if (trimmed.startsWith("[")) {
    const close = trimmed.indexOf("]");
    if (close === -1) {
      throw new ConfigurationError(`missing "]" in address "${addr}"`);
    }
    const host = trimmed.slice(1, close);
    const rest = trimmed.slice(close + 1);
    if (rest === "") return { host: host || undefined, port: undefined };
    if (!rest.startsWith(":")) {
      throw new ConfigurationError(`unexpected "${rest}" after "]" in address "${addr}"`);
    }
    return { host: host || undefined, port: parsePort(rest.slice(1), addr) };
  }

  const colons = trimmed.split(":").length - 1;

  // Bare IPv6 literal without brackets carries no port.
  if (colons !== 1) {
    return { host: trimmed || undefined, port: undefined };
  }

  const idx = trimmed.indexOf(":");
  const host = trimmed.slice(0, idx);
  return { host: host || undefined, port: parsePort(trimmed.slice(idx + 1), addr) };
}
