// ---------------------------------------------------------------------------
// Listener bootstrap: binds a node server to TCP or a unix domain socket.
// ---------------------------------------------------------------------------

import fs from "node:fs/promises";
import type net from "node:net";
import type { ListenTarget } from "../core/types.js";
import { ListenProtocol } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";
import { splitHostPort } from "./address.js";

/** Socket file mode so that any local process may connect. */
export const UNIX_SOCKET_MODE = 0o777;

function listenOnce(
  server: net.Server,
  listen: (onListening: () => void) => void,
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onError = (err: Error): void => {
      server.off("listening", onListening);
      reject(err);
    };
    const onListening = (): void => {
      server.off("error", onError);
      resolve();
    };
    server.once("error", onError);
    listen(onListening);
  });
}

function closeServer(server: net.Server): Promise<void> {
  return new Promise<void>((resolve) => {
    server.close(() => resolve());
  });
}

async function removeStaleSocket(socketPath: string): Promise<void> {
  try {
    await fs.unlink(socketPath);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return;
    throw err;
  }
}

/**
 * Bind `server` to `target` and resolve once it is listening.
 *
 * For `tcp`, `addr` is `host:port` or `:port` (all interfaces).
 *
 * For `unix`, `addr` is a filesystem path. Whatever file already sits at the
 * path is removed first, and once bound the socket is made world
 * read/write/execute. If that chmod fails the server is closed again and
 * the error rejects.
 */
export async function bindListener(
  server: net.Server,
  target: ListenTarget,
): Promise<void> {
  if (target.proto === ListenProtocol.UNIX) {
    await removeStaleSocket(target.addr);
    await listenOnce(server, (cb) => server.listen(target.addr, cb));

    try {
      await fs.chmod(target.addr, UNIX_SOCKET_MODE);
    } catch (err) {
      await closeServer(server);
      throw err;
    }
    return;
  }

  const { host, port } = splitHostPort(target.addr);
  if (port === undefined) {
    throw new ConfigurationError(`missing port in listen address "${target.addr}"`);
  }

  await listenOnce(server, (cb) => {
    if (host === undefined) server.listen(port, cb);
    else server.listen(port, host, cb);
  });
}

/** Human-readable description of where the server ended up listening. */
export function describeAddress(server: net.Server): string {
  const addr = server.address();
  if (addr === null) return "<not listening>";
  if (typeof addr === "string") return addr;
  return addr.family === "IPv6"
    ? `[${addr.address}]:${addr.port}`
    : `${addr.address}:${addr.port}`;
}
