// ---------------------------------------------------------------------------
// Node HTTP(S) server for the Hono app.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import { createServer as createHttpsServer } from "node:https";
import { createAdaptorServer } from "@hono/node-server";
import type net from "node:net";
import type { TlsConfig } from "../core/types.js";

type FetchHandler = (request: Request) => Response | Promise<Response>;

/**
 * Wrap `fetch` in a node server that is not yet listening.
 * Plaintext HTTP without `tls`; HTTPS with the PEM files it names.
 *
 * Typed as the plain `net.Server` the listener bootstrap binds.
 */
export function createNodeServer(
  fetch: FetchHandler,
  tls: TlsConfig | null,
): net.Server {
  if (tls === null) {
    return createAdaptorServer({ fetch });
  }

  return createAdaptorServer({
    fetch,
    createServer: createHttpsServer,
    serverOptions: {
      cert: fs.readFileSync(tls.certPath),
      key: fs.readFileSync(tls.keyPath),
    },
  });
}
