// ---------------------------------------------------------------------------
// Node.js entrypoint: config, database, listener, serve.
// ---------------------------------------------------------------------------

import type net from "node:net";
import type { AppConfig } from "./core/types.js";
import { loadFileConfig, resolveConfigPath, usesDefaultOrigin } from "./config/config.js";
import { parseFlags } from "./config/flags.js";
import { createLogger } from "./logging/logger.js";
import { buildApp } from "./app.js";
import type { BuiltApp } from "./app.js";
import { createNodeServer } from "./net/server.js";
import { bindListener, describeAddress } from "./net/listener.js";

// 1. Configuration. No logger exists yet, so failures go straight to stderr.
let config: AppConfig;
try {
  const file = loadFileConfig(resolveConfigPath());
  config = parseFlags(process.argv.slice(2), file);
} catch (err) {
  console.error("Error:", err instanceof Error ? err.message : String(err));
  process.exit(1);
}

// 2. Logger
const logger = createLogger(config);

if (usesDefaultOrigin(config.cors)) {
  logger.warn(
    { origin: config.cors.allowedOrigin },
    "server.origin is not set in config.yml; CORS allows only the default origin",
  );
}

// 3. Database + app
let built: BuiltApp;
try {
  built = await buildApp(config, logger);
} catch (err) {
  logger.fatal({ err }, "failed to initialize database");
  process.exit(1);
}

// 4. Listener
let server: net.Server;
try {
  server = createNodeServer(built.app.fetch, config.tls);
  await bindListener(server, config.listen);
} catch (err) {
  logger.fatal({ err, proto: config.listen.proto, addr: config.listen.addr }, "failed to create net listener");
  process.exit(1);
}

// 5. Serve until the transport fails. There is no restart.
server.on("error", (err) => {
  logger.fatal({ err }, "http server errored");
  process.exit(1);
});

logger.info(
  {
    address: describeAddress(server),
    tls: config.tls !== null,
    debug: config.debug,
    env: config.env,
  },
  "savegame-server listening",
);
