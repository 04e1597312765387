// ---------------------------------------------------------------------------
// Hono environment shared by the app, its middleware, and its routes.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type { AccountId } from "../core/types.js";

export interface AppVariables {
  requestId: string;
  logger: pino.Logger;
  /** Set by the session middleware on authenticated routes. */
  accountId: AccountId;
}

export interface AppEnv {
  Variables: AppVariables;
}
