/**
 * Hono environment shared by every ClaimFlow route and middleware.
 */

import type { Logger } from "pino";
import type { Actor, Employee } from "../types/claim-contract.js";

export interface AuthContext {
  employee: Employee;
  actor: Actor;
}

export interface AppEnv {
  Variables: {
    requestId: string;
    /** Request-scoped child logger carrying `requestId` */
    logger: Logger;
    /** Set by the auth middleware on protected routes */
    auth: AuthContext;
  };
}
