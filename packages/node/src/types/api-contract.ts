/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the Keel app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Resolved caller (set by auth or the unsecured caller middleware) */
    auth: AuthContext;
  };
}
