/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { TokenService } from "../services/token-service.js";

/**
 * Hono environment type for the node app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The token service (set by the service middleware) */
    service: TokenService;

    /** Resolved caller address, if the request carried one (set by caller middleware) */
    caller: string | undefined;
  };
}
