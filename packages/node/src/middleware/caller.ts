/**
 * Caller resolution middleware.
 *
 * The core authorises by caller address, so the host only has to decide
 * who is calling:
 * 1. API key mode: X-Api-Key is looked up in the configured key map and
 *    the request acts as that key's address. A missing or unknown key is 401.
 * 2. Open mode (no keys configured): the X-Caller header is trusted as-is.
 *    Intended for development and tests.
 *
 * Sets `c.set("caller", address | undefined)`.
 */

import type { MiddlewareHandler } from "hono";
import { createMiddleware } from "hono/factory";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_HEADER = "X-Caller";

export interface CallerConfig {
  /** Map of API key → caller address. Empty means open mode. */
  readonly apiKeys: ReadonlyMap<string, string>;
}

export function callerMiddleware(config: CallerConfig): MiddlewareHandler<AppEnv> {
  const secured = config.apiKeys.size > 0;

  return async (c, next) => {
    if (!secured) {
      c.set("caller", c.req.header(CALLER_HEADER));
      return next();
    }

    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    const address = config.apiKeys.get(apiKey);
    if (address === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("caller", address);
    return next();
  };
}

/**
 * Guard for mutating routes. Must run AFTER callerMiddleware.
 *
 * Sets `c.set("actor", address)` for the handlers that follow.
 */
export function requireCaller() {
  return createMiddleware<{ Variables: AppEnv["Variables"] & { actor: string } }>(
    async (c, next) => {
      const caller = c.get("caller");
      if (caller === undefined) {
        return c.json(
          createErrorEnvelope(
            "UNAUTHORIZED",
            `A caller is required; send ${CALLER_HEADER} or ${API_KEY_HEADER}`,
          ),
          401,
        );
      }
      c.set("actor", caller);
      await next();
    },
  );
}
