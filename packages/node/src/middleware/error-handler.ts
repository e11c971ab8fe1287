/**
 * Global error handler and not-found handler.
 *
 * TokenError, LedgerError and EventStoreError carry a code; each code has
 * a fixed HTTP status. Anything else is an internal error and its
 * message stays in the server log.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { LedgerError } from "@ignition/ledger";
import { TokenError } from "@ignition/launch";
import { EventStoreError } from "@ignition/event-store";
import { createErrorEnvelope } from "../types/error.js";
import type { DomainErrorCode } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const DOMAIN_STATUS: Readonly<Record<DomainErrorCode, ContentfulStatusCode>> = {
  // Authority and phase
  UNAUTHORIZED: 403,
  TRAJECTORY_ALREADY_COMMITTED: 409,
  MISSION_LOG_FULL: 409,
  INDEX_OUT_OF_BOUNDS: 404,

  // Malformed input that passed the DTO schemas
  INVALID_TAG: 400,
  INVALID_CONTEXT: 400,
  INVALID_RECIPIENT: 400,
  INVALID_ADDRESS: 400,
  INVALID_AMOUNT: 400,
  INVALID_STREAM_ID: 400,
  INVALID_VERSION: 400,

  // Well-formed but not possible in the current state
  ZERO_AMOUNT: 422,
  INVALID_ALLOCATION: 422,
  VESTING_NOT_STARTED: 422,
  CLIFF_NOT_REACHED: 422,
  NOTHING_TO_CLAIM: 422,
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_ALLOWANCE: 422,
  ARITHMETIC_OVERFLOW: 422,
  ARITHMETIC_UNDERFLOW: 422,

  // Host faults
  INVALID_CONFIG: 500,
  EMPTY_APPEND: 500,
};

function domainCode(err: Error): DomainErrorCode | undefined {
  if (err instanceof TokenError || err instanceof LedgerError || err instanceof EventStoreError) {
    return err.code;
  }
  return undefined;
}

// =============================================================================
// Handlers
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = domainCode(err);
  const status = code === undefined ? 500 : DOMAIN_STATUS[code];

  // Don't leak internal details
  if (code === undefined || status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code, err.message), status);
}

/**
 * Registered as Hono's notFound handler.
 */
export function handleNotFound(c: Context): Response {
  return c.json(
    createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
    404,
  );
}
