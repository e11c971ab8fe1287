/**
 * Error envelope for API responses.
 *
 * { error: { code, message, details? } }
 *
 * `code` is either one of the HTTP layer's own codes or the code of the
 * domain error that rejected the call, passed through unchanged.
 */

import type { LedgerErrorCode } from "@ignition/ledger";
import type { TokenErrorCode } from "@ignition/launch";
import type { EventStoreErrorCode } from "@ignition/event-store";

export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "INTERNAL_ERROR";

export type DomainErrorCode = TokenErrorCode | LedgerErrorCode | EventStoreErrorCode;

export type ErrorCode = ApiErrorCode | DomainErrorCode;

export interface ErrorDetail {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}
