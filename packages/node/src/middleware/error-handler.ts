/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (VaultError, LedgerError, AssetError)
 * to appropriate HTTP status codes.
 */

import type { Context } from "hono";
import { LedgerError } from "@wtoken/ledger";
import { AssetError, VaultError } from "@wtoken/vault";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 423 | 500;

interface DomainError {
  readonly code: string;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>> | undefined;
}

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Request shape
  VALIDATION_ERROR: 400,
  MISSING_ACCOUNT: 400,
  INVALID_ADDRESS: 400,
  INVALID_AMOUNT: 400,
  INVALID_MULTIPLIER: 400,
  INVALID_SNAPSHOT: 400,
  INVALID_SENDER: 400,
  INVALID_RECEIVER: 400,
  INVALID_APPROVER: 400,
  INVALID_SPENDER: 400,
  NOT_FOUND: 404,

  // Permit
  INVALID_SIGNATURE: 401,
  EXPIRED_DEADLINE: 401,

  // Policy
  UNAUTHORIZED: 403,
  BAD_CONFIRMATION: 403,
  BLOCKED_SENDER: 403,
  BLOCKED_RECEIVER: 403,
  ASSET_BLOCKED_SENDER: 403,
  ASSET_BLOCKED_RECEIVER: 403,

  // Lifecycle
  ALREADY_INITIALIZED: 409,
  NOT_INITIALIZED: 409,
  REENTRANT_CALL: 409,

  // Amounts
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_ALLOWANCE: 422,
  EXCEEDED_MAX_DEPOSIT: 422,
  EXCEEDED_MAX_MINT: 422,
  EXCEEDED_MAX_WITHDRAW: 422,
  EXCEEDED_MAX_REDEEM: 422,
  ARITHMETIC_OVERFLOW: 422,

  // Pause
  TRANSFERS_PAUSED: 423,
  ASSET_PAUSED: 423,
};

function toDomainError(err: Error): DomainError | undefined {
  if (err instanceof VaultError || err instanceof LedgerError) {
    return { code: err.code, message: err.message, details: err.details };
  }
  if (err instanceof AssetError) {
    return { code: err.code, message: err.message };
  }
  if (err instanceof ApiError) {
    return { code: err.code, message: err.message, details: err.details };
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const domainError = toDomainError(err);
  const status: ErrorStatus =
    domainError !== undefined ? (STATUS_MAP[domainError.code] ?? 500) : 500;

  // Don't leak internal details
  if (domainError === undefined || status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  const envelope = createErrorEnvelope(
    domainError.code,
    domainError.message,
    domainError.details !== undefined ? { ...domainError.details } : undefined,
  );
  return c.json(envelope, status);
}
