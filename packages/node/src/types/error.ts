/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes produced by the HTTP layer itself. Domain errors keep
 * their own codes (TRANSFERS_PAUSED, INSUFFICIENT_BALANCE, ...).
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "MISSING_ACCOUNT"
  | "NOT_FOUND"
  | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

/**
 * Error raised by request parsing. Carries its own HTTP status.
 */
export class ApiError extends Error {
  constructor(
    public readonly code: ApiErrorCode,
    public readonly status: 400 | 404,
    message: string,
    public readonly details?: Record<string, unknown> | undefined,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode | string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}
