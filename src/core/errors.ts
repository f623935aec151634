/**
 * Ledger error taxonomy
 *
 * Every rejection carries a stable code and a short stable reason so that
 * relayer software can decide whether to re-sign, re-submit or abort.
 */

import type { ZodError } from 'zod';

export const ErrorCode = {
  /** Zero identity or context, empty strings, malformed payloads */
  INVALID_INPUT: 'INVALID_INPUT',
  /** Grant expiry is not in the future */
  BAD_EXPIRY: 'BAD_EXPIRY',
  /** The request deadline has passed */
  SIGNATURE_EXPIRED: 'SIGNATURE_EXPIRED',
  /** The recovered signer is not the expected signer */
  SIGNATURE_INVALID: 'SIGNATURE_INVALID',
  /** Wrong status for the transition, duplicate id, missing reference */
  PRECONDITION_FAILED: 'PRECONDITION_FAILED',
  /** The caller lacks standing */
  UNAUTHORIZED: 'UNAUTHORIZED',
  /** A read over a record that does not exist */
  NOT_FOUND: 'NOT_FOUND',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export class LedgerError extends Error {
  /** Stable error tag */
  readonly code: ErrorCodeValue;
  /** Stable short reason, e.g. "bad signer" */
  readonly reason: string;
  /** Additional error context */
  readonly details: Record<string, unknown>;

  constructor(code: ErrorCodeValue, reason: string, details: Record<string, unknown> = {}) {
    super(`${code}: ${reason}`);
    this.name = 'LedgerError';
    this.code = code;
    this.reason = reason;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LedgerError);
    }
  }
}

export function isLedgerError(error: unknown, code?: ErrorCodeValue): error is LedgerError {
  return error instanceof LedgerError && (code === undefined || error.code === code);
}

export function invalidInput(reason: string, details?: Record<string, unknown>): LedgerError {
  return new LedgerError(ErrorCode.INVALID_INPUT, reason, details);
}

export function preconditionFailed(
  reason: string,
  details?: Record<string, unknown>
): LedgerError {
  return new LedgerError(ErrorCode.PRECONDITION_FAILED, reason, details);
}

export function unauthorized(reason: string, details?: Record<string, unknown>): LedgerError {
  return new LedgerError(ErrorCode.UNAUTHORIZED, reason, details);
}

export function notFound(reason: string, details?: Record<string, unknown>): LedgerError {
  return new LedgerError(ErrorCode.NOT_FOUND, reason, details);
}

/**
 * Convert a failed schema parse into an INVALID_INPUT error.
 * The reason is the message of the first issue ("Zero identity", ...).
 */
export function fromZodError(error: ZodError): LedgerError {
  const first = error.issues[0];
  const reason = first?.message ?? 'invalid input';
  return invalidInput(reason, {
    issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  });
}

/**
 * Normalize unknown thrown values into Error instances
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(typeof error === 'string' && error.length > 0 ? error : 'Unknown error');
}
