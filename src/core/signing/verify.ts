/**
 * Checks shared by every signed request
 */

import type { Identity } from '../identity/address.js';
import type { UnixSeconds } from '../time/clock.js';
import type { SignatureVerifier, TypedPayload } from './typed-data.js';
import { ErrorCode, LedgerError } from '../errors.js';

/**
 * SIGNATURE_EXPIRED once `now` is past the deadline; the deadline second itself is still valid
 */
export function requireDeadline(deadline: UnixSeconds, now: UnixSeconds): void {
  if (now > deadline) {
    throw new LedgerError(ErrorCode.SIGNATURE_EXPIRED, 'sig expired', { deadline, now });
  }
}

/**
 * SIGNATURE_INVALID unless the payload was signed by `expected`
 */
export function requireSigner(
  verifier: SignatureVerifier,
  payload: TypedPayload,
  signature: string,
  expected: Identity
): void {
  const signer = verifier.recover(payload, signature);
  if (signer === null || signer.toLowerCase() !== expected.toLowerCase()) {
    throw new LedgerError(ErrorCode.SIGNATURE_INVALID, 'bad signer', {
      expected,
      recovered: signer,
    });
  }
}
