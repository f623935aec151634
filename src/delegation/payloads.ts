/**
 * Signed delegation requests
 *
 * Field names, types and order must stay bit-for-bit compatible with the
 * payloads existing signers produce.
 */

import type { Hash32, Identity } from '../core/identity/address.js';
import type { SigningDomain, TypedField, TypedPayload } from '../core/signing/typed-data.js';

export const GRANT_FIELDS = [
  { name: 'principal', type: 'address' },
  { name: 'relayer', type: 'address' },
  { name: 'context', type: 'bytes32' },
  { name: 'scopeMask', type: 'uint256' },
  { name: 'nonce', type: 'uint256' },
  { name: 'expiry', type: 'uint256' },
  { name: 'deadline', type: 'uint256' },
] as const satisfies readonly TypedField[];

export const REVOKE_FIELDS = [
  { name: 'principal', type: 'address' },
  { name: 'relayer', type: 'address' },
  { name: 'context', type: 'bytes32' },
  { name: 'nonce', type: 'uint256' },
  { name: 'deadline', type: 'uint256' },
] as const satisfies readonly TypedField[];

export type GrantMessage = {
  readonly principal: Identity;
  readonly relayer: Identity;
  readonly context: Hash32;
  readonly scopeMask: bigint;
  readonly nonce: bigint;
  readonly expiry: bigint;
  readonly deadline: bigint;
};

export type RevokeMessage = {
  readonly principal: Identity;
  readonly relayer: Identity;
  readonly context: Hash32;
  readonly nonce: bigint;
  readonly deadline: bigint;
};

export function buildGrantPayload(
  domain: SigningDomain,
  message: GrantMessage
): TypedPayload<GrantMessage> {
  return { domain, primaryType: 'Grant', fields: GRANT_FIELDS, message };
}

export function buildRevokePayload(
  domain: SigningDomain,
  message: RevokeMessage
): TypedPayload<RevokeMessage> {
  return { domain, primaryType: 'Revoke', fields: REVOKE_FIELDS, message };
}
