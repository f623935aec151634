/**
 * Typed signing payloads
 *
 * A signed request is a typed message under a signing domain. The type
 * declares the field order, and the order is part of what gets signed, so a
 * payload must be rebuilt exactly as the signer built it.
 */

import type { Hash32, Identity } from '../identity/address.js';
import { computeDigest } from '../identity/content-address.js';

export type TypedFieldType = 'address' | 'bytes32' | 'uint256' | 'bool';

export interface TypedField {
  readonly name: string;
  readonly type: TypedFieldType;
}

export type TypedValue = Identity | Hash32 | bigint | boolean;

export type TypedMessage = Record<string, TypedValue>;

/**
 * Scopes a signature to one engine instance on one chain
 */
export interface SigningDomain {
  readonly name: string;
  readonly version: string;
  readonly chainId: number;
  readonly verifyingContract: Identity;
}

export interface TypedPayload<M extends TypedMessage = TypedMessage> {
  readonly domain: SigningDomain;
  readonly primaryType: string;
  readonly fields: readonly TypedField[];
  readonly message: M;
}

/**
 * Type string, e.g. `Revoke(address principal,address relayer,bytes32 context,uint256 nonce,uint256 deadline)`
 */
export function encodeType(primaryType: string, fields: readonly TypedField[]): string {
  return `${primaryType}(${fields.map((field) => `${field.type} ${field.name}`).join(',')})`;
}

/**
 * Digest a signer signs and a verifier checks
 */
export function hashTypedPayload(payload: TypedPayload): Buffer {
  const { domain, primaryType, fields, message } = payload;
  return computeDigest({
    domain: [domain.name, domain.version, domain.chainId, domain.verifyingContract],
    type: encodeType(primaryType, fields),
    values: fields.map((field) => message[field.name] ?? null),
  });
}

/**
 * Recovers the identity that signed a payload.
 * Returns null when the signature is malformed or does not verify.
 */
export interface SignatureVerifier {
  recover(payload: TypedPayload, signature: string): Identity | null;
}

/**
 * Produces signatures a SignatureVerifier can recover
 */
export interface PayloadSigner {
  readonly identity: Identity;
  sign(payload: TypedPayload): string;
}
