/**
 * Ledger identifiers
 *
 * Identities are 160-bit addresses; contexts, projects, releases, repositories
 * and merkle roots are 256-bit hashes. Both are carried as `0x`-prefixed
 * lowercase hex strings.
 */

import { createHash } from 'crypto';
import { z } from 'zod';

export type Identity = `0x${string}`;
export type Hash32 = `0x${string}`;

export const ZERO_IDENTITY: Identity = `0x${'0'.repeat(40)}`;
export const ZERO_HASH: Hash32 = `0x${'0'.repeat(64)}`;

const IDENTITY_PATTERN = /^0x[0-9a-f]{40}$/;
const HASH32_PATTERN = /^0x[0-9a-f]{64}$/;

function isIdentityString(value: string): value is Identity {
  return IDENTITY_PATTERN.test(value);
}

function isHash32String(value: string): value is Hash32 {
  return HASH32_PATTERN.test(value);
}

/**
 * Accepts any-case hex and yields the lowercase form
 */
export const IdentitySchema = z.string().transform((value, ctx): Identity => {
  const lower = value.toLowerCase();
  if (!isIdentityString(lower)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a 20-byte 0x-prefixed address' });
    return z.NEVER;
  }
  return lower;
});

export const Hash32Schema = z.string().transform((value, ctx): Hash32 => {
  const lower = value.toLowerCase();
  if (!isHash32String(lower)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a 32-byte 0x-prefixed hash' });
    return z.NEVER;
  }
  return lower;
});

/**
 * Identity that must not be the zero address; `reason` becomes the error reason
 */
export function nonZeroIdentity(reason = 'zero identity') {
  return IdentitySchema.refine((value) => value !== ZERO_IDENTITY, { message: reason });
}

/**
 * Hash that must not be the zero hash (contexts, release ids, ...)
 */
export function nonZeroHash(reason = 'zero hash') {
  return Hash32Schema.refine((value) => value !== ZERO_HASH, { message: reason });
}

export function isZeroIdentity(value: Identity): boolean {
  return value === ZERO_IDENTITY;
}

/**
 * Derive a stable 32-byte id from a human label ("project-alpha", "v1.0.0")
 */
export function labelHash(label: string): Hash32 {
  return `0x${createHash('sha256').update(label, 'utf8').digest('hex')}`;
}

/**
 * Derive an identity from public key material: the low 20 bytes of its SHA-256
 */
export function identityFromKey(keyMaterial: Uint8Array): Identity {
  const digest = createHash('sha256').update(keyMaterial).digest('hex');
  return `0x${digest.slice(-40)}`;
}
