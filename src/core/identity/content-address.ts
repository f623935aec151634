/**
 * Canonical hashing
 *
 * Event ids, transaction ids and signing digests are SHA-256 over a canonical
 * encoding, so two parties that agree on a value agree on its digest. 256-bit
 * quantities such as nonces and scope masks are encoded as bigints.
 */

import { createHash } from 'crypto';

/**
 * `sha256:<hex>` identifier of a canonicalized value
 */
export type ContentAddress = `sha256:${string}`;

/**
 * Canonicalize a value for hashing.
 * Object keys are sorted; bigints are written as bare decimal digits so that
 * 256-bit quantities survive without loss.
 */
export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }

  if (typeof value === 'string') {
    return JSON.stringify(value);
  }

  if (typeof value === 'bigint') {
    return value.toString(10);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }

  if (Array.isArray(value)) {
    return '[' + value.map(canonicalize).join(',') + ']';
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const pairs = entries.map(([key, item]) => `${JSON.stringify(key)}:${canonicalize(item)}`);
    return '{' + pairs.join(',') + '}';
  }

  return String(value);
}

/**
 * Raw SHA-256 digest of a value's canonical form
 */
export function computeDigest(content: unknown): Buffer {
  return createHash('sha256').update(canonicalize(content), 'utf8').digest();
}

export function computeContentAddress(content: unknown): ContentAddress {
  return `sha256:${computeDigest(content).toString('hex')}`;
}
