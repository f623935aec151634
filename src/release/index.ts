/**
 * Release governance
 *
 * Provides:
 * - Release lifecycle: PENDING → ACCEPTED | REJECTED
 * - Author-side revocation and supersession
 * - Supersession lineage queries
 * - Artifact attestations against a release
 */

export * from './lifecycle.js';
export * from './lineage.js';
export * from './attestation.js';
