/**
 * Capability delegation
 *
 * Principals sign expiring, context-scoped grants that let a relayer act for
 * them. Every registry asks the same `Authorizer` before a relayed mutation.
 */

export * from './capability.js';
export * from './payloads.js';
export * from './guard.js';
export * from './engine.js';
