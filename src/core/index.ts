/**
 * Core Module
 *
 * System foundations: identifiers, errors, time, signing and the
 * transaction ledger with its event store.
 */

export * from './errors.js';
export * from './validation.js';
export * from './config.js';
export * from './identity/address.js';
export * from './identity/content-address.js';
export * from './time/clock.js';
export * from './signing/typed-data.js';
export * from './signing/verify.js';
export * from './signing/ed25519.js';
export * from './storage/event-store.js';
export * from './ledger.js';
