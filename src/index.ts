/**
 * Provenance Ledger
 *
 * Capability delegation and release governance over an event-sourced,
 * serialized ledger.
 *
 * @packageDocumentation
 */

// Core module exports
export * from './core/index.js';

// Capability delegation exports
export * from './delegation/index.js';

// Workspace membership exports
export * from './workspace/index.js';

// Repository and snapshot exports
export * from './registry/index.js';

// Release governance exports
export * from './release/index.js';

// SDK exports
export * from './sdk/index.js';

// Version
export const VERSION = '0.1.0';
