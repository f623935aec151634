/**
 * Repository ownership, source snapshots and their backups
 */

export * from './repository.js';
export * from './snapshot.js';
export * from './backup.js';
