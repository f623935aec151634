/**
 * Backup Registry
 *
 * One backup record per (repoId, merkleRoot). Re-anchoring for the same
 * snapshot replaces the earlier record.
 */

import { z } from 'zod';
import type { Hash32, Identity } from '../core/identity/address.js';
import type { Ledger } from '../core/ledger.js';
import type { UnixSeconds } from '../core/time/clock.js';
import type { Authorizer } from '../delegation/guard.js';
import type { RepositoryRegistry } from './repository.js';
import type { SnapshotLookup } from './snapshot.js';
import { Hash32Schema, nonZeroHash, nonZeroIdentity } from '../core/identity/address.js';
import { notFound, preconditionFailed } from '../core/errors.js';
import { parseInput } from '../core/validation.js';
import { Capability } from '../delegation/capability.js';
import { requireActingFor } from '../delegation/guard.js';

export interface Backup {
  readonly repoId: Hash32;
  readonly merkleRoot: Hash32;
  readonly context: Hash32;
  readonly author: Identity;
  readonly archiveSha256: Hash32;
  /** Zero when no metadata file was archived */
  readonly metadataSha256: Hash32;
  /** Empty when the archive is not pinned */
  readonly backupCid: string;
  readonly anchoredAt: UnixSeconds;
}

export const AnchorBackupInputSchema = z.object({
  repoId: nonZeroHash('zero repo'),
  context: nonZeroHash('zero context'),
  merkleRoot: nonZeroHash('zero root'),
  archiveSha256: nonZeroHash('zero archive'),
  metadataSha256: Hash32Schema,
  backupCid: z.string(),
  author: nonZeroIdentity('zero author'),
});

export type AnchorBackupInput = z.input<typeof AnchorBackupInputSchema>;

function backupKey(repoId: string, merkleRoot: string): string {
  return `${repoId.toLowerCase()}|${merkleRoot.toLowerCase()}`;
}

export class BackupRegistry {
  private backups: Map<string, Backup> = new Map();

  constructor(
    private readonly ledger: Ledger,
    private readonly authorizer: Authorizer,
    private readonly repositories: RepositoryRegistry,
    private readonly snapshots: SnapshotLookup
  ) {}

  hasBackup(repoId: Hash32, merkleRoot: Hash32): boolean {
    return this.backups.has(backupKey(repoId, merkleRoot));
  }

  getBackup(repoId: Hash32, merkleRoot: Hash32): Backup {
    const backup = this.backups.get(backupKey(repoId, merkleRoot));
    if (backup === undefined) {
      throw notFound('backup not found', { repoId, merkleRoot });
    }
    return backup;
  }

  /**
   * Record the archive of an existing snapshot. The caller is the repository
   * owner or holds the owner's BACKUP grant in the repository context.
   */
  anchorBackup(caller: Identity, input: AnchorBackupInput): Promise<Backup> {
    return this.ledger.execute('backup.anchorBackup', (tx) => {
      const parsedCaller = parseInput(nonZeroIdentity('zero caller'), caller);
      const request = parseInput(AnchorBackupInputSchema, input);

      requireActingFor(
        this.authorizer,
        parsedCaller,
        request.author,
        Capability.BACKUP,
        request.context
      );

      const repository = this.repositories.getRepository(request.repoId);
      if (repository === undefined) {
        throw preconditionFailed('repo not claimed', { repoId: request.repoId });
      }
      if (repository.context !== request.context) {
        throw preconditionFailed('repo wrong context', { repoId: request.repoId });
      }
      if (repository.owner !== request.author) {
        throw preconditionFailed('author not owner', { repoId: request.repoId });
      }
      if (!this.snapshots.exists(request.repoId, request.merkleRoot)) {
        throw preconditionFailed('snapshot not found', { merkleRoot: request.merkleRoot });
      }

      const backup: Backup = { ...request, anchoredAt: tx.timestamp };
      this.backups.set(backupKey(backup.repoId, backup.merkleRoot), backup);
      tx.emit({
        type: 'BackupAnchored',
        payload: {
          repoId: backup.repoId,
          merkleRoot: backup.merkleRoot,
          archiveSha256: backup.archiveSha256,
          context: backup.context,
          author: backup.author,
          metadataSha256: backup.metadataSha256,
          backupCid: backup.backupCid,
        },
      });
      return backup;
    });
  }
}

export function createBackupRegistry(
  ledger: Ledger,
  authorizer: Authorizer,
  repositories: RepositoryRegistry,
  snapshots: SnapshotLookup
): BackupRegistry {
  return new BackupRegistry(ledger, authorizer, repositories, snapshots);
}
