/**
 * Snapshot Registry
 *
 * Append-only list of source snapshots per repository. A merkle root is
 * recorded at most once per repository, which is what lets a release refer
 * to a snapshot by (repoId, merkleRoot).
 */

import { z } from 'zod';
import type { Hash32, Identity } from '../core/identity/address.js';
import type { Ledger } from '../core/ledger.js';
import type { UnixSeconds } from '../core/time/clock.js';
import type { Authorizer } from '../delegation/guard.js';
import type { RepositoryRegistry } from './repository.js';
import { Hash32Schema, nonZeroHash, nonZeroIdentity } from '../core/identity/address.js';
import { notFound, preconditionFailed } from '../core/errors.js';
import { parseInput } from '../core/validation.js';
import { Capability } from '../delegation/capability.js';
import { requireActingFor } from '../delegation/guard.js';

export interface Snapshot {
  readonly repoId: Hash32;
  /** Position in the repository's snapshot list, from 0 */
  readonly index: number;
  readonly context: Hash32;
  readonly author: Identity;
  readonly commitHash: Hash32;
  readonly merkleRoot: Hash32;
  readonly manifestCid: string;
  readonly createdAt: UnixSeconds;
}

/**
 * Existence query the release state machine consumes
 */
export interface SnapshotLookup {
  exists(repoId: Hash32, merkleRoot: Hash32): boolean;
}

export const CreateSnapshotInputSchema = z.object({
  repoId: nonZeroHash('zero repo'),
  context: nonZeroHash('zero context'),
  commitHash: Hash32Schema,
  merkleRoot: nonZeroHash('zero root'),
  manifestCid: z.string().min(1, { message: 'empty manifest' }),
  author: nonZeroIdentity('zero author'),
});

export type CreateSnapshotInput = z.input<typeof CreateSnapshotInputSchema>;

function rootKey(repoId: string, merkleRoot: string): string {
  return `${repoId.toLowerCase()}|${merkleRoot.toLowerCase()}`;
}

export class SnapshotRegistry implements SnapshotLookup {
  private snapshots: Map<string, Snapshot[]> = new Map();
  private byRoot: Map<string, Snapshot> = new Map();

  constructor(
    private readonly ledger: Ledger,
    private readonly authorizer: Authorizer,
    private readonly repositories: RepositoryRegistry
  ) {}

  exists(repoId: Hash32, merkleRoot: Hash32): boolean {
    return this.byRoot.has(rootKey(repoId, merkleRoot));
  }

  getSnapshotsCount(repoId: Hash32): number {
    return this.snapshots.get(repoId.toLowerCase())?.length ?? 0;
  }

  getSnapshot(repoId: Hash32, index: number): Snapshot {
    const snapshot = this.snapshots.get(repoId.toLowerCase())?.[index];
    if (snapshot === undefined) {
      throw notFound('invalid index', { repoId, index });
    }
    return snapshot;
  }

  getSnapshotByRoot(repoId: Hash32, merkleRoot: Hash32): Snapshot {
    const snapshot = this.byRoot.get(rootKey(repoId, merkleRoot));
    if (snapshot === undefined) {
      throw notFound('not found', { repoId, merkleRoot });
    }
    return snapshot;
  }

  createSnapshot(caller: Identity, input: CreateSnapshotInput): Promise<Snapshot> {
    return this.ledger.execute('snapshot.createSnapshot', (tx) => {
      const parsedCaller = parseInput(nonZeroIdentity('zero caller'), caller);
      const request = parseInput(CreateSnapshotInputSchema, input);

      requireActingFor(
        this.authorizer,
        parsedCaller,
        request.author,
        Capability.SNAPSHOT,
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
      if (this.byRoot.has(rootKey(request.repoId, request.merkleRoot))) {
        throw preconditionFailed('duplicate root', { merkleRoot: request.merkleRoot });
      }

      const list = this.snapshots.get(request.repoId) ?? [];
      const snapshot: Snapshot = { ...request, index: list.length, createdAt: tx.timestamp };

      this.snapshots.set(request.repoId, [...list, snapshot]);
      this.byRoot.set(rootKey(snapshot.repoId, snapshot.merkleRoot), snapshot);
      tx.emit({
        type: 'SnapshotCreated',
        payload: {
          repoId: snapshot.repoId,
          index: snapshot.index,
          context: snapshot.context,
          author: snapshot.author,
          commitHash: snapshot.commitHash,
          merkleRoot: snapshot.merkleRoot,
          manifestCid: snapshot.manifestCid,
        },
      });
      return snapshot;
    });
  }
}

export function createSnapshotRegistry(
  ledger: Ledger,
  authorizer: Authorizer,
  repositories: RepositoryRegistry
): SnapshotRegistry {
  return new SnapshotRegistry(ledger, authorizer, repositories);
}
