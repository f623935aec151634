/**
 * Repository Registry
 *
 * Records which identity owns a repository inside a workspace context.
 * Claims and transfers need the owner's CLAIM capability when relayed.
 */

import { z } from 'zod';
import type { Hash32, Identity } from '../core/identity/address.js';
import type { Ledger } from '../core/ledger.js';
import type { UnixSeconds } from '../core/time/clock.js';
import type { Authorizer } from '../delegation/guard.js';
import type { WorkspaceMembership } from '../workspace/registry.js';
import { nonZeroHash, nonZeroIdentity } from '../core/identity/address.js';
import { notFound, preconditionFailed } from '../core/errors.js';
import { parseInput } from '../core/validation.js';
import { Capability } from '../delegation/capability.js';
import { requireActingFor } from '../delegation/guard.js';

export interface Repository {
  readonly repoId: Hash32;
  readonly context: Hash32;
  readonly owner: Identity;
  readonly metadata: string;
  readonly claimedAt: UnixSeconds;
}

const ClaimSchema = z.object({
  caller: nonZeroIdentity('zero caller'),
  repoId: nonZeroHash('zero repo'),
  context: nonZeroHash('zero context'),
  metadata: z.string(),
  owner: nonZeroIdentity('zero owner'),
});

const TransferSchema = z.object({
  caller: nonZeroIdentity('zero caller'),
  repoId: nonZeroHash('zero repo'),
  newOwner: nonZeroIdentity('zero owner'),
  context: nonZeroHash('zero context'),
});

export class RepositoryRegistry {
  private repositories: Map<string, Repository> = new Map();

  constructor(
    private readonly ledger: Ledger,
    private readonly authorizer: Authorizer,
    private readonly membership: WorkspaceMembership
  ) {}

  getRepository(repoId: Hash32): Repository | undefined {
    return this.repositories.get(repoId.toLowerCase());
  }

  ownerOf(repoId: Hash32): Identity | null {
    return this.getRepository(repoId)?.owner ?? null;
  }

  reposOf(owner: Identity): readonly Hash32[] {
    const normalized = owner.toLowerCase();
    return [...this.repositories.values()]
      .filter((repo) => repo.owner === normalized)
      .map((repo) => repo.repoId);
  }

  claimRepo(
    caller: Identity,
    repoId: Hash32,
    context: Hash32,
    metadata: string,
    owner: Identity
  ): Promise<Repository> {
    return this.ledger.execute('repository.claimRepo', (tx) => {
      const input = parseInput(ClaimSchema, { caller, repoId, context, metadata, owner });

      requireActingFor(this.authorizer, input.caller, input.owner, Capability.CLAIM, input.context);
      if (!this.membership.isMember(input.context, input.owner)) {
        throw preconditionFailed('owner not member', { context: input.context, owner: input.owner });
      }
      if (this.repositories.has(input.repoId)) {
        throw preconditionFailed('already claimed', { repoId: input.repoId });
      }

      const repository: Repository = {
        repoId: input.repoId,
        context: input.context,
        owner: input.owner,
        metadata: input.metadata,
        claimedAt: tx.timestamp,
      };
      this.repositories.set(repository.repoId, repository);
      tx.emit({
        type: 'RepoClaimed',
        payload: {
          repoId: repository.repoId,
          context: repository.context,
          owner: repository.owner,
          metadata: repository.metadata,
        },
      });
      return repository;
    });
  }

  transferRepo(
    caller: Identity,
    repoId: Hash32,
    newOwner: Identity,
    context: Hash32
  ): Promise<Repository> {
    return this.ledger.execute('repository.transferRepo', (tx) => {
      const input = parseInput(TransferSchema, { caller, repoId, newOwner, context });

      const current = this.repositories.get(input.repoId);
      if (current === undefined) {
        throw notFound('repo not found', { repoId: input.repoId });
      }
      if (current.context !== input.context) {
        throw preconditionFailed('repo wrong context', { repoId: input.repoId });
      }
      requireActingFor(this.authorizer, input.caller, current.owner, Capability.CLAIM, input.context);
      if (current.owner === input.newOwner) {
        throw preconditionFailed('no change', { repoId: input.repoId });
      }
      if (!this.membership.isMember(input.context, input.newOwner)) {
        throw preconditionFailed('owner not member', { owner: input.newOwner });
      }

      const updated: Repository = { ...current, owner: input.newOwner };
      this.repositories.set(updated.repoId, updated);
      tx.emit({
        type: 'RepoTransferred',
        payload: {
          repoId: updated.repoId,
          context: updated.context,
          previousOwner: current.owner,
          newOwner: updated.owner,
        },
      });
      return updated;
    });
  }
}

export function createRepositoryRegistry(
  ledger: Ledger,
  authorizer: Authorizer,
  membership: WorkspaceMembership
): RepositoryRegistry {
  return new RepositoryRegistry(ledger, authorizer, membership);
}
