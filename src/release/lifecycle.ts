/**
 * Release State Machine
 *
 * Governance status: PENDING → ACCEPTED | REJECTED, terminal and irreversible.
 * Revocation is an orthogonal author-side flag, settable once from any status.
 * A revoked release may name its replacement exactly once.
 *
 * Every mutation runs as one ledger transaction: all preconditions are checked
 * before the record changes, so a release either transitions fully or not at all.
 */

import { z } from 'zod';
import type { Hash32, Identity } from '../core/identity/address.js';
import type { Ledger } from '../core/ledger.js';
import type { UnixSeconds } from '../core/time/clock.js';
import type { Authorizer } from '../delegation/guard.js';
import type { SnapshotLookup } from '../registry/snapshot.js';
import type { WorkspaceMembership } from '../workspace/registry.js';
import {
  IdentitySchema,
  ZERO_IDENTITY,
  isZeroIdentity,
  nonZeroHash,
  nonZeroIdentity,
} from '../core/identity/address.js';
import { notFound, preconditionFailed, unauthorized } from '../core/errors.js';
import { NonEmptyStringSchema, parseInput } from '../core/validation.js';
import { Capability } from '../delegation/capability.js';
import { canActFor, requireActingFor } from '../delegation/guard.js';

/**
 * Governance status of a release
 */
export const ReleaseStatus = {
  /** Anchored, waiting for governance */
  PENDING: 'PENDING',
  /** Accepted by governance (terminal) */
  ACCEPTED: 'ACCEPTED',
  /** Rejected by governance (terminal) */
  REJECTED: 'REJECTED',
} as const;

export type ReleaseStatusValue = (typeof ReleaseStatus)[keyof typeof ReleaseStatus];

export type GovernanceVerdict = Exclude<ReleaseStatusValue, 'PENDING'>;

export const VALID_TRANSITIONS: Record<ReleaseStatusValue, readonly ReleaseStatusValue[]> = {
  PENDING: ['ACCEPTED', 'REJECTED'],
  ACCEPTED: [],
  REJECTED: [],
};

/**
 * Snapshot a release was anchored against
 */
export interface SnapshotRef {
  readonly repoId: Hash32;
  readonly merkleRoot: Hash32;
}

export interface Release {
  readonly id: Hash32;
  readonly projectId: Hash32;
  readonly context: Hash32;
  /** Content identifier of the release manifest */
  readonly manifestRef: string;
  readonly name: string;
  readonly author: Identity;
  readonly governanceAuthority: Identity;
  readonly createdAt: UnixSeconds;
  readonly status: ReleaseStatusValue;
  /** 0 until governance acts */
  readonly statusTimestamp: UnixSeconds;
  /** Identity that set the status; null while pending */
  readonly statusAuthor: Identity | null;
  readonly revoked: boolean;
  readonly revokedAt: UnixSeconds | null;
  readonly supersededBy: Hash32 | null;
  readonly snapshotRefs: readonly SnapshotRef[];
}

const SnapshotRefSchema = z.object({
  repoId: nonZeroHash('zero repo'),
  merkleRoot: nonZeroHash('zero root'),
});

export const AnchorReleaseInputSchema = z.object({
  projectId: nonZeroHash('zero project'),
  id: nonZeroHash('zero release'),
  context: nonZeroHash('zero context'),
  manifestRef: NonEmptyStringSchema('empty manifest'),
  name: NonEmptyStringSchema('empty name'),
  author: nonZeroIdentity('zero author'),
  governanceAuthority: nonZeroIdentity('zero governance'),
  snapshotRefs: z.array(SnapshotRefSchema),
});

export type AnchorReleaseInput = z.input<typeof AnchorReleaseInputSchema>;

const GovernanceVerdictSchema = z.enum(['ACCEPTED', 'REJECTED'], {
  errorMap: () => ({ message: 'invalid status' }),
});

const CallerSchema = nonZeroIdentity('zero caller');
const ReleaseIdSchema = nonZeroHash('zero release');

/**
 * Release registry and governance state machine
 */
export class ReleaseStateMachine {
  private releases: Map<string, Release> = new Map();
  private projectReleases: Map<string, Hash32[]> = new Map();
  private daoExecutors: Map<string, Identity> = new Map();

  constructor(
    private readonly ledger: Ledger,
    private readonly authorizer: Authorizer,
    private readonly membership: WorkspaceMembership,
    private readonly snapshots: SnapshotLookup
  ) {}

  /**
   * Anchor a new release in PENDING. The caller is the author or holds the
   * author's RELEASE grant in the release context.
   */
  anchorRelease(caller: Identity, input: AnchorReleaseInput): Promise<Release> {
    return this.ledger.execute('release.anchorRelease', (tx) => {
      const parsedCaller = parseInput(CallerSchema, caller);
      const request = parseInput(AnchorReleaseInputSchema, input);

      requireActingFor(
        this.authorizer,
        parsedCaller,
        request.author,
        Capability.RELEASE,
        request.context
      );
      if (this.releases.has(request.id)) {
        throw preconditionFailed('release exists', { id: request.id });
      }
      if (request.snapshotRefs.length === 0) {
        throw preconditionFailed('no snapshots', { id: request.id });
      }
      if (!this.membership.isMember(request.context, request.author)) {
        throw preconditionFailed('author not member', { author: request.author });
      }
      if (!this.membership.isMember(request.context, request.governanceAuthority)) {
        throw preconditionFailed('governance not member', {
          governanceAuthority: request.governanceAuthority,
        });
      }
      for (const ref of request.snapshotRefs) {
        if (!this.snapshots.exists(ref.repoId, ref.merkleRoot)) {
          throw preconditionFailed('snapshot not found', { ...ref });
        }
      }

      const release: Release = {
        id: request.id,
        projectId: request.projectId,
        context: request.context,
        manifestRef: request.manifestRef,
        name: request.name,
        author: request.author,
        governanceAuthority: request.governanceAuthority,
        createdAt: tx.timestamp,
        status: ReleaseStatus.PENDING,
        statusTimestamp: 0,
        statusAuthor: null,
        revoked: false,
        revokedAt: null,
        supersededBy: null,
        snapshotRefs: request.snapshotRefs,
      };

      this.releases.set(release.id, release);
      this.projectReleases.set(release.projectId, [
        ...(this.projectReleases.get(release.projectId) ?? []),
        release.id,
      ]);
      tx.emit({
        type: 'ReleaseAnchored',
        payload: {
          projectId: release.projectId,
          releaseId: release.id,
          context: release.context,
          author: release.author,
          governanceAuthority: release.governanceAuthority,
          manifestRef: release.manifestRef,
          name: release.name,
        },
      });
      return release;
    });
  }

  /**
   * Record the governance verdict on a pending, unrevoked release
   */
  setGovernanceStatus(caller: Identity, id: Hash32, status: GovernanceVerdict): Promise<Release> {
    return this.ledger.execute('release.setGovernanceStatus', (tx) => {
      const parsedCaller = parseInput(CallerSchema, caller);
      const verdict = parseInput(GovernanceVerdictSchema, status);
      const release = this.requireRelease(parseInput(ReleaseIdSchema, id));

      if (!this.isGovernance(parsedCaller, release)) {
        throw unauthorized('not governance', { caller: parsedCaller, id: release.id });
      }
      if (release.revoked) {
        throw preconditionFailed('release revoked', { id: release.id });
      }
      this.validateTransition(release.status, verdict);

      const updated: Release = {
        ...release,
        status: verdict,
        statusTimestamp: tx.timestamp,
        statusAuthor: parsedCaller,
      };
      this.releases.set(updated.id, updated);
      tx.emit({
        type: 'GovernanceStatusChanged',
        payload: { releaseId: updated.id, status: verdict, statusAuthor: parsedCaller },
      });
      return updated;
    });
  }

  accept(caller: Identity, id: Hash32): Promise<Release> {
    return this.setGovernanceStatus(caller, id, ReleaseStatus.ACCEPTED);
  }

  reject(caller: Identity, id: Hash32): Promise<Release> {
    return this.setGovernanceStatus(caller, id, ReleaseStatus.REJECTED);
  }

  /**
   * Author-side recall. Allowed from any governance status.
   */
  revokeRelease(caller: Identity, id: Hash32, author: Identity): Promise<Release> {
    return this.ledger.execute('release.revokeRelease', (tx) => {
      const parsedCaller = parseInput(CallerSchema, caller);
      const parsedAuthor = parseInput(nonZeroIdentity('zero author'), author);
      const release = this.requireRelease(parseInput(ReleaseIdSchema, id));

      this.requireAuthorStanding(parsedCaller, parsedAuthor, release);
      if (release.revoked) {
        throw preconditionFailed('already revoked', { id: release.id });
      }

      const updated: Release = { ...release, revoked: true, revokedAt: tx.timestamp };
      this.releases.set(updated.id, updated);
      tx.emit({
        type: 'ReleaseRevoked',
        payload: { projectId: updated.projectId, releaseId: updated.id, author: parsedAuthor },
      });
      return updated;
    });
  }

  /**
   * Point a revoked release at its replacement in the same project
   */
  supersedeRelease(
    caller: Identity,
    oldId: Hash32,
    newId: Hash32,
    author: Identity
  ): Promise<Release> {
    return this.ledger.execute('release.supersedeRelease', (tx) => {
      const parsedCaller = parseInput(CallerSchema, caller);
      const parsedAuthor = parseInput(nonZeroIdentity('zero author'), author);
      const previous = this.requireRelease(parseInput(ReleaseIdSchema, oldId));
      const replacement = this.requireRelease(parseInput(ReleaseIdSchema, newId));

      this.requireAuthorStanding(parsedCaller, parsedAuthor, previous);
      if (previous.id === replacement.id) {
        throw preconditionFailed('self supersede', { id: previous.id });
      }
      if (!previous.revoked) {
        throw preconditionFailed('old release must be revoked', { id: previous.id });
      }
      if (previous.supersededBy !== null) {
        throw preconditionFailed('already superseded', {
          id: previous.id,
          supersededBy: previous.supersededBy,
        });
      }
      if (previous.projectId !== replacement.projectId) {
        throw preconditionFailed('project mismatch', {
          oldProject: previous.projectId,
          newProject: replacement.projectId,
        });
      }

      const updated: Release = { ...previous, supersededBy: replacement.id };
      this.releases.set(updated.id, updated);
      tx.emit({
        type: 'ReleaseSuperseded',
        payload: {
          projectId: updated.projectId,
          releaseId: updated.id,
          supersededBy: replacement.id,
          author: parsedAuthor,
        },
      });
      return updated;
    });
  }

  /**
   * Configure the DAO executor of a context. The zero identity clears it.
   */
  setDaoExecutor(
    caller: Identity,
    context: Hash32,
    author: Identity,
    executor: Identity
  ): Promise<void> {
    return this.ledger.execute('release.setDaoExecutor', (tx) => {
      const parsed = parseInput(
        z.object({
          caller: CallerSchema,
          context: nonZeroHash('zero context'),
          author: nonZeroIdentity('zero author'),
          executor: IdentitySchema,
        }),
        { caller, context, author, executor }
      );

      if (!this.membership.isMember(parsed.context, parsed.author)) {
        throw preconditionFailed('author not member', { author: parsed.author });
      }
      requireActingFor(
        this.authorizer,
        parsed.caller,
        parsed.author,
        Capability.RELEASE,
        parsed.context
      );

      if (isZeroIdentity(parsed.executor)) {
        this.daoExecutors.delete(parsed.context);
      } else {
        this.daoExecutors.set(parsed.context, parsed.executor);
      }
      tx.emit({
        type: 'DaoExecutorSet',
        payload: { context: parsed.context, executor: parsed.executor },
      });
    });
  }

  daoExecutorOf(context: Hash32): Identity {
    return this.daoExecutors.get(context.toLowerCase()) ?? ZERO_IDENTITY;
  }

  getReleaseById(id: Hash32): Release {
    const release = this.releases.get(id.toLowerCase());
    if (release === undefined) {
      throw notFound('not found', { id });
    }
    return release;
  }

  getReleaseByIndex(projectId: Hash32, index: number): Release {
    const id = this.projectReleases.get(projectId.toLowerCase())?.[index];
    if (id === undefined) {
      throw notFound('invalid index', { projectId, index });
    }
    return this.getReleaseById(id);
  }

  getReleasesCount(projectId: Hash32): number {
    return this.projectReleases.get(projectId.toLowerCase())?.length ?? 0;
  }

  getGovernanceStatus(id: Hash32): ReleaseStatusValue {
    const release = this.releases.get(id.toLowerCase());
    if (release === undefined) {
      throw notFound('release not found', { id });
    }
    return release.status;
  }

  /**
   * Lookup without throwing
   */
  findRelease(id: Hash32): Release | undefined {
    return this.releases.get(id.toLowerCase());
  }

  private isGovernance(caller: Identity, release: Release): boolean {
    const executor = this.daoExecutors.get(release.context);
    if (executor !== undefined && executor === caller) {
      return true;
    }
    return canActFor(
      this.authorizer,
      caller,
      release.governanceAuthority,
      Capability.RELEASE,
      release.context
    );
  }

  private requireAuthorStanding(caller: Identity, author: Identity, release: Release): void {
    requireActingFor(this.authorizer, caller, author, Capability.RELEASE, release.context);
    if (release.author !== author) {
      throw unauthorized('not author', { id: release.id, author });
    }
  }

  private requireRelease(id: Hash32): Release {
    const release = this.releases.get(id);
    if (release === undefined) {
      throw preconditionFailed('release not found', { id });
    }
    return release;
  }

  private validateTransition(from: ReleaseStatusValue, to: ReleaseStatusValue): void {
    if (!VALID_TRANSITIONS[from].includes(to)) {
      throw preconditionFailed('not in pending status', { from, to });
    }
  }
}

export function createReleaseStateMachine(
  ledger: Ledger,
  authorizer: Authorizer,
  membership: WorkspaceMembership,
  snapshots: SnapshotLookup
): ReleaseStateMachine {
  return new ReleaseStateMachine(ledger, authorizer, membership, snapshots);
}

/**
 * Whether governance can no longer change the status
 */
export function isTerminalStatus(status: ReleaseStatusValue): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
