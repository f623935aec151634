/**
 * Unit tests for the Release State Machine
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import type { Hash32, Identity } from '../../src/core/identity/address.js';
import type { ManualClock } from '../../src/core/time/clock.js';
import type { AnchorReleaseInput, Release, ReleaseStateMachine } from '../../src/release/lifecycle.js';
import type { ProvenanceLedger } from '../../src/sdk/index.js';
import { ZERO_IDENTITY, labelHash } from '../../src/core/identity/address.js';
import { Ed25519Signer } from '../../src/core/signing/ed25519.js';
import { eventsOfType } from '../../src/core/storage/event-store.js';
import { Capability } from '../../src/delegation/capability.js';
import {
  ReleaseStatus,
  VALID_TRANSITIONS,
  isTerminalStatus,
} from '../../src/release/lifecycle.js';
import { ProvenancePatterns } from '../../src/sdk/index.js';
import { START_TIME, createTestLedger, testIdentity } from '../fixtures/ledger.js';

describe('Release State Machine', () => {
  let clock: ManualClock;
  let provenance: ProvenanceLedger;
  let releases: ReleaseStateMachine;
  let author: Ed25519Signer;
  let governance: Ed25519Signer;

  const context = labelHash('workspace-alpha');
  const projectId = labelHash('project-alpha');
  const repoId = labelHash('repo-core');
  const root1 = labelHash('root-1');
  const relayer = testIdentity('relayer');
  const executor = testIdentity('dao-executor');
  const outsider = testIdentity('outsider');

  const r1 = labelHash('release-1');
  const r2 = labelHash('release-2');
  const r3 = labelHash('release-3');

  beforeEach(async () => {
    ({ clock, provenance } = createTestLedger());
    releases = provenance.releases;
    author = Ed25519Signer.generate();
    governance = Ed25519Signer.generate();

    await provenance.workspaces.initAuthority(author.identity, context, author.identity);
    await ProvenancePatterns.setMember(provenance, author, {
      context,
      member: governance.identity,
      isMember: true,
      deadline: clock.now() + 60,
    });
    await provenance.repositories.claimRepo(author.identity, repoId, context, '', author.identity);
    await provenance.snapshots.createSnapshot(author.identity, {
      repoId,
      context,
      commitHash: labelHash('commit-1'),
      merkleRoot: root1,
      manifestCid: 'bafy-snapshot',
      author: author.identity,
    });
  });

  function anchorInput(id: Hash32, overrides: Partial<AnchorReleaseInput> = {}): AnchorReleaseInput {
    return {
      projectId,
      id,
      context,
      manifestRef: 'bafy-release',
      name: 'v1.0.0',
      author: author.identity,
      governanceAuthority: governance.identity,
      snapshotRefs: [{ repoId, merkleRoot: root1 }],
      ...overrides,
    };
  }

  function anchor(id: Hash32, overrides: Partial<AnchorReleaseInput> = {}): Promise<Release> {
    return releases.anchorRelease(author.identity, anchorInput(id, overrides));
  }

  async function delegateRelease(principal: Ed25519Signer, to: Identity): Promise<void> {
    await ProvenancePatterns.grant(provenance, principal, {
      principal: principal.identity,
      relayer: to,
      context,
      scopeMask: Capability.RELEASE,
      expiry: clock.now() + 3600,
      deadline: clock.now() + 60,
    });
  }

  describe('State Transitions', () => {
    it('should only leave PENDING', () => {
      expect(VALID_TRANSITIONS.PENDING).toEqual(['ACCEPTED', 'REJECTED']);
      expect(isTerminalStatus(ReleaseStatus.ACCEPTED)).toBe(true);
      expect(isTerminalStatus(ReleaseStatus.REJECTED)).toBe(true);
      expect(isTerminalStatus(ReleaseStatus.PENDING)).toBe(false);
    });
  });

  describe('anchorRelease', () => {
    it('should create a pending release and emit ReleaseAnchored', async () => {
      const release = await anchor(r1);

      expect(release).toEqual({
        id: r1,
        projectId,
        context,
        manifestRef: 'bafy-release',
        name: 'v1.0.0',
        author: author.identity,
        governanceAuthority: governance.identity,
        createdAt: START_TIME,
        status: 'PENDING',
        statusTimestamp: 0,
        statusAuthor: null,
        revoked: false,
        revokedAt: null,
        supersededBy: null,
        snapshotRefs: [{ repoId, merkleRoot: root1 }],
      });

      const anchored = eventsOfType(await provenance.events.read(), 'ReleaseAnchored');
      expect(anchored).toHaveLength(1);
      expect(anchored[0]?.payload).toMatchObject({ projectId, releaseId: r1, name: 'v1.0.0' });
    });

    it('should accept a relayer holding the author RELEASE grant', async () => {
      await delegateRelease(author, relayer);

      const release = await releases.anchorRelease(relayer, anchorInput(r1));
      expect(release.author).toBe(author.identity);
    });

    it('should reject a relayer without a grant', async () => {
      await expect(releases.anchorRelease(relayer, anchorInput(r1))).rejects.toMatchObject({
        code: 'UNAUTHORIZED',
        reason: 'not authorized',
      });
    });

    it('should require the governance authority to be a member', async () => {
      await expect(anchor(r1, { governanceAuthority: outsider })).rejects.toMatchObject({
        code: 'PRECONDITION_FAILED',
        reason: 'governance not member',
      });
    });

    it('should require the author to be a member', async () => {
      await expect(
        releases.anchorRelease(outsider, anchorInput(r1, { author: outsider }))
      ).rejects.toMatchObject({ code: 'PRECONDITION_FAILED', reason: 'author not member' });
    });

    it('should require every snapshot to exist', async () => {
      await expect(
        anchor(r1, {
          snapshotRefs: [
            { repoId, merkleRoot: root1 },
            { repoId, merkleRoot: labelHash('root-missing') },
          ],
        })
      ).rejects.toMatchObject({ code: 'PRECONDITION_FAILED', reason: 'snapshot not found' });
    });

    it('should require at least one snapshot', async () => {
      await expect(anchor(r1, { snapshotRefs: [] })).rejects.toMatchObject({
        code: 'PRECONDITION_FAILED',
        reason: 'no snapshots',
      });
    });

    it('should reject a reused id', async () => {
      await anchor(r1);

      await expect(anchor(r1, { name: 'v1.0.1' })).rejects.toMatchObject({
        code: 'PRECONDITION_FAILED',
        reason: 'release exists',
      });
    });

    it('should reject an empty manifest reference', async () => {
      await expect(anchor(r1, { manifestRef: '' })).rejects.toMatchObject({
        code: 'INVALID_INPUT',
        reason: 'empty manifest',
      });
    });
  });

  describe('setGovernanceStatus', () => {
    beforeEach(async () => {
      await anchor(r1);
    });

    it('should accept once and then refuse any further verdict', async () => {
      clock.advance(30);
      const accepted = await releases.accept(governance.identity, r1);

      expect(accepted.status).toBe('ACCEPTED');
      expect(accepted.statusAuthor).toBe(governance.identity);
      expect(accepted.statusTimestamp).toBe(START_TIME + 30);

      await expect(releases.accept(governance.identity, r1)).rejects.toMatchObject({
        code: 'PRECONDITION_FAILED',
        reason: 'not in pending status',
      });
      await expect(releases.reject(governance.identity, r1)).rejects.toMatchObject({
        code: 'PRECONDITION_FAILED',
        reason: 'not in pending status',
      });
    });

    it('should emit GovernanceStatusChanged', async () => {
      await releases.reject(governance.identity, r1);

      const changed = eventsOfType(await provenance.events.read(), 'GovernanceStatusChanged');
      expect(changed.map((event) => event.payload)).toEqual([
        { releaseId: r1, status: 'REJECTED', statusAuthor: governance.identity },
      ]);
    });

    it('should accept a relayer delegated by the governance authority', async () => {
      await delegateRelease(governance, relayer);

      const accepted = await releases.setGovernanceStatus(relayer, r1, 'ACCEPTED');
      expect(accepted.statusAuthor).toBe(relayer);
    });

    it('should accept the DAO executor configured by a member', async () => {
      await releases.setDaoExecutor(author.identity, context, author.identity, executor);
      expect(releases.daoExecutorOf(context)).toBe(executor);

      const rejected = await releases.reject(executor, r1);
      expect(rejected.status).toBe('REJECTED');
      expect(rejected.statusAuthor).toBe(executor);
    });

    it('should stop accepting a cleared DAO executor', async () => {
      await releases.setDaoExecutor(author.identity, context, author.identity, executor);
      await releases.setDaoExecutor(author.identity, context, author.identity, ZERO_IDENTITY);

      expect(releases.daoExecutorOf(context)).toBe(ZERO_IDENTITY);
      await expect(releases.accept(executor, r1)).rejects.toMatchObject({
        code: 'UNAUTHORIZED',
        reason: 'not governance',
      });
    });

    it('should reject any other caller', async () => {
      await expect(releases.accept(outsider, r1)).rejects.toMatchObject({
        code: 'UNAUTHORIZED',
        reason: 'not governance',
      });
    });

    it('should not let the author govern their own release', async () => {
      await expect(releases.accept(author.identity, r1)).rejects.toMatchObject({
        code: 'UNAUTHORIZED',
      });
    });

    it('should refuse a revoked release that is still pending', async () => {
      await releases.revokeRelease(author.identity, r1, author.identity);

      expect(releases.getGovernanceStatus(r1)).toBe('PENDING');
      await expect(releases.accept(governance.identity, r1)).rejects.toMatchObject({
        code: 'PRECONDITION_FAILED',
        reason: 'release revoked',
      });
    });

    it('should refuse a release that is already accepted', async () => {
      await releases.accept(governance.identity, r1);

      await expect(releases.reject(governance.identity, r1)).rejects.toMatchObject({
        code: 'PRECONDITION_FAILED',
      });
    });

    it('should report an unknown release', async () => {
      await expect(releases.accept(governance.identity, r2)).rejects.toMatchObject({
        code: 'PRECONDITION_FAILED',
        reason: 'release not found',
      });
    });
  });

  describe('setDaoExecutor', () => {
    it('should accept a relayer delegated by the author', async () => {
      await delegateRelease(author, relayer);

      await releases.setDaoExecutor(relayer, context, author.identity, executor);

      const set = eventsOfType(await provenance.events.read(), 'DaoExecutorSet');
      expect(set.map((event) => event.payload)).toEqual([{ context, executor }]);
    });

    it('should require the author to be a member', async () => {
      await expect(
        releases.setDaoExecutor(outsider, context, outsider, executor)
      ).rejects.toMatchObject({ code: 'PRECONDITION_FAILED', reason: 'author not member' });
    });

    it('should reject a relayer without a grant', async () => {
      await expect(
        releases.setDaoExecutor(relayer, context, author.identity, executor)
      ).rejects.toMatchObject({ code: 'UNAUTHORIZED' });
    });
  });

  describe('revokeRelease', () => {
    beforeEach(async () => {
      await anchor(r1);
    });

    it('should revoke after governance accepted', async () => {
      await releases.accept(governance.identity, r1);
      clock.advance(5);

      const revoked = await releases.revokeRelease(author.identity, r1, author.identity);

      expect(revoked.status).toBe('ACCEPTED');
      expect(revoked.revoked).toBe(true);
      expect(revoked.revokedAt).toBe(START_TIME + 5);
    });

    it('should accept a relayer delegated by the author', async () => {
      await delegateRelease(author, relayer);

      await releases.revokeRelease(relayer, r1, author.identity);

      const revoked = eventsOfType(await provenance.events.read(), 'ReleaseRevoked');
      expect(revoked.map((event) => event.payload)).toEqual([
        { projectId, releaseId: r1, author: author.identity },
      ]);
    });

    it('should reject an author that does not match the record', async () => {
      await expect(
        releases.revokeRelease(governance.identity, r1, governance.identity)
      ).rejects.toMatchObject({ code: 'UNAUTHORIZED', reason: 'not author' });
    });

    it('should reject a relayer without a grant', async () => {
      await expect(releases.revokeRelease(relayer, r1, author.identity)).rejects.toMatchObject({
        code: 'UNAUTHORIZED',
        reason: 'not authorized',
      });
    });

    it('should reject a second revocation', async () => {
      await releases.revokeRelease(author.identity, r1, author.identity);

      await expect(
        releases.revokeRelease(author.identity, r1, author.identity)
      ).rejects.toMatchObject({ code: 'PRECONDITION_FAILED', reason: 'already revoked' });
    });
  });

  describe('supersedeRelease', () => {
    beforeEach(async () => {
      await anchor(r1);
      await anchor(r2, { name: 'v1.0.1' });
    });

    it('should point a revoked release at its replacement exactly once', async () => {
      await expect(
        releases.supersedeRelease(author.identity, r1, r2, author.identity)
      ).rejects.toMatchObject({ code: 'PRECONDITION_FAILED', reason: 'old release must be revoked' });

      await releases.revokeRelease(author.identity, r1, author.identity);
      const superseded = await releases.supersedeRelease(author.identity, r1, r2, author.identity);

      expect(superseded.supersededBy).toBe(r2);
      expect(releases.getReleaseById(r1).supersededBy).toBe(r2);

      await anchor(r3, { name: 'v1.0.2' });
      await expect(
        releases.supersedeRelease(author.identity, r1, r3, author.identity)
      ).rejects.toMatchObject({ code: 'PRECONDITION_FAILED', reason: 'already superseded' });
    });

    it('should require both releases to belong to the same project', async () => {
      await anchor(r3, { projectId: labelHash('project-beta') });
      await releases.revokeRelease(author.identity, r1, author.identity);

      await expect(
        releases.supersedeRelease(author.identity, r1, r3, author.identity)
      ).rejects.toMatchObject({ code: 'PRECONDITION_FAILED', reason: 'project mismatch' });
    });

    it('should reject a release superseding itself', async () => {
      await releases.revokeRelease(author.identity, r1, author.identity);

      await expect(
        releases.supersedeRelease(author.identity, r1, r1, author.identity)
      ).rejects.toMatchObject({ code: 'PRECONDITION_FAILED', reason: 'self supersede' });
    });

    it('should emit ReleaseSuperseded', async () => {
      await releases.revokeRelease(author.identity, r1, author.identity);
      await releases.supersedeRelease(author.identity, r1, r2, author.identity);

      const superseded = eventsOfType(await provenance.events.read(), 'ReleaseSuperseded');
      expect(superseded.map((event) => event.payload)).toEqual([
        { projectId, releaseId: r1, supersededBy: r2, author: author.identity },
      ]);
    });
  });

  describe('views', () => {
    it('should list releases per project in anchoring order', async () => {
      await anchor(r1);
      await anchor(r2, { name: 'v1.0.1' });

      expect(releases.getReleasesCount(projectId)).toBe(2);
      expect(releases.getReleaseByIndex(projectId, 1).name).toBe('v1.0.1');
      expect(releases.getReleasesCount(labelHash('project-beta'))).toBe(0);
    });

    it('should report missing records', async () => {
      await anchor(r1);
      const ghost = labelHash('ghost');

      expect(() => releases.getReleaseByIndex(projectId, 10)).toThrow('NOT_FOUND: invalid index');
      expect(() => releases.getReleaseById(ghost)).toThrow('NOT_FOUND: not found');
      expect(() => releases.getGovernanceStatus(ghost)).toThrow('NOT_FOUND: release not found');
    });
  });

  describe('lineage', () => {
    it('should follow supersession to the newest release', async () => {
      await anchor(r1);
      await anchor(r2, { name: 'v1.0.1' });
      await anchor(r3, { name: 'v1.0.2' });
      await releases.revokeRelease(author.identity, r1, author.identity);
      await releases.supersedeRelease(author.identity, r1, r2, author.identity);
      await releases.revokeRelease(author.identity, r2, author.identity);
      await releases.supersedeRelease(author.identity, r2, r3, author.identity);

      expect(provenance.supersessionChain(r1)).toEqual({ ids: [r1, r2, r3], cyclic: false });
      expect(provenance.latestRelease(r1).id).toBe(r3);
      expect(provenance.latestRelease(r3).id).toBe(r3);
    });

    it('should stop at a cycle', async () => {
      await anchor(r1);
      await anchor(r2, { name: 'v1.0.1' });
      await releases.revokeRelease(author.identity, r1, author.identity);
      await releases.supersedeRelease(author.identity, r1, r2, author.identity);
      await releases.revokeRelease(author.identity, r2, author.identity);
      await releases.supersedeRelease(author.identity, r2, r1, author.identity);

      expect(provenance.supersessionChain(r1)).toEqual({ ids: [r1, r2], cyclic: true });
    });
  });
});
