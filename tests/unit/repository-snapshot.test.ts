import { describe, it, expect, beforeEach } from '@jest/globals';
import type { Hash32 } from '../../src/core/identity/address.js';
import type { ManualClock } from '../../src/core/time/clock.js';
import type { CreateSnapshotInput } from '../../src/registry/snapshot.js';
import type { ProvenanceLedger } from '../../src/sdk/index.js';
import { labelHash } from '../../src/core/identity/address.js';
import { Ed25519Signer } from '../../src/core/signing/ed25519.js';
import { eventsOfType } from '../../src/core/storage/event-store.js';
import { Capability } from '../../src/delegation/capability.js';
import { ProvenancePatterns } from '../../src/sdk/index.js';
import { START_TIME, createTestLedger, testIdentity } from '../fixtures/ledger.js';

describe('Repository and Snapshot Registries', () => {
  let clock: ManualClock;
  let provenance: ProvenanceLedger;
  let owner: Ed25519Signer;

  const context = labelHash('workspace-alpha');
  const repoId = labelHash('repo-core');
  const relayer = testIdentity('relayer');
  const teammate = testIdentity('teammate');

  beforeEach(async () => {
    ({ clock, provenance } = createTestLedger());
    owner = Ed25519Signer.generate();
    await provenance.workspaces.initAuthority(owner.identity, context, owner.identity);
    await ProvenancePatterns.setMember(provenance, owner, {
      context,
      member: teammate,
      isMember: true,
      deadline: clock.now() + 60,
    });
  });

  async function delegate(scopeMask: bigint): Promise<void> {
    await ProvenancePatterns.grant(provenance, owner, {
      principal: owner.identity,
      relayer,
      context,
      scopeMask,
      expiry: clock.now() + 3600,
      deadline: clock.now() + 60,
    });
  }

  function snapshotInput(merkleRoot: Hash32, overrides: Partial<CreateSnapshotInput> = {}): CreateSnapshotInput {
    return {
      repoId,
      context,
      commitHash: labelHash(`commit-${merkleRoot}`),
      merkleRoot,
      manifestCid: 'bafy-manifest',
      author: owner.identity,
      ...overrides,
    };
  }

  describe('claimRepo', () => {
    it('should record the owner and emit RepoClaimed', async () => {
      const repository = await provenance.repositories.claimRepo(
        owner.identity,
        repoId,
        context,
        'core service',
        owner.identity
      );

      expect(repository).toEqual({
        repoId,
        context,
        owner: owner.identity,
        metadata: 'core service',
        claimedAt: START_TIME,
      });
      expect(provenance.repositories.ownerOf(repoId)).toBe(owner.identity);
      expect(provenance.repositories.reposOf(owner.identity)).toEqual([repoId]);
      expect(eventsOfType(await provenance.events.read(), 'RepoClaimed')).toHaveLength(1);
    });

    it('should claim a repository only once', async () => {
      await provenance.repositories.claimRepo(owner.identity, repoId, context, '', owner.identity);

      await expect(
        provenance.repositories.claimRepo(teammate, repoId, context, '', teammate)
      ).rejects.toMatchObject({ code: 'PRECONDITION_FAILED', reason: 'already claimed' });
    });

    it('should require the owner to be a member', async () => {
      const outsider = testIdentity('outsider');

      await expect(
        provenance.repositories.claimRepo(outsider, repoId, context, '', outsider)
      ).rejects.toMatchObject({ code: 'PRECONDITION_FAILED', reason: 'owner not member' });
    });

    it('should reject a relayer without a grant', async () => {
      await expect(
        provenance.repositories.claimRepo(relayer, repoId, context, '', owner.identity)
      ).rejects.toMatchObject({ code: 'UNAUTHORIZED', reason: 'not authorized' });
    });

    it('should accept a relayer holding CLAIM', async () => {
      await delegate(Capability.CLAIM);

      const repository = await provenance.repositories.claimRepo(
        relayer,
        repoId,
        context,
        '',
        owner.identity
      );
      expect(repository.owner).toBe(owner.identity);
    });
  });

  describe('transferRepo', () => {
    beforeEach(async () => {
      await provenance.repositories.claimRepo(owner.identity, repoId, context, '', owner.identity);
    });

    it('should move ownership to another member', async () => {
      const updated = await provenance.repositories.transferRepo(
        owner.identity,
        repoId,
        teammate,
        context
      );

      expect(updated.owner).toBe(teammate);
      const transferred = eventsOfType(await provenance.events.read(), 'RepoTransferred');
      expect(transferred[0]?.payload).toEqual({
        repoId,
        context,
        previousOwner: owner.identity,
        newOwner: teammate,
      });
    });

    it('should reject a transfer to the current owner', async () => {
      await expect(
        provenance.repositories.transferRepo(owner.identity, repoId, owner.identity, context)
      ).rejects.toMatchObject({ code: 'PRECONDITION_FAILED', reason: 'no change' });
    });

    it('should reject the wrong context', async () => {
      await expect(
        provenance.repositories.transferRepo(owner.identity, repoId, teammate, labelHash('other'))
      ).rejects.toMatchObject({ code: 'PRECONDITION_FAILED', reason: 'repo wrong context' });
    });

    it('should report an unknown repository', async () => {
      await expect(
        provenance.repositories.transferRepo(owner.identity, labelHash('ghost'), teammate, context)
      ).rejects.toMatchObject({ code: 'NOT_FOUND' });
    });

    it('should reject a caller who is not the owner', async () => {
      await expect(
        provenance.repositories.transferRepo(teammate, repoId, teammate, context)
      ).rejects.toMatchObject({ code: 'UNAUTHORIZED' });
    });
  });

  describe('createSnapshot', () => {
    const root1 = labelHash('root-1');
    const root2 = labelHash('root-2');

    beforeEach(async () => {
      await provenance.repositories.claimRepo(owner.identity, repoId, context, '', owner.identity);
    });

    it('should append snapshots and index them by root', async () => {
      await provenance.snapshots.createSnapshot(owner.identity, snapshotInput(root1));
      clock.advance(10);
      const second = await provenance.snapshots.createSnapshot(owner.identity, snapshotInput(root2));

      expect(second.index).toBe(1);
      expect(second.createdAt).toBe(START_TIME + 10);
      expect(provenance.snapshots.getSnapshotsCount(repoId)).toBe(2);
      expect(provenance.snapshots.getSnapshot(repoId, 0).merkleRoot).toBe(root1);
      expect(provenance.snapshots.getSnapshotByRoot(repoId, root2)).toEqual(second);
      expect(provenance.snapshots.exists(repoId, root1)).toBe(true);
      expect(provenance.snapshots.exists(repoId, labelHash('root-3'))).toBe(false);
    });

    it('should reject a duplicate root', async () => {
      await provenance.snapshots.createSnapshot(owner.identity, snapshotInput(root1));

      await expect(
        provenance.snapshots.createSnapshot(owner.identity, snapshotInput(root1))
      ).rejects.toMatchObject({ code: 'PRECONDITION_FAILED', reason: 'duplicate root' });
    });

    it('should reject a snapshot filed under another context', async () => {
      await expect(
        provenance.snapshots.createSnapshot(
          owner.identity,
          snapshotInput(root1, { context: labelHash('other') })
        )
      ).rejects.toMatchObject({ code: 'PRECONDITION_FAILED', reason: 'repo wrong context' });
    });

    it('should require SNAPSHOT, not CLAIM, from a relayer', async () => {
      await delegate(Capability.CLAIM);
      await expect(
        provenance.snapshots.createSnapshot(relayer, snapshotInput(root1))
      ).rejects.toMatchObject({ code: 'UNAUTHORIZED' });

      await delegate(Capability.SNAPSHOT);
      const snapshot = await provenance.snapshots.createSnapshot(relayer, snapshotInput(root1));
      expect(snapshot.author).toBe(owner.identity);
    });

    it('should reject an empty manifest', async () => {
      await expect(
        provenance.snapshots.createSnapshot(owner.identity, snapshotInput(root1, { manifestCid: '' }))
      ).rejects.toMatchObject({ code: 'INVALID_INPUT', reason: 'empty manifest' });
    });

    it('should report missing snapshots', () => {
      expect(() => provenance.snapshots.getSnapshot(repoId, 5)).toThrow('NOT_FOUND: invalid index');
      expect(() => provenance.snapshots.getSnapshotByRoot(repoId, root1)).toThrow('NOT_FOUND: not found');
    });
  });
});
