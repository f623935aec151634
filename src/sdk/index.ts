/**
 * Provenance Ledger SDK
 *
 * Wires every registry to one clock, one event store and one ledger, so all
 * of them share a transaction order and an audit trail.
 */

import type { Hash32 } from '../core/identity/address.js';
import type { Clock } from '../core/time/clock.js';
import type { EventStore } from '../core/storage/event-store.js';
import type { PayloadSigner, SignatureVerifier } from '../core/signing/typed-data.js';
import type { LedgerConfig } from '../core/config.js';
import type { Grant, RegisterGrantRequest, RevokeWithSigRequest } from '../delegation/engine.js';
import type { SetAuthorityRequest, SetMemberRequest } from '../workspace/registry.js';
import type { Release } from '../release/lifecycle.js';
import type { SupersessionChain } from '../release/lineage.js';
import { Ledger } from '../core/ledger.js';
import { SystemClock } from '../core/time/clock.js';
import { InMemoryEventStore } from '../core/storage/event-store.js';
import { Ed25519SignatureVerifier } from '../core/signing/ed25519.js';
import { parseLedgerConfig, resolveSigningDomain } from '../core/config.js';
import { DelegationEngine } from '../delegation/engine.js';
import { WorkspaceRegistry } from '../workspace/registry.js';
import { RepositoryRegistry } from '../registry/repository.js';
import { SnapshotRegistry } from '../registry/snapshot.js';
import { BackupRegistry } from '../registry/backup.js';
import { ReleaseStateMachine } from '../release/lifecycle.js';
import { AttestationRegistry } from '../release/attestation.js';
import { latestRelease, supersessionChain } from '../release/lineage.js';

export interface ProvenanceLedger {
  readonly clock: Clock;
  readonly events: EventStore;
  readonly ledger: Ledger;
  readonly verifier: SignatureVerifier;
  readonly delegation: DelegationEngine;
  readonly workspaces: WorkspaceRegistry;
  readonly repositories: RepositoryRegistry;
  readonly snapshots: SnapshotRegistry;
  readonly backups: BackupRegistry;
  readonly releases: ReleaseStateMachine;
  readonly attestations: AttestationRegistry;
  supersessionChain(id: Hash32): SupersessionChain;
  latestRelease(id: Hash32): Release;
}

/**
 * Create a provenance ledger
 *
 * @example
 * ```typescript
 * const provenance = createProvenanceLedger({ clock: new ManualClock() });
 * const owner = Ed25519Signer.generate();
 *
 * await provenance.workspaces.initAuthority(owner.identity, context, owner.identity);
 * await ProvenancePatterns.grant(provenance, owner, {
 *   principal: owner.identity,
 *   relayer,
 *   context,
 *   scopeMask: Capability.RELEASE,
 *   expiry: provenance.clock.now() + 3600,
 *   deadline: provenance.clock.now() + 600,
 * });
 * ```
 */
export function createProvenanceLedger(config: LedgerConfig = {}): ProvenanceLedger {
  const resolved = parseLedgerConfig(config);
  const clock = resolved.clock ?? new SystemClock();
  const events = resolved.eventStore ?? new InMemoryEventStore(clock);
  const verifier = resolved.verifier ?? new Ed25519SignatureVerifier();
  const ledger = new Ledger(clock, events);

  const delegation = new DelegationEngine(
    ledger,
    verifier,
    resolveSigningDomain(resolved.delegationDomain, resolved.chainId)
  );
  const workspaces = new WorkspaceRegistry(
    ledger,
    verifier,
    resolveSigningDomain(resolved.workspaceDomain, resolved.chainId)
  );
  const repositories = new RepositoryRegistry(ledger, delegation, workspaces);
  const snapshots = new SnapshotRegistry(ledger, delegation, repositories);
  const backups = new BackupRegistry(ledger, delegation, repositories, snapshots);
  const releases = new ReleaseStateMachine(ledger, delegation, workspaces, snapshots);
  const attestations = new AttestationRegistry(ledger, delegation, workspaces, releases);

  return {
    clock,
    events,
    ledger,
    verifier,
    delegation,
    workspaces,
    repositories,
    snapshots,
    backups,
    releases,
    attestations,
    supersessionChain: (id) => supersessionChain(releases, id),
    latestRelease: (id) => latestRelease(releases, id),
  };
}

const submissions: WeakMap<Ledger, Promise<void>> = new WeakMap();

/**
 * Run a sign-and-submit step after every earlier one on the same ledger has
 * settled, so the nonce it signs is the one its transaction will consume.
 */
function submitInOrder<T>(provenance: ProvenanceLedger, step: () => Promise<T>): Promise<T> {
  const previous = submissions.get(provenance.ledger) ?? Promise.resolve();
  const next = previous.then(step);
  submissions.set(
    provenance.ledger,
    next.then(
      () => undefined,
      () => undefined
    )
  );
  return next;
}

/**
 * Sign-and-submit helpers for the common relayer flows. The signer stands in
 * for the principal's offline wallet.
 *
 * Concurrent helper calls are submitted one after another. A signature built
 * by hand and submitted directly alongside them can still lose its nonce.
 */
export const ProvenancePatterns = {
  /**
   * Sign a grant with the principal's current nonce and register it
   */
  grant(
    provenance: ProvenanceLedger,
    signer: PayloadSigner,
    request: RegisterGrantRequest
  ): Promise<Grant> {
    return submitInOrder(provenance, () => {
      const signature = signer.sign(provenance.delegation.grantPayload(request));
      return provenance.delegation.registerGrant(request, signature);
    });
  },

  revoke(
    provenance: ProvenanceLedger,
    signer: PayloadSigner,
    request: RevokeWithSigRequest
  ): Promise<void> {
    return submitInOrder(provenance, async () => {
      const signature = signer.sign(provenance.delegation.revokePayload(request));
      await provenance.delegation.revokeWithSig(request, signature);
    });
  },

  /**
   * Add or remove a workspace member; `authority` signs
   */
  setMember(
    provenance: ProvenanceLedger,
    authority: PayloadSigner,
    request: SetMemberRequest
  ): Promise<void> {
    return submitInOrder(provenance, async () => {
      const payload = provenance.workspaces.setMemberPayload(
        request,
        provenance.workspaces.nonceOf(authority.identity)
      );
      await provenance.workspaces.setMemberWithSig(request, authority.sign(payload));
    });
  },

  setAuthority(
    provenance: ProvenanceLedger,
    authority: PayloadSigner,
    request: SetAuthorityRequest
  ): Promise<void> {
    return submitInOrder(provenance, async () => {
      const payload = provenance.workspaces.setAuthorityPayload(
        request,
        provenance.workspaces.nonceOf(authority.identity)
      );
      await provenance.workspaces.setAuthorityWithSig(request, authority.sign(payload));
    });
  },
};
