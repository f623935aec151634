/**
 * Attestation Registry
 *
 * Append-only list of artifact attestations per release. An artifact digest
 * is attested at most once per release.
 */

import { z } from 'zod';
import type { Hash32, Identity } from '../core/identity/address.js';
import type { Ledger } from '../core/ledger.js';
import type { UnixSeconds } from '../core/time/clock.js';
import type { Authorizer } from '../delegation/guard.js';
import type { WorkspaceMembership } from '../workspace/registry.js';
import type { ReleaseReader } from './lineage.js';
import { nonZeroHash, nonZeroIdentity } from '../core/identity/address.js';
import { notFound, preconditionFailed } from '../core/errors.js';
import { NonEmptyStringSchema, parseInput } from '../core/validation.js';
import { Capability } from '../delegation/capability.js';
import { requireActingFor } from '../delegation/guard.js';

export interface Attestation {
  readonly releaseId: Hash32;
  /** Position in the release's attestation list, from 0 */
  readonly index: number;
  readonly context: Hash32;
  readonly author: Identity;
  readonly artifactDigest: Hash32;
  /** Producer-defined artifact kind (0 = unspecified) */
  readonly artifactType: number;
  readonly attestationCid: string;
  readonly createdAt: UnixSeconds;
}

export const CreateAttestationInputSchema = z.object({
  releaseId: nonZeroHash('zero release'),
  context: nonZeroHash('zero context'),
  artifactDigest: nonZeroHash('zero digest'),
  artifactType: z.number().int({ message: 'invalid artifact type' }).nonnegative({
    message: 'invalid artifact type',
  }),
  attestationCid: NonEmptyStringSchema('empty cid'),
  author: nonZeroIdentity('zero author'),
});

export type CreateAttestationInput = z.input<typeof CreateAttestationInputSchema>;

function digestKey(releaseId: string, artifactDigest: string): string {
  return `${releaseId.toLowerCase()}|${artifactDigest.toLowerCase()}`;
}

export class AttestationRegistry {
  private attestations: Map<string, Attestation[]> = new Map();
  private byDigest: Map<string, Attestation> = new Map();

  constructor(
    private readonly ledger: Ledger,
    private readonly authorizer: Authorizer,
    private readonly membership: WorkspaceMembership,
    private readonly releases: ReleaseReader
  ) {}

  getAttestationsCount(releaseId: Hash32): number {
    return this.attestations.get(releaseId.toLowerCase())?.length ?? 0;
  }

  getAttestation(releaseId: Hash32, index: number): Attestation {
    const attestation = this.attestations.get(releaseId.toLowerCase())?.[index];
    if (attestation === undefined) {
      throw notFound('invalid index', { releaseId, index });
    }
    return attestation;
  }

  getAttestationByDigest(releaseId: Hash32, artifactDigest: Hash32): Attestation {
    const attestation = this.byDigest.get(digestKey(releaseId, artifactDigest));
    if (attestation === undefined) {
      throw notFound('not found', { releaseId, artifactDigest });
    }
    return attestation;
  }

  /**
   * Attest an artifact built from a live release. The caller is the author
   * or holds the author's ATTEST grant in the release context.
   */
  createAttestation(caller: Identity, input: CreateAttestationInput): Promise<Attestation> {
    return this.ledger.execute('attestation.createAttestation', (tx) => {
      const parsedCaller = parseInput(nonZeroIdentity('zero caller'), caller);
      const request = parseInput(CreateAttestationInputSchema, input);

      requireActingFor(
        this.authorizer,
        parsedCaller,
        request.author,
        Capability.ATTEST,
        request.context
      );

      const release = this.releases.findRelease(request.releaseId);
      if (release === undefined) {
        throw preconditionFailed('release not found', { releaseId: request.releaseId });
      }
      if (release.context !== request.context) {
        throw preconditionFailed('release wrong context', { releaseId: request.releaseId });
      }
      if (release.revoked) {
        throw preconditionFailed('release revoked', { releaseId: request.releaseId });
      }
      if (!this.membership.isMember(request.context, request.author)) {
        throw preconditionFailed('author not member', { author: request.author });
      }
      if (this.byDigest.has(digestKey(request.releaseId, request.artifactDigest))) {
        throw preconditionFailed('duplicate attestation', {
          artifactDigest: request.artifactDigest,
        });
      }

      const list = this.attestations.get(request.releaseId) ?? [];
      const attestation: Attestation = { ...request, index: list.length, createdAt: tx.timestamp };

      this.attestations.set(request.releaseId, [...list, attestation]);
      this.byDigest.set(digestKey(attestation.releaseId, attestation.artifactDigest), attestation);
      tx.emit({
        type: 'AttestationCreated',
        payload: {
          releaseId: attestation.releaseId,
          index: attestation.index,
          context: attestation.context,
          author: attestation.author,
          artifactDigest: attestation.artifactDigest,
          artifactType: attestation.artifactType,
          attestationCid: attestation.attestationCid,
        },
      });
      return attestation;
    });
  }
}

export function createAttestationRegistry(
  ledger: Ledger,
  authorizer: Authorizer,
  membership: WorkspaceMembership,
  releases: ReleaseReader
): AttestationRegistry {
  return new AttestationRegistry(ledger, authorizer, membership, releases);
}
