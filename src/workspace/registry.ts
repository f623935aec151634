/**
 * Workspace Registry
 *
 * A workspace is a context with one authority and a member set. The authority
 * is always a member. Membership changes are signed by the authority and may
 * be submitted by any relayer.
 */

import { z } from 'zod';
import type { Hash32, Identity } from '../core/identity/address.js';
import type { Ledger } from '../core/ledger.js';
import type { SignatureVerifier, SigningDomain, TypedField, TypedPayload } from '../core/signing/typed-data.js';
import { nonZeroHash, nonZeroIdentity } from '../core/identity/address.js';
import { preconditionFailed } from '../core/errors.js';
import { requireDeadline, requireSigner } from '../core/signing/verify.js';
import { TimestampSchema, parseInput } from '../core/validation.js';

/**
 * Membership query the core consumes
 */
export interface WorkspaceMembership {
  isMember(context: Hash32, identity: Identity): boolean;
}

export const SET_AUTHORITY_FIELDS = [
  { name: 'context', type: 'bytes32' },
  { name: 'authority', type: 'address' },
  { name: 'nonce', type: 'uint256' },
  { name: 'deadline', type: 'uint256' },
] as const satisfies readonly TypedField[];

export const SET_MEMBER_FIELDS = [
  { name: 'context', type: 'bytes32' },
  { name: 'member', type: 'address' },
  { name: 'isMember', type: 'bool' },
  { name: 'nonce', type: 'uint256' },
  { name: 'deadline', type: 'uint256' },
] as const satisfies readonly TypedField[];

export type SetAuthorityMessage = {
  readonly context: Hash32;
  readonly authority: Identity;
  readonly nonce: bigint;
  readonly deadline: bigint;
};

export type SetMemberMessage = {
  readonly context: Hash32;
  readonly member: Identity;
  readonly isMember: boolean;
  readonly nonce: bigint;
  readonly deadline: bigint;
};

export const SetAuthorityRequestSchema = z.object({
  context: nonZeroHash('zero context'),
  authority: nonZeroIdentity('zero authority'),
  deadline: TimestampSchema,
});

export const SetMemberRequestSchema = z.object({
  context: nonZeroHash('zero context'),
  member: nonZeroIdentity('zero member'),
  isMember: z.boolean(),
  deadline: TimestampSchema,
});

export type SetAuthorityRequest = z.input<typeof SetAuthorityRequestSchema>;
export type SetMemberRequest = z.input<typeof SetMemberRequestSchema>;

function memberKey(context: string, identity: string): string {
  return `${context.toLowerCase()}|${identity.toLowerCase()}`;
}

export class WorkspaceRegistry implements WorkspaceMembership {
  private authorities: Map<string, Identity> = new Map();
  private members: Set<string> = new Set();
  private nonces: Map<string, bigint> = new Map();

  constructor(
    private readonly ledger: Ledger,
    private readonly verifier: SignatureVerifier,
    readonly domain: SigningDomain
  ) {}

  isMember(context: Hash32, identity: Identity): boolean {
    return this.members.has(memberKey(context, identity));
  }

  authorityOf(context: Hash32): Identity | null {
    return this.authorities.get(context.toLowerCase()) ?? null;
  }

  nonceOf(signer: Identity): bigint {
    return this.nonces.get(signer.toLowerCase()) ?? 0n;
  }

  setAuthorityPayload(
    request: SetAuthorityRequest,
    nonce: bigint
  ): TypedPayload<SetAuthorityMessage> {
    const parsed = parseInput(SetAuthorityRequestSchema, request);
    return {
      domain: this.domain,
      primaryType: 'SetAuthority',
      fields: SET_AUTHORITY_FIELDS,
      message: {
        context: parsed.context,
        authority: parsed.authority,
        nonce,
        deadline: BigInt(parsed.deadline),
      },
    };
  }

  setMemberPayload(request: SetMemberRequest, nonce: bigint): TypedPayload<SetMemberMessage> {
    const parsed = parseInput(SetMemberRequestSchema, request);
    return {
      domain: this.domain,
      primaryType: 'SetMember',
      fields: SET_MEMBER_FIELDS,
      message: {
        context: parsed.context,
        member: parsed.member,
        isMember: parsed.isMember,
        nonce,
        deadline: BigInt(parsed.deadline),
      },
    };
  }

  /**
   * Claim an uninitialized workspace. Anyone may call this once per context.
   */
  initAuthority(caller: Identity, context: Hash32, authority: Identity): Promise<void> {
    return this.ledger.execute('workspace.initAuthority', (tx) => {
      const parsed = parseInput(
        z.object({
          caller: nonZeroIdentity('zero caller'),
          context: nonZeroHash('zero context'),
          authority: nonZeroIdentity('zero authority'),
        }),
        { caller, context, authority }
      );

      if (this.authorities.has(parsed.context)) {
        throw preconditionFailed('authority already set', { context: parsed.context });
      }

      this.authorities.set(parsed.context, parsed.authority);
      this.members.add(memberKey(parsed.context, parsed.authority));
      tx.emit({ type: 'AuthoritySet', payload: { context: parsed.context, authority: parsed.authority } });
      tx.emit({
        type: 'MemberSet',
        payload: { context: parsed.context, member: parsed.authority, isMember: true },
      });
    });
  }

  /**
   * Hand the workspace to a new authority; signed by the current one.
   * The previous authority stays a member.
   */
  setAuthorityWithSig(request: SetAuthorityRequest, signature: string): Promise<void> {
    return this.ledger.execute('workspace.setAuthorityWithSig', (tx) => {
      const parsed = parseInput(SetAuthorityRequestSchema, request);
      const current = this.requireAuthority(parsed.context);
      requireDeadline(parsed.deadline, tx.timestamp);

      const nonce = this.nonceOf(current);
      requireSigner(this.verifier, this.setAuthorityPayload(parsed, nonce), signature, current);

      this.nonces.set(current, nonce + 1n);
      this.authorities.set(parsed.context, parsed.authority);
      this.members.add(memberKey(parsed.context, parsed.authority));
      tx.emit({ type: 'AuthoritySet', payload: { context: parsed.context, authority: parsed.authority } });
      tx.emit({
        type: 'MemberSet',
        payload: { context: parsed.context, member: parsed.authority, isMember: true },
      });
    });
  }

  /**
   * Add or remove a member; signed by the authority
   */
  setMemberWithSig(request: SetMemberRequest, signature: string): Promise<void> {
    return this.ledger.execute('workspace.setMemberWithSig', (tx) => {
      const parsed = parseInput(SetMemberRequestSchema, request);
      const authority = this.requireAuthority(parsed.context);
      requireDeadline(parsed.deadline, tx.timestamp);

      if (!parsed.isMember && parsed.member === authority) {
        throw preconditionFailed('cannot remove authority', { context: parsed.context });
      }

      const nonce = this.nonceOf(authority);
      requireSigner(this.verifier, this.setMemberPayload(parsed, nonce), signature, authority);

      this.nonces.set(authority, nonce + 1n);
      const key = memberKey(parsed.context, parsed.member);
      if (parsed.isMember) {
        this.members.add(key);
      } else {
        this.members.delete(key);
      }
      tx.emit({
        type: 'MemberSet',
        payload: { context: parsed.context, member: parsed.member, isMember: parsed.isMember },
      });
    });
  }

  /**
   * Leave a workspace. The authority cannot leave.
   */
  leave(caller: Identity, context: Hash32): Promise<void> {
    return this.ledger.execute('workspace.leave', (tx) => {
      const parsed = parseInput(
        z.object({ caller: nonZeroIdentity('zero caller'), context: nonZeroHash('zero context') }),
        { caller, context }
      );

      if (this.authorities.get(parsed.context) === parsed.caller) {
        throw preconditionFailed('authority cannot leave', { context: parsed.context });
      }
      const key = memberKey(parsed.context, parsed.caller);
      if (!this.members.has(key)) {
        throw preconditionFailed('not member', { context: parsed.context });
      }

      this.members.delete(key);
      tx.emit({
        type: 'MemberSet',
        payload: { context: parsed.context, member: parsed.caller, isMember: false },
      });
    });
  }

  private requireAuthority(context: Hash32): Identity {
    const authority = this.authorities.get(context);
    if (authority === undefined) {
      throw preconditionFailed('authority not set', { context });
    }
    return authority;
  }
}

export function createWorkspaceRegistry(
  ledger: Ledger,
  verifier: SignatureVerifier,
  domain: SigningDomain
): WorkspaceRegistry {
  return new WorkspaceRegistry(ledger, verifier, domain);
}
