/**
 * Delegation Engine
 *
 * Owns the capability-grant ledger and the per-principal nonces. A principal
 * signs a grant offline; anyone may submit it. Grants are keyed by
 * (principal, relayer, context) and never inherit across contexts.
 */

import { z } from 'zod';
import type { Hash32, Identity } from '../core/identity/address.js';
import type { Ledger } from '../core/ledger.js';
import type { UnixSeconds } from '../core/time/clock.js';
import type { SignatureVerifier, SigningDomain, TypedPayload } from '../core/signing/typed-data.js';
import type { GrantMessage, RevokeMessage } from './payloads.js';
import type { Authorizer } from './guard.js';
import { ZERO_HASH, nonZeroHash, nonZeroIdentity } from '../core/identity/address.js';
import { ErrorCode, LedgerError } from '../core/errors.js';
import { TimestampSchema, parseInput } from '../core/validation.js';
import { requireDeadline, requireSigner } from '../core/signing/verify.js';
import { coversCapability, isValidScopeMask } from './capability.js';
import { buildGrantPayload, buildRevokePayload } from './payloads.js';

/**
 * Stored capability grant. A zero expiry means no live grant.
 */
export interface Grant {
  readonly principal: Identity;
  readonly relayer: Identity;
  readonly context: Hash32;
  readonly scopeMask: bigint;
  readonly expiry: UnixSeconds;
}

export const RegisterGrantRequestSchema = z.object({
  principal: nonZeroIdentity('zero principal'),
  relayer: nonZeroIdentity('zero relayer'),
  context: nonZeroHash('zero context'),
  scopeMask: z.bigint().refine(isValidScopeMask, { message: 'scope mask out of range' }),
  expiry: TimestampSchema,
  deadline: TimestampSchema,
});

export const RevokeWithSigRequestSchema = z.object({
  principal: nonZeroIdentity('zero principal'),
  relayer: nonZeroIdentity('zero relayer'),
  context: nonZeroHash('zero context'),
  deadline: TimestampSchema,
});

const RevokeTargetSchema = z.object({
  caller: nonZeroIdentity('zero caller'),
  relayer: nonZeroIdentity('zero relayer'),
  context: nonZeroHash('zero context'),
});

export type RegisterGrantRequest = z.input<typeof RegisterGrantRequestSchema>;
export type RevokeWithSigRequest = z.input<typeof RevokeWithSigRequestSchema>;

type ParsedGrantRequest = z.output<typeof RegisterGrantRequestSchema>;
type ParsedRevokeRequest = z.output<typeof RevokeWithSigRequestSchema>;

function grantKey(principal: string, relayer: string, context: string): string {
  return `${principal.toLowerCase()}|${relayer.toLowerCase()}|${context.toLowerCase()}`;
}

export class DelegationEngine implements Authorizer {
  private grants: Map<string, Grant> = new Map();
  private nonces: Map<string, bigint> = new Map();

  constructor(
    private readonly ledger: Ledger,
    private readonly verifier: SignatureVerifier,
    readonly domain: SigningDomain
  ) {}

  /**
   * Whether `relayer` currently holds `capability` from `principal` in `context`.
   * Pure query; absent, revoked and expired grants all answer false.
   */
  isAuthorized(principal: Identity, relayer: Identity, capability: bigint, context: Hash32): boolean {
    if (context.toLowerCase() === ZERO_HASH) {
      return false;
    }

    const grant = this.grants.get(grantKey(principal, relayer, context));
    if (!grant || grant.expiry === 0 || this.ledger.now() >= grant.expiry) {
      return false;
    }

    return coversCapability(grant.scopeMask, capability);
  }

  /**
   * Next nonce a signed request from `principal` must carry
   */
  nonceOf(principal: Identity): bigint {
    return this.nonces.get(principal.toLowerCase()) ?? 0n;
  }

  /**
   * Stored grant record; the zeroed record when none was ever registered
   */
  getGrant(principal: Identity, relayer: Identity, context: Hash32): Grant {
    return (
      this.grants.get(grantKey(principal, relayer, context)) ?? {
        principal,
        relayer,
        context,
        scopeMask: 0n,
        expiry: 0,
      }
    );
  }

  /**
   * Payload the principal must sign to register this grant
   */
  grantPayload(request: RegisterGrantRequest, nonce?: bigint): TypedPayload<GrantMessage> {
    const parsed = parseInput(RegisterGrantRequestSchema, request);
    return this.buildGrantPayload(parsed, nonce ?? this.nonceOf(parsed.principal));
  }

  /**
   * Payload the principal must sign to revoke through a relayer
   */
  revokePayload(request: RevokeWithSigRequest, nonce?: bigint): TypedPayload<RevokeMessage> {
    const parsed = parseInput(RevokeWithSigRequestSchema, request);
    return this.buildRevokePayload(parsed, nonce ?? this.nonceOf(parsed.principal));
  }

  /**
   * Register (or overwrite) a grant from a principal's signature
   */
  registerGrant(request: RegisterGrantRequest, signature: string): Promise<Grant> {
    return this.ledger.execute('delegation.registerGrant', (tx) => {
      const parsed = parseInput(RegisterGrantRequestSchema, request);
      const now = tx.timestamp;

      requireDeadline(parsed.deadline, now);
      if (parsed.expiry <= now) {
        throw new LedgerError(ErrorCode.BAD_EXPIRY, 'bad expiry', { expiry: parsed.expiry, now });
      }

      const nonce = this.nonceOf(parsed.principal);
      requireSigner(this.verifier, this.buildGrantPayload(parsed, nonce), signature, parsed.principal);

      const grant: Grant = {
        principal: parsed.principal,
        relayer: parsed.relayer,
        context: parsed.context,
        scopeMask: parsed.scopeMask,
        expiry: parsed.expiry,
      };

      this.nonces.set(parsed.principal, nonce + 1n);
      this.grants.set(grantKey(grant.principal, grant.relayer, grant.context), grant);
      tx.emit({
        type: 'Delegated',
        payload: {
          principal: grant.principal,
          relayer: grant.relayer,
          context: grant.context,
          scopeMask: grant.scopeMask,
          expiry: grant.expiry,
        },
      });

      return grant;
    });
  }

  /**
   * Revoke a grant directly; the caller is the principal.
   * Idempotent: revoking an absent grant succeeds.
   */
  revoke(caller: Identity, relayer: Identity, context: Hash32): Promise<void> {
    return this.ledger.execute('delegation.revoke', (tx) => {
      const parsed = parseInput(RevokeTargetSchema, { caller, relayer, context });
      this.clearGrant(parsed.caller, parsed.relayer, parsed.context);
      tx.emit({
        type: 'Revoked',
        payload: { principal: parsed.caller, relayer: parsed.relayer, context: parsed.context },
      });
    });
  }

  /**
   * Revoke a grant from a principal's signature, submitted by anyone.
   * Consumes the same nonce as registration.
   */
  revokeWithSig(request: RevokeWithSigRequest, signature: string): Promise<void> {
    return this.ledger.execute('delegation.revokeWithSig', (tx) => {
      const parsed = parseInput(RevokeWithSigRequestSchema, request);

      requireDeadline(parsed.deadline, tx.timestamp);

      const nonce = this.nonceOf(parsed.principal);
      requireSigner(this.verifier, this.buildRevokePayload(parsed, nonce), signature, parsed.principal);

      this.nonces.set(parsed.principal, nonce + 1n);
      this.clearGrant(parsed.principal, parsed.relayer, parsed.context);
      tx.emit({
        type: 'Revoked',
        payload: { principal: parsed.principal, relayer: parsed.relayer, context: parsed.context },
      });
    });
  }

  private clearGrant(principal: Identity, relayer: Identity, context: Hash32): void {
    this.grants.set(grantKey(principal, relayer, context), {
      principal,
      relayer,
      context,
      scopeMask: 0n,
      expiry: 0,
    });
  }

  private buildGrantPayload(request: ParsedGrantRequest, nonce: bigint): TypedPayload<GrantMessage> {
    return buildGrantPayload(this.domain, {
      principal: request.principal,
      relayer: request.relayer,
      context: request.context,
      scopeMask: request.scopeMask,
      nonce,
      expiry: BigInt(request.expiry),
      deadline: BigInt(request.deadline),
    });
  }

  private buildRevokePayload(
    request: ParsedRevokeRequest,
    nonce: bigint
  ): TypedPayload<RevokeMessage> {
    return buildRevokePayload(this.domain, {
      principal: request.principal,
      relayer: request.relayer,
      context: request.context,
      nonce,
      deadline: BigInt(request.deadline),
    });
  }
}

export function createDelegationEngine(
  ledger: Ledger,
  verifier: SignatureVerifier,
  domain: SigningDomain
): DelegationEngine {
  return new DelegationEngine(ledger, verifier, domain);
}
