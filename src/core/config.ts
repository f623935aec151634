/**
 * Ledger configuration
 *
 * Signing domains scope signatures to one engine on one chain. Collaborators
 * (clock, verifier, event store) are injectable so tests and simulations can
 * pin time and swap the signature primitive.
 */

import { z } from 'zod';
import type { Clock } from './time/clock.js';
import type { EventStore } from './storage/event-store.js';
import type { SignatureVerifier, SigningDomain } from './signing/typed-data.js';
import type { Identity } from './identity/address.js';
import { IdentitySchema, labelHash } from './identity/address.js';
import { parseInput } from './validation.js';

function hasMethod(value: unknown, method: string): boolean {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, method) === 'function';
}

const ClockSchema = z.custom<Clock>((value) => hasMethod(value, 'now'), {
  message: 'clock must implement now()',
});

const VerifierSchema = z.custom<SignatureVerifier>((value) => hasMethod(value, 'recover'), {
  message: 'verifier must implement recover()',
});

const EventStoreSchema = z.custom<EventStore>(
  (value) => hasMethod(value, 'append') && hasMethod(value, 'read'),
  { message: 'eventStore must implement append() and read()' }
);

export const DEFAULT_DELEGATION_DOMAIN = { name: 'ProvenanceDelegation', version: '1' } as const;
export const DEFAULT_WORKSPACE_DOMAIN = { name: 'ProvenanceWorkspace', version: '1' } as const;

const DomainConfigSchema = z.object({
  name: z.string().min(1, { message: 'empty domain name' }),
  version: z.string().min(1, { message: 'empty domain version' }),
  verifyingContract: IdentitySchema.optional(),
});

export const LedgerConfigSchema = z.object({
  chainId: z.number().int().positive({ message: 'chainId must be positive' }).default(1),
  delegationDomain: DomainConfigSchema.default(DEFAULT_DELEGATION_DOMAIN),
  workspaceDomain: DomainConfigSchema.default(DEFAULT_WORKSPACE_DOMAIN),
  clock: ClockSchema.optional(),
  verifier: VerifierSchema.optional(),
  eventStore: EventStoreSchema.optional(),
});

export type LedgerConfig = z.input<typeof LedgerConfigSchema>;
export type ResolvedLedgerConfig = z.output<typeof LedgerConfigSchema>;

/**
 * Stand-in verifying address for a domain that names none: the low 20 bytes
 * of the hashed domain name
 */
export function defaultVerifyingContract(name: string): Identity {
  return `0x${labelHash(name).slice(-40)}`;
}

export function parseLedgerConfig(config: LedgerConfig = {}): ResolvedLedgerConfig {
  return parseInput(LedgerConfigSchema, config);
}

export function resolveSigningDomain(
  domain: ResolvedLedgerConfig['delegationDomain'],
  chainId: number
): SigningDomain {
  return {
    name: domain.name,
    version: domain.version,
    chainId,
    verifyingContract: domain.verifyingContract ?? defaultVerifyingContract(domain.name),
  };
}
