/**
 * Acting-identity authorization
 *
 * Every store that mutates on behalf of a principal applies the same rule:
 * the principal may always act directly; anyone else needs a live grant from
 * the principal covering the capability in the exact context.
 */

import type { Hash32, Identity } from '../core/identity/address.js';
import { unauthorized } from '../core/errors.js';

/**
 * Query interface consumers call before a delegated mutation
 */
export interface Authorizer {
  isAuthorized(principal: Identity, relayer: Identity, capability: bigint, context: Hash32): boolean;
}

export function canActFor(
  authorizer: Authorizer,
  caller: Identity,
  principal: Identity,
  capability: bigint,
  context: Hash32
): boolean {
  if (caller.toLowerCase() === principal.toLowerCase()) {
    return true;
  }
  return authorizer.isAuthorized(principal, caller, capability, context);
}

/**
 * Throws UNAUTHORIZED unless the caller may act for the principal
 */
export function requireActingFor(
  authorizer: Authorizer,
  caller: Identity,
  principal: Identity,
  capability: bigint,
  context: Hash32,
  reason = 'not authorized'
): void {
  if (!canActFor(authorizer, caller, principal, capability, context)) {
    throw unauthorized(reason, { caller, principal, context, capability: capability.toString() });
  }
}
