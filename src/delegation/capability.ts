/**
 * Capability bits
 *
 * A grant's scope mask is an unsigned 256-bit set; bit i enables capability i.
 * The bit assignment is shared with existing deployments and must not change.
 */

export const Capability = {
  /** Claim or transfer a repository */
  CLAIM: 1n << 0n,
  /** Record a source snapshot */
  SNAPSHOT: 1n << 1n,
  /** Record an attestation */
  ATTEST: 1n << 2n,
  /** Record a backup */
  BACKUP: 1n << 3n,
  /** Anchor, govern, revoke or supersede a release */
  RELEASE: 1n << 4n,
} as const;

export type CapabilityName = keyof typeof Capability;

export const SCOPE_MASK_BITS = 256n;

/**
 * Reserved "all capabilities" sentinel: every bit of the 256-bit mask set
 */
export const ALL_SCOPES: bigint = (1n << SCOPE_MASK_BITS) - 1n;

export function isValidScopeMask(mask: bigint): boolean {
  return mask >= 0n && mask <= ALL_SCOPES;
}

/**
 * A capability is a single defined bit
 */
export function isCapability(value: bigint): boolean {
  return Object.values(Capability).includes(value);
}

/**
 * Whether a scope mask covers a capability.
 *
 * Only the exact sentinel is a wildcard. A mask that merely has every bit
 * known today set does not cover bits defined later.
 */
export function coversCapability(scopeMask: bigint, capability: bigint): boolean {
  if (scopeMask === ALL_SCOPES) {
    return true;
  }
  return (scopeMask & capability) !== 0n;
}

/**
 * Build a scope mask from capability names
 */
export function scopeMaskOf(...names: readonly CapabilityName[]): bigint {
  return names.reduce((mask, name) => mask | Capability[name], 0n);
}

/**
 * Names of the defined capabilities a mask covers
 */
export function describeScopeMask(scopeMask: bigint): CapabilityName[] | 'ALL' {
  if (scopeMask === ALL_SCOPES) {
    return 'ALL';
  }
  const names: CapabilityName[] = ['CLAIM', 'SNAPSHOT', 'ATTEST', 'BACKUP', 'RELEASE'];
  return names.filter((name) => (scopeMask & Capability[name]) !== 0n);
}
