/**
 * Time model for the Provenance Ledger
 *
 * Ledger time is whole unix seconds. Grant expiries and request deadlines are
 * absolute values on this scale, and `0` is reserved for "never set".
 */

/**
 * Seconds since the unix epoch
 */
export type UnixSeconds = number;

/**
 * Source of the current ledger time
 */
export interface Clock {
  now(): UnixSeconds;
}

/**
 * Wall-clock time, truncated to whole seconds
 */
export class SystemClock implements Clock {
  now(): UnixSeconds {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * Clock that only moves when told to
 */
export class ManualClock implements Clock {
  private current: UnixSeconds;

  constructor(start: UnixSeconds = 1_700_000_000) {
    this.current = start;
  }

  now(): UnixSeconds {
    return this.current;
  }

  set(timestamp: UnixSeconds): void {
    if (!Number.isSafeInteger(timestamp) || timestamp < 0) {
      throw new Error(`Invalid timestamp: ${timestamp}`);
    }
    this.current = timestamp;
  }

  advance(seconds: number): UnixSeconds {
    this.set(this.current + seconds);
    return this.current;
  }
}

/**
 * ISO 8601 rendering of a ledger timestamp
 */
export function toIsoString(timestamp: UnixSeconds): string {
  return new Date(timestamp * 1000).toISOString();
}
