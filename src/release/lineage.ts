/**
 * Supersession lineage
 *
 * Follows `supersededBy` pointers from a release to its newest replacement.
 * Pointers can form a cycle (r1 → r2, then r2 revoked and pointed back at r1),
 * so the walk stops at the first release it has already visited.
 */

import type { Hash32 } from '../core/identity/address.js';
import type { Release } from './lifecycle.js';
import { notFound } from '../core/errors.js';

/**
 * Read access the lineage walk needs
 */
export interface ReleaseReader {
  findRelease(id: Hash32): Release | undefined;
}

export interface SupersessionChain {
  /** Release ids from the starting release to the newest replacement */
  readonly ids: readonly Hash32[];
  /** Whether the walk stopped on a release already in the chain */
  readonly cyclic: boolean;
}

export function supersessionChain(reader: ReleaseReader, id: Hash32): SupersessionChain {
  const start = reader.findRelease(id);
  if (start === undefined) {
    throw notFound('release not found', { id });
  }

  const ids: Hash32[] = [start.id];
  const visited = new Set<string>(ids);
  let current: Release | undefined = start;

  while (current?.supersededBy) {
    const next: Hash32 = current.supersededBy;
    if (visited.has(next)) {
      return { ids, cyclic: true };
    }
    ids.push(next);
    visited.add(next);
    current = reader.findRelease(next);
  }

  return { ids, cyclic: false };
}

/**
 * Newest release in the chain that starts at `id`
 */
export function latestRelease(reader: ReleaseReader, id: Hash32): Release {
  const { ids } = supersessionChain(reader, id);
  const last = ids[ids.length - 1];
  const release = last === undefined ? undefined : reader.findRelease(last);
  if (release === undefined) {
    throw notFound('release not found', { id: last });
  }
  return release;
}
