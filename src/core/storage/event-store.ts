/**
 * Event-Sourced Append-Only Storage for the Provenance Ledger
 *
 * Every committed state change emits one or more immutable facts. The event
 * store provides:
 * - Append-only writes (no updates or deletes)
 * - Ordered event streams
 * - Correlation of the facts emitted by one ledger transaction
 */

import type { ContentAddress } from '../identity/content-address.js';
import type { Hash32, Identity } from '../identity/address.js';
import type { Clock, UnixSeconds } from '../time/clock.js';
import { SystemClock } from '../time/clock.js';
import { computeContentAddress } from '../identity/content-address.js';

/**
 * Payload of every fact the ledger emits, keyed by event type
 */
export interface LedgerEventPayloads {
  Delegated: {
    readonly principal: Identity;
    readonly relayer: Identity;
    readonly context: Hash32;
    readonly scopeMask: bigint;
    readonly expiry: UnixSeconds;
  };
  Revoked: {
    readonly principal: Identity;
    readonly relayer: Identity;
    readonly context: Hash32;
  };
  AuthoritySet: {
    readonly context: Hash32;
    readonly authority: Identity;
  };
  MemberSet: {
    readonly context: Hash32;
    readonly member: Identity;
    readonly isMember: boolean;
  };
  RepoClaimed: {
    readonly repoId: Hash32;
    readonly context: Hash32;
    readonly owner: Identity;
    readonly metadata: string;
  };
  RepoTransferred: {
    readonly repoId: Hash32;
    readonly context: Hash32;
    readonly previousOwner: Identity;
    readonly newOwner: Identity;
  };
  SnapshotCreated: {
    readonly repoId: Hash32;
    readonly index: number;
    readonly context: Hash32;
    readonly author: Identity;
    readonly commitHash: Hash32;
    readonly merkleRoot: Hash32;
    readonly manifestCid: string;
  };
  BackupAnchored: {
    readonly repoId: Hash32;
    readonly merkleRoot: Hash32;
    readonly archiveSha256: Hash32;
    readonly context: Hash32;
    readonly author: Identity;
    readonly metadataSha256: Hash32;
    readonly backupCid: string;
  };
  ReleaseAnchored: {
    readonly projectId: Hash32;
    readonly releaseId: Hash32;
    readonly context: Hash32;
    readonly author: Identity;
    readonly governanceAuthority: Identity;
    readonly manifestRef: string;
    readonly name: string;
  };
  GovernanceStatusChanged: {
    readonly releaseId: Hash32;
    readonly status: 'ACCEPTED' | 'REJECTED';
    readonly statusAuthor: Identity;
  };
  ReleaseRevoked: {
    readonly projectId: Hash32;
    readonly releaseId: Hash32;
    readonly author: Identity;
  };
  ReleaseSuperseded: {
    readonly projectId: Hash32;
    readonly releaseId: Hash32;
    readonly supersededBy: Hash32;
    readonly author: Identity;
  };
  DaoExecutorSet: {
    readonly context: Hash32;
    readonly executor: Identity;
  };
  AttestationCreated: {
    readonly releaseId: Hash32;
    readonly index: number;
    readonly context: Hash32;
    readonly author: Identity;
    readonly artifactDigest: Hash32;
    readonly artifactType: number;
    readonly attestationCid: string;
  };
}

export type LedgerEventType = keyof LedgerEventPayloads;

/**
 * Stored fact. All events are immutable and content-addressed.
 */
export type StoredEvent = {
  [K in LedgerEventType]: {
    /** Content-addressed unique identifier */
    readonly id: ContentAddress;
    readonly type: K;
    readonly payload: LedgerEventPayloads[K];
    /** Ledger time of the transaction that emitted the fact */
    readonly timestamp: UnixSeconds;
    /** Position in the event stream, starting at 1 */
    readonly sequence: number;
    /** Ledger transaction that emitted the fact */
    readonly correlationId?: ContentAddress;
  };
}[LedgerEventType];

export type StoredEventOf<K extends LedgerEventType> = Extract<StoredEvent, { type: K }>;

/**
 * Input for appending an event
 */
export type AppendEventInput = {
  [K in LedgerEventType]: {
    readonly type: K;
    readonly payload: LedgerEventPayloads[K];
    readonly timestamp?: UnixSeconds;
    readonly correlationId?: ContentAddress;
  };
}[LedgerEventType];

/**
 * Query options for reading events
 */
export interface EventQueryOptions {
  /** Start from this sequence number (inclusive) */
  readonly fromSequence?: number;
  /** End at this sequence number (exclusive) */
  readonly toSequence?: number;
  /** Filter by event types */
  readonly types?: readonly LedgerEventType[];
  /** Maximum number of events to return */
  readonly limit?: number;
  /** Filter by correlation ID */
  readonly correlationId?: ContentAddress;
}

export type EventSubscriber = (event: StoredEvent) => void | Promise<void>;

/**
 * Append-only event storage contract
 */
export interface EventStore {
  /**
   * Append a new event; returns it with its assigned id and sequence
   */
  append(input: AppendEventInput): Promise<StoredEvent>;

  read(options?: EventQueryOptions): Promise<readonly StoredEvent[]>;

  getById(id: ContentAddress): Promise<StoredEvent | null>;

  /**
   * Sequence number of the latest event (0 when empty)
   */
  getSequence(): Promise<number>;

  subscribe(
    callback: EventSubscriber,
    options?: { types?: readonly LedgerEventType[] }
  ): () => void;
}

/**
 * Narrow a list of events to one type
 */
export function eventsOfType<K extends LedgerEventType>(
  events: readonly StoredEvent[],
  type: K
): StoredEventOf<K>[] {
  return events.filter((event): event is StoredEventOf<K> => event.type === type);
}

/**
 * In-memory implementation of EventStore
 */
export class InMemoryEventStore implements EventStore {
  private events: StoredEvent[] = [];
  private sequence = 0;
  private subscribers: Array<{
    callback: EventSubscriber;
    types?: readonly LedgerEventType[];
  }> = [];

  constructor(private readonly clock: Clock = new SystemClock()) {}

  async append(input: AppendEventInput): Promise<StoredEvent> {
    this.sequence += 1;
    const timestamp = input.timestamp ?? this.clock.now();

    const id = computeContentAddress({
      type: input.type,
      payload: input.payload,
      timestamp,
      sequence: this.sequence,
      correlationId: input.correlationId,
    });

    const event: StoredEvent = {
      ...input,
      id,
      timestamp,
      sequence: this.sequence,
    };

    this.events.push(event);
    await this.notifySubscribers(event);

    return event;
  }

  async read(options: EventQueryOptions = {}): Promise<readonly StoredEvent[]> {
    const { fromSequence, toSequence, types, correlationId, limit } = options;

    let result = this.events.filter(
      (e) =>
        (fromSequence === undefined || e.sequence >= fromSequence) &&
        (toSequence === undefined || e.sequence < toSequence) &&
        (types === undefined || types.length === 0 || types.includes(e.type)) &&
        (correlationId === undefined || e.correlationId === correlationId)
    );

    if (limit !== undefined) {
      result = result.slice(0, limit);
    }

    return result;
  }

  async getById(id: ContentAddress): Promise<StoredEvent | null> {
    return this.events.find((e) => e.id === id) ?? null;
  }

  async getSequence(): Promise<number> {
    return this.sequence;
  }

  subscribe(
    callback: EventSubscriber,
    options?: { types?: readonly LedgerEventType[] }
  ): () => void {
    const subscriber: { callback: EventSubscriber; types?: readonly LedgerEventType[] } =
      options?.types !== undefined ? { callback, types: options.types } : { callback };
    this.subscribers.push(subscriber);

    return (): void => {
      const index = this.subscribers.indexOf(subscriber);
      if (index > -1) {
        this.subscribers.splice(index, 1);
      }
    };
  }

  /**
   * Every matching subscriber is called even when an earlier one fails; the
   * first failure is rethrown once all have run
   */
  private async notifySubscribers(event: StoredEvent): Promise<void> {
    const failures: unknown[] = [];
    for (const subscriber of this.subscribers) {
      if (
        subscriber.types === undefined ||
        subscriber.types.length === 0 ||
        subscriber.types.includes(event.type)
      ) {
        try {
          await subscriber.callback(event);
        } catch (error) {
          failures.push(error);
        }
      }
    }
    if (failures.length > 0) {
      throw failures[0];
    }
  }

  /**
   * All events (for debugging/testing)
   */
  getAllEvents(): readonly StoredEvent[] {
    return [...this.events];
  }
}

export function createInMemoryEventStore(clock?: Clock): EventStore {
  return new InMemoryEventStore(clock);
}
