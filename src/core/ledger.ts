/**
 * Serialized transaction execution
 *
 * Stands in for the host ledger. Every state-changing operation runs as one
 * transaction:
 * - transactions run one at a time, in submission order
 * - "now" is pinned for the whole transaction
 * - facts are buffered and reach the event store only on success
 *
 * A transaction body is synchronous and must check every precondition before
 * it mutates anything, so a throw leaves no partial state behind. Once the
 * body returns the transaction has committed: a failure while appending its
 * facts is recorded on the journal entry and never reaches the caller.
 */

import type { ContentAddress } from './identity/content-address.js';
import type { Clock, UnixSeconds } from './time/clock.js';
import type { AppendEventInput, EventStore } from './storage/event-store.js';
import { computeContentAddress } from './identity/content-address.js';
import { isLedgerError, toError } from './errors.js';

/**
 * Journal entry for one transaction
 */
export interface LedgerTransactionRecord {
  readonly id: ContentAddress;
  /** Operation name, e.g. "delegation.registerGrant" */
  readonly operation: string;
  readonly status: 'pending' | 'completed' | 'failed';
  readonly startedAt: UnixSeconds;
  readonly completedAt?: UnixSeconds;
  /** Error code (or message) of a failed transaction */
  readonly error?: string;
  /** Number of facts emitted */
  readonly eventCount: number;
  /** Append or subscriber failure after commit */
  readonly deliveryError?: string;
}

/**
 * Handle given to a transaction body
 */
export class LedgerTransaction {
  private readonly pending: AppendEventInput[] = [];

  constructor(
    readonly id: ContentAddress,
    readonly operation: string,
    readonly timestamp: UnixSeconds
  ) {}

  /**
   * Buffer a fact; it is appended only if the transaction commits
   */
  emit(event: AppendEventInput): void {
    this.pending.push(event);
  }

  get events(): readonly AppendEventInput[] {
    return this.pending;
  }
}

export class Ledger {
  private tail: Promise<void> = Promise.resolve();
  private active: LedgerTransaction | undefined;
  private sequence = 0;
  private journal: LedgerTransactionRecord[] = [];

  constructor(
    private readonly clock: Clock,
    private readonly eventStore: EventStore
  ) {}

  /**
   * Current ledger time: the pinned transaction time while one is running
   */
  now(): UnixSeconds {
    return this.active?.timestamp ?? this.clock.now();
  }

  get events(): EventStore {
    return this.eventStore;
  }

  /**
   * Queue a transaction behind every previously submitted one
   */
  execute<T>(operation: string, body: (tx: LedgerTransaction) => T): Promise<T> {
    const run = this.tail.then(() => this.run(operation, body));
    // the queue moves on after a failure; the rejection still reaches the caller through `run`
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Journal of every transaction, oldest first
   */
  getJournal(): readonly LedgerTransactionRecord[] {
    return [...this.journal];
  }

  private async run<T>(operation: string, body: (tx: LedgerTransaction) => T): Promise<T> {
    this.sequence += 1;
    const startedAt = this.clock.now();
    const id = computeContentAddress({ operation, startedAt, sequence: this.sequence });
    const tx = new LedgerTransaction(id, operation, startedAt);
    const index = this.journal.push({ id, operation, status: 'pending', startedAt, eventCount: 0 }) - 1;

    let result: T;
    this.active = tx;
    try {
      result = body(tx);
    } catch (error) {
      this.journal[index] = {
        id,
        operation,
        status: 'failed',
        startedAt,
        completedAt: startedAt,
        error: isLedgerError(error) ? error.code : toError(error).message,
        eventCount: 0,
      };
      throw error;
    } finally {
      this.active = undefined;
    }

    const deliveryErrors: string[] = [];
    for (const event of tx.events) {
      try {
        await this.eventStore.append({ ...event, timestamp: startedAt, correlationId: id });
      } catch (error) {
        deliveryErrors.push(toError(error).message);
      }
    }

    const completed: LedgerTransactionRecord = {
      id,
      operation,
      status: 'completed',
      startedAt,
      completedAt: startedAt,
      eventCount: tx.events.length,
    };
    this.journal[index] =
      deliveryErrors.length > 0 ? { ...completed, deliveryError: deliveryErrors.join('; ') } : completed;

    return result;
  }
}

export function createLedger(clock: Clock, eventStore: EventStore): Ledger {
  return new Ledger(clock, eventStore);
}
