import { describe, it, expect, beforeEach } from '@jest/globals';
import type { StoredEvent } from '../../src/core/storage/event-store.js';
import { ManualClock } from '../../src/core/time/clock.js';
import { InMemoryEventStore } from '../../src/core/storage/event-store.js';
import { Ledger } from '../../src/core/ledger.js';
import { LedgerError, isLedgerError, preconditionFailed } from '../../src/core/errors.js';
import { labelHash } from '../../src/core/identity/address.js';
import { testIdentity } from '../fixtures/ledger.js';

describe('Ledger', () => {
  let clock: ManualClock;
  let events: InMemoryEventStore;
  let ledger: Ledger;

  const context = labelHash('workspace-alpha');
  const authority = testIdentity('authority');

  beforeEach(() => {
    clock = new ManualClock(1_000);
    events = new InMemoryEventStore(clock);
    ledger = new Ledger(clock, events);
  });

  describe('execute', () => {
    it('should run transactions in submission order', async () => {
      const order: string[] = [];

      const first = ledger.execute('first', () => {
        order.push('first');
        return 1;
      });
      const second = ledger.execute('second', () => {
        order.push('second');
        return 2;
      });

      await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
      expect(order).toEqual(['first', 'second']);
    });

    it('should pin now for the transaction', async () => {
      const seen = await ledger.execute('pinned', (tx) => {
        clock.advance(60);
        return [tx.timestamp, ledger.now()];
      });

      expect(seen).toEqual([1_000, 1_000]);
      expect(ledger.now()).toBe(1_060);
    });

    it('should append buffered facts with one correlation id', async () => {
      await ledger.execute('workspace.init', (tx) => {
        tx.emit({ type: 'AuthoritySet', payload: { context, authority } });
        tx.emit({ type: 'MemberSet', payload: { context, member: authority, isMember: true } });
      });

      const stored = await events.read();
      expect(stored.map((event) => event.sequence)).toEqual([1, 2]);
      expect(stored[0]?.correlationId).toBe(ledger.getJournal()[0]?.id);
      expect(stored[1]?.correlationId).toBe(stored[0]?.correlationId);
      expect(stored[0]?.timestamp).toBe(1_000);
    });

    it('should drop buffered facts and journal the failure', async () => {
      const failed = ledger.execute('doomed', (tx) => {
        tx.emit({ type: 'AuthoritySet', payload: { context, authority } });
        throw preconditionFailed('authority already set');
      });

      await expect(failed).rejects.toBeInstanceOf(LedgerError);
      expect(await events.getSequence()).toBe(0);
      expect(ledger.getJournal()).toEqual([
        expect.objectContaining({ operation: 'doomed', status: 'failed', error: 'PRECONDITION_FAILED' }),
      ]);
    });

    it('should keep going after a failed transaction', async () => {
      const failed = ledger.execute('doomed', () => {
        throw new Error('boom');
      });
      const next = ledger.execute('next', () => 'ok');

      await expect(failed).rejects.toThrow('boom');
      await expect(next).resolves.toBe('ok');
      expect(ledger.getJournal().map((entry) => entry.status)).toEqual(['failed', 'completed']);
      expect(ledger.getJournal()[0]?.error).toBe('boom');
    });

    it('should resolve a committed transaction when a subscriber fails', async () => {
      events.subscribe(() => {
        throw new Error('subscriber down');
      });

      const result = await ledger.execute('workspace.init', (tx) => {
        tx.emit({ type: 'AuthoritySet', payload: { context, authority } });
        tx.emit({ type: 'MemberSet', payload: { context, member: authority, isMember: true } });
        return 'committed';
      });

      expect(result).toBe('committed');
      expect(await events.getSequence()).toBe(2);
      expect(ledger.getJournal()).toEqual([
        expect.objectContaining({
          operation: 'workspace.init',
          status: 'completed',
          eventCount: 2,
          deliveryError: 'subscriber down; subscriber down',
        }),
      ]);
    });

    it('should leave deliveryError unset when every append succeeds', async () => {
      await ledger.execute('quiet', () => undefined);

      expect(ledger.getJournal()[0]).not.toHaveProperty('deliveryError');
    });
  });

  describe('InMemoryEventStore', () => {
    beforeEach(async () => {
      await events.append({ type: 'AuthoritySet', payload: { context, authority } });
      await events.append({ type: 'MemberSet', payload: { context, member: authority, isMember: true } });
      await events.append({ type: 'DaoExecutorSet', payload: { context, executor: authority } });
    });

    it('should filter by type, sequence and limit', async () => {
      const members = await events.read({ types: ['MemberSet'] });
      expect(members.map((event) => event.sequence)).toEqual([2]);

      const window = await events.read({ fromSequence: 2, toSequence: 4, limit: 1 });
      expect(window.map((event) => event.type)).toEqual(['MemberSet']);
    });

    it('should find events by id', async () => {
      const [first] = await events.read({ limit: 1 });
      expect(first).toBeDefined();
      if (first !== undefined) {
        await expect(events.getById(first.id)).resolves.toEqual(first);
      }
      await expect(events.getById('sha256:missing')).resolves.toBeNull();
    });

    it('should notify subscribers until they unsubscribe', async () => {
      const received: StoredEvent[] = [];
      const unsubscribe = events.subscribe((event) => {
        received.push(event);
      }, { types: ['Revoked'] });

      await events.append({ type: 'MemberSet', payload: { context, member: authority, isMember: false } });
      await events.append({
        type: 'Revoked',
        payload: { principal: authority, relayer: authority, context },
      });
      unsubscribe();
      await events.append({
        type: 'Revoked',
        payload: { principal: authority, relayer: authority, context },
      });

      expect(received.map((event) => event.sequence)).toEqual([5]);
    });

    it('should reach every subscriber before rethrowing a failure', async () => {
      const received: number[] = [];
      events.subscribe(() => {
        throw new Error('subscriber down');
      });
      events.subscribe((event) => {
        received.push(event.sequence);
      });

      await expect(
        events.append({ type: 'MemberSet', payload: { context, member: authority, isMember: false } })
      ).rejects.toThrow('subscriber down');

      expect(received).toEqual([4]);
      expect(await events.getSequence()).toBe(4);
    });
  });

  describe('errors', () => {
    it('should carry a stable code and reason', () => {
      const error = preconditionFailed('duplicate root', { merkleRoot: context });

      expect(error.message).toBe('PRECONDITION_FAILED: duplicate root');
      expect(isLedgerError(error, 'PRECONDITION_FAILED')).toBe(true);
      expect(isLedgerError(error, 'NOT_FOUND')).toBe(false);
      expect(isLedgerError(new Error('plain'))).toBe(false);
    });
  });
});
