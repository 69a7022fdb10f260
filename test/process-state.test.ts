import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { SqliteProcessStateStore } from '../src/repository/process-state-repository.js';
import { ProcessState } from '../src/services/process-state.js';
import { cleanupTestDatabase, createTestDatabase } from './setup.js';

const t0 = new Date('2024-03-10T12:00:00.000Z'), t1 = new Date('2024-03-10T13:00:00.000Z');

describe('Process state', () => {
  let state: ProcessState;

  beforeEach(() => { state = new ProcessState(); });

  it('opens a ticket and notifies once per distinct missing-field set', () => {
    const first = state.recordIncomplete('rec_1', ['order.tax', 'order.date'], t0);
    expect(first.notify).toBe(true);
    expect(first.ticket).toMatchObject({ status: 'open', missingFields: ['order.tax', 'order.date'] });

    expect(state.recordIncomplete('rec_1', ['order.date', 'order.tax'], t1).notify).toBe(false);
    expect(state.recordIncomplete('rec_1', ['order.tax'], t1).notify).toBe(true);
    expect(state.recordIncomplete('rec_1', ['order.tax'], t1).notify).toBe(false);
  });

  it('reopens a resolving ticket that is still incomplete', () => {
    state.recordIncomplete('rec_1', ['order.tax'], t0);
    expect(state.markResolving('rec_1', t1)?.status).toBe('resolved_pending_revalidation');
    const again = state.recordIncomplete('rec_1', ['order.tax'], t1);
    expect(again).toMatchObject({ notify: false, ticket: { status: 'open', createdAt: t0.toISOString() } });
  });

  it('lists only open tickets, oldest first', () => {
    state.recordIncomplete('rec_2', ['order.tax'], t1);
    state.recordIncomplete('rec_1', ['order.tax'], t0);
    state.recordIncomplete('rec_3', ['order.tax'], t1);
    state.close('rec_3', t1);
    expect(state.openTickets().map(t => t.orderRecordId)).toEqual(['rec_1', 'rec_2']);
  });

  it('leaves unknown tickets alone', () => {
    expect(state.close('rec_missing')).toBeUndefined();
    expect(state.markResolving('rec_missing')).toBeUndefined();
  });

  it('only moves the watermark forward', () => {
    state.advanceWatermark('2024-03-06T10:00:00.000Z');
    state.advanceWatermark('2024-03-05T10:00:00.000Z');
    expect(state.watermark).toBe('2024-03-06T10:00:00.000Z');
  });

  describe('SqliteProcessStateStore', () => {
    let db: Database.Database;

    beforeEach(() => { db = createTestDatabase(); });
    afterEach(() => cleanupTestDatabase(db));

    it('starts empty', () => {
      expect(new SqliteProcessStateStore(db).load()).toEqual({ watermark: null, tickets: [] });
    });

    it('saves and reloads the watermark and open tickets', () => {
      const store = new SqliteProcessStateStore(db);
      state.advanceWatermark('2024-03-06T10:00:00.000Z');
      state.recordIncomplete('rec_1', ['order.tax', 'item[0].quantity'], t0);
      state.recordIncomplete('rec_2', ['order.date'], t0);
      state.close('rec_2', t1);
      store.save(state.snapshot());

      const restored = ProcessState.fromSnapshot(store.load());
      expect(restored.watermark).toBe('2024-03-06T10:00:00.000Z');
      expect(restored.openTickets()).toEqual([{
        orderRecordId: 'rec_1', missingFields: ['order.tax', 'item[0].quantity'], notifiedFields: ['order.tax', 'item[0].quantity'],
        status: 'open', createdAt: t0.toISOString(), updatedAt: t0.toISOString(),
      }]);
      expect(restored.getTicket('rec_2')).toBeUndefined();
    });
  });
});
