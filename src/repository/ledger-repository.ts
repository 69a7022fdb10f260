//Ledger Store on SQLite: order records keyed by rec_<uuid>, natural key (order_number, kind) indexed
import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { LedgerStore, OrderKind, OrderRecord, OrderStatus, PersistedOrderRecord } from '../models/index.js';
import { orderRecordSchema, orderStatusSchema } from '../models/schema.js';

interface OrderRecordRow { id: string; data: string; }
interface StatusCountRow { status: string; count: number; }

export class SqliteLedgerStore implements LedgerStore {
  constructor(private db: Database.Database, private clock: () => Date = () => new Date()) {}

  async upsert(record: OrderRecord): Promise<string> {
    const id = record.externalRecordId ?? `rec_${uuidv4()}`;
    const now = this.clock().toISOString();
    const stored: OrderRecord = { ...record, externalRecordId: id, createdAt: record.createdAt ?? now, updatedAt: now };
    this.db.prepare(`INSERT INTO order_records (id, order_number, kind, status, data, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET order_number = excluded.order_number, kind = excluded.kind,
        status = excluded.status, data = excluded.data, updated_at = excluded.updated_at`)
      .run(id, record.orderNumber?.trim() ?? null, record.kind ?? null, record.status, JSON.stringify(stored), stored.createdAt, now);
    return id;
  }

  async get(externalRecordId: string): Promise<PersistedOrderRecord | undefined> {
    const row = this.db.prepare<[string], OrderRecordRow>(`SELECT id, data FROM order_records WHERE id = ?`).get(externalRecordId);
    return row ? this.toRecord(row) : undefined;
  }

  //most recently touched record wins when a key was ever stored twice
  async findByNaturalKey(orderNumber: string, kind: OrderKind): Promise<PersistedOrderRecord | undefined> {
    const row = this.db.prepare<[string, string], OrderRecordRow>(
      `SELECT id, data FROM order_records WHERE order_number = ? AND kind = ? ORDER BY updated_at DESC LIMIT 1`,
    ).get(orderNumber.trim(), kind);
    return row ? this.toRecord(row) : undefined;
  }

  async countByStatus(): Promise<Record<OrderStatus, number>> {
    const counts: Record<OrderStatus, number> = {
      pending_validation: 0, complete: 0, incomplete_awaiting_review: 0, synced: 0, failed: 0,
    };
    for (const row of this.db.prepare<[], StatusCountRow>(`SELECT status, COUNT(*) AS count FROM order_records GROUP BY status`).all()) {
      const status = orderStatusSchema.safeParse(row.status);
      if (status.success) counts[status.data] = row.count;
    }
    return counts;
  }

  list(status?: OrderStatus): PersistedOrderRecord[] {
    const rows = status === undefined
      ? this.db.prepare<[], OrderRecordRow>(`SELECT id, data FROM order_records ORDER BY created_at ASC`).all()
      : this.db.prepare<[string], OrderRecordRow>(`SELECT id, data FROM order_records WHERE status = ? ORDER BY created_at ASC`).all(status);
    return rows.map(r => this.toRecord(r));
  }

  private toRecord(row: OrderRecordRow): PersistedOrderRecord {
    const parsed: unknown = JSON.parse(row.data);
    return { ...orderRecordSchema.parse(parsed), externalRecordId: row.id };
  }
}
