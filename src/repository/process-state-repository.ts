//process state on SQLite: polling watermark plus the review-ticket registry
import Database from 'better-sqlite3';
import type { ReviewTicket } from '../models/index.js';
import { fieldListSchema, ticketStatusSchema } from '../models/schema.js';
import type { IProcessStateStore, ProcessStateSnapshot } from '../services/process-state.js';

interface ReviewTicketRow {
  order_record_id: string; missing_fields: string; notified_fields: string;
  status: string; created_at: string; updated_at: string;
}

const WATERMARK_KEY = 'watermark';

export class SqliteProcessStateStore implements IProcessStateStore {
  constructor(private db: Database.Database) {}

  //closed tickets stay on disk for the record but are not loaded back
  load(): ProcessStateSnapshot {
    const watermark = this.db.prepare<[string], { value: string | null }>(`SELECT value FROM process_state WHERE key = ?`).get(WATERMARK_KEY);
    const rows = this.db.prepare<[], ReviewTicketRow>(`SELECT * FROM review_tickets WHERE status != 'closed' ORDER BY created_at ASC`).all();
    return { watermark: watermark?.value ?? null, tickets: rows.map(r => this.toTicket(r)) };
  }

  save(snapshot: ProcessStateSnapshot): void {
    const upsertTicket = this.db.prepare(`INSERT INTO review_tickets (order_record_id, missing_fields, notified_fields, status, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(order_record_id) DO UPDATE SET missing_fields = excluded.missing_fields, notified_fields = excluded.notified_fields,
        status = excluded.status, updated_at = excluded.updated_at`);
    this.db.transaction((s: ProcessStateSnapshot) => {
      this.db.prepare(`INSERT INTO process_state (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value`)
        .run(WATERMARK_KEY, s.watermark);
      for (const t of s.tickets) {
        upsertTicket.run(t.orderRecordId, JSON.stringify(t.missingFields), JSON.stringify(t.notifiedFields), t.status, t.createdAt, t.updatedAt);
      }
    })(snapshot);
  }

  private toTicket(r: ReviewTicketRow): ReviewTicket {
    const missing: unknown = JSON.parse(r.missing_fields), notified: unknown = JSON.parse(r.notified_fields);
    return {
      orderRecordId: r.order_record_id,
      missingFields: fieldListSchema.parse(missing),
      notifiedFields: fieldListSchema.parse(notified),
      status: ticketStatusSchema.parse(r.status),
      createdAt: r.created_at,
      updatedAt: r.updated_at,
    };
  }
}
