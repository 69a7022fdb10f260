//per-order audit trail: every pipeline step leaves one entry
import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { AuditEntry } from '../models/index.js';

export interface IAuditLog {
  append(orderRecordId: string, entry: AuditEntry): void;
  getAuditTrail(orderRecordId: string): AuditEntry[];
}

const AUDIT_STEPS: readonly AuditEntry['step'][] = ['ingest', 'validate', 'resolve', 'allocate', 'adjust', 'review', 'sync', 'fail'];

const isAuditStep = (step: string): step is AuditEntry['step'] => AUDIT_STEPS.some(s => s === step);

interface AuditEntryRow { step: string; timestamp: string; details: string; }

export class SqliteAuditLog implements IAuditLog {
  constructor(private db: Database.Database) {}

  append(orderRecordId: string, entry: AuditEntry): void {
    //seq keeps insertion order for entries sharing a timestamp
    this.db.prepare(`INSERT INTO audit_trail (id, order_record_id, seq, step, timestamp, details)
      VALUES (?, ?, (SELECT COALESCE(MAX(seq), 0) + 1 FROM audit_trail WHERE order_record_id = ?), ?, ?, ?)`)
      .run(uuidv4(), orderRecordId, orderRecordId, entry.step, entry.timestamp, entry.details);
  }

  getAuditTrail(orderRecordId: string): AuditEntry[] {
    return this.db.prepare<[string], AuditEntryRow>(`SELECT step, timestamp, details FROM audit_trail WHERE order_record_id = ? ORDER BY seq ASC`)
      .all(orderRecordId)
      .flatMap(r => (isAuditStep(r.step) ? [{ step: r.step, timestamp: r.timestamp, details: r.details }] : []));
  }
}
