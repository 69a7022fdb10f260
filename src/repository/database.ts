//database schema and initialization for the reconciliation ledger

import Database from 'better-sqlite3';

//SQL SCHEMA DEFINITION
const SCHEMA = `
-- Order records (Ledger Store); the full record is kept as JSON, keys are indexed
CREATE TABLE IF NOT EXISTS order_records (
  id TEXT PRIMARY KEY,
  order_number TEXT,
  kind TEXT,
  status TEXT NOT NULL,
  data TEXT NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_order_records_natural_key ON order_records(order_number, kind);
CREATE INDEX IF NOT EXISTS idx_order_records_status ON order_records(status);

-- Stock identities (Stock Backend)
CREATE TABLE IF NOT EXISTS stock_identities (
  id TEXT PRIMARY KEY,
  sku TEXT NOT NULL UNIQUE,
  name TEXT NOT NULL,
  normalized_name TEXT NOT NULL,
  upc TEXT,
  product_id TEXT,
  quantity_on_hand INTEGER NOT NULL DEFAULT 0,
  last_cost TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_stock_identities_upc ON stock_identities(upc);
CREATE INDEX IF NOT EXISTS idx_stock_identities_product_id ON stock_identities(product_id);
CREATE INDEX IF NOT EXISTS idx_stock_identities_normalized_name ON stock_identities(normalized_name);

-- Applied stock adjustments
CREATE TABLE IF NOT EXISTS stock_adjustments (
  id TEXT PRIMARY KEY,
  stock_id TEXT NOT NULL REFERENCES stock_identities(id),
  signed_quantity INTEGER NOT NULL,
  direction TEXT NOT NULL,
  unit_cost TEXT NOT NULL,
  source_order_number TEXT NOT NULL,
  applied_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_stock_adjustments_stock_id ON stock_adjustments(stock_id);
CREATE INDEX IF NOT EXISTS idx_stock_adjustments_source ON stock_adjustments(source_order_number);

-- Review tickets (process state)
CREATE TABLE IF NOT EXISTS review_tickets (
  order_record_id TEXT PRIMARY KEY,
  missing_fields TEXT NOT NULL,
  notified_fields TEXT NOT NULL,
  status TEXT NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

-- Process-scoped scalars such as the polling watermark
CREATE TABLE IF NOT EXISTS process_state (
  key TEXT PRIMARY KEY,
  value TEXT
);

-- Audit Trail Table
CREATE TABLE IF NOT EXISTS audit_trail (
  id TEXT PRIMARY KEY,
  order_record_id TEXT NOT NULL,
  seq INTEGER NOT NULL,
  step TEXT NOT NULL,
  timestamp TEXT NOT NULL,
  details TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_audit_trail_order_record_id ON audit_trail(order_record_id);
`;

//initializing the database
//WAL for concurrent readers, foreign keys so adjustments always point at a real identity
export function initializeDatabase(dbPath: string = ':memory:'): Database.Database {
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  //db schema execution
  db.exec(SCHEMA);

  return db;
}

//closing the database connection
export function closeDatabase(db: Database.Database): void {
  db.close();
}
