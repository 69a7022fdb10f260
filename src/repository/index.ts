export { initializeDatabase, closeDatabase } from './database.js';
export { SqliteLedgerStore } from './ledger-repository.js';
export { SqliteStockBackend, type StockLevel } from './stock-repository.js';
export { SqliteProcessStateStore } from './process-state-repository.js';
export { SqliteAuditLog, type IAuditLog } from './audit-repository.js';
