#!/usr/bin/env node
import { readFileSync, existsSync, unlinkSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { loadConfig } from './config.js';
import { initializeDatabase, closeDatabase } from './repository/database.js';
import { SqliteAuditLog } from './repository/audit-repository.js';
import { SqliteLedgerStore } from './repository/ledger-repository.js';
import { SqliteProcessStateStore } from './repository/process-state-repository.js';
import { SqliteStockBackend } from './repository/stock-repository.js';
import { JsonMessageExtractor } from './services/extraction.js';
import { LogNotifier } from './services/notifications.js';
import { Reconciler } from './services/reconciler.js';
import { createChildLogger } from './utils/logger.js';
import type { BatchSummary, CommandResponse, InboxSource, Notification, OrderRecord, RawMessage } from './models/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

//parse CLI flags
const args = process.argv.slice(2);
const [useFresh, useMemory] = [['--fresh', '-f'], ['--memory', '-m']].map(f => f.some(x => args.includes(x)));

//ANSI color helpers
const c = { reset: '\x1b[0m', bright: '\x1b[1m', dim: '\x1b[2m', green: '\x1b[32m', yellow: '\x1b[33m', blue: '\x1b[34m', magenta: '\x1b[35m', cyan: '\x1b[36m', red: '\x1b[31m' };
const levelColor: Record<Notification['level'], string> = { success: c.green, info: c.cyan, warning: c.yellow, error: c.red };

const log = console.log;

//pretty headers
const header = (t: string) => log(`\n${c.bright}${c.cyan}${'='.repeat(70)}\n ${t}\n${'='.repeat(70)}${c.reset}`);
const subHeader = (t: string) => log(`\n${c.bright}${c.blue}${'-'.repeat(50)}\n ${t}\n${'-'.repeat(50)}${c.reset}`);

const fixtureSchema = z.array(z.object({
  id: z.string(), receivedAt: z.string(), subject: z.string(), batch: z.number().int(), order: z.record(z.unknown()),
}));

//mailbox stand-in over the test fixtures; later batches arrive when released
class FixtureInbox implements InboxSource {
  private released = 0;
  private messages: (RawMessage & { batch: number })[];

  constructor(file = join(__dirname, '..', 'test', 'fixtures', 'messages.json')) {
    const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    this.messages = fixtureSchema.parse(raw).map(m => ({ id: m.id, receivedAt: m.receivedAt, subject: m.subject, body: JSON.stringify(m.order), batch: m.batch }));
  }

  release(batch: number): void {
    this.released = batch;
  }

  fetchNew(since: string | null): Promise<RawMessage[]> {
    return Promise.resolve(this.messages.filter(m => m.batch <= this.released && (since === null || m.receivedAt > since)));
  }
}

//prints every notification instead of posting it to a channel
class ConsoleNotifier extends LogNotifier {
  override emit(n: Notification): Promise<void> {
    log(`${levelColor[n.level]}[${n.level}] ${c.bright}${n.title}${c.reset}`);
    log(`  ${n.message}`);
    for (const [k, v] of Object.entries(n.fields ?? {})) log(`${c.dim}  ${k}: ${v.split('\n').join(`\n  ${' '.repeat(k.length + 2)}`)}${c.reset}`);
    return Promise.resolve();
  }
}

const printSummary = (s: BatchSummary) => {
  for (const o of s.outcomes) {
    const color = o.outcome === 'synced' ? c.green : o.outcome === 'review' ? c.yellow : o.outcome === 'failed' ? c.red : c.dim;
    log(`${color}${o.outcome.padEnd(8)}${c.reset} ${o.kind ?? '?'} ${o.orderNumber ?? '?'} ${c.dim}${o.externalRecordId ?? ''}${c.reset}`);
    o.adjustments.forEach(a => log(`${c.magenta}    ${a.direction} ${a.signedQuantity} × ${a.stockId} @ ${a.unitCost}${c.reset}`));
    if (o.error) log(`${c.red}    ${o.error}${c.reset}`);
  }
};

const printResponses = (rs: CommandResponse[]) => rs.forEach(r => log(`${r.kind === 'ok' ? c.green : c.cyan}> ${r.text.split('\n').join('\n  ')}${c.reset}`));

//what a reviewer would fill in by hand for the fixture orders
const reviewerFix = (record: OrderRecord): Partial<OrderRecord> => ({
  ...(record.missingFields.includes('order.tax') ? { tax: '6.40' } : {}),
  ...(record.missingFields.includes('order.confidenceScore') ? { confidenceScore: 1 } : {}),
});

//entry point
async function main() {
  log(`${c.bright}${c.cyan}\n${'='.repeat(70)}\n  INVENTORY RECONCILIATION - DEMO\n${'='.repeat(70)}${c.reset}`);
  const config = loadConfig();
  const dbPath = useMemory ? ':memory:' : config.databasePath;
  if (useFresh && !useMemory && existsSync(dbPath)) { unlinkSync(dbPath); log(`${c.yellow}Cleared database${c.reset}`); }
  log(`${c.dim}Usage: npm run demo [--fresh|-f] [--memory|-m]   apportion basis: ${config.apportionBasis}${c.reset}`);

  const db = initializeDatabase(dbPath);
  const ledger = new SqliteLedgerStore(db), notifier = new ConsoleNotifier(createChildLogger({ component: 'notifier' }));
  const reconciler = new Reconciler({
    ledger, stock: new SqliteStockBackend(db), notifier, stateStore: new SqliteProcessStateStore(db), audit: new SqliteAuditLog(db), config,
  });
  reconciler.listen();
  const inbox = new FixtureInbox(), extractor = new JsonMessageExtractor();

  try {
    header('Batch 1: purchases arrive');
    inbox.release(1);
    printSummary(await reconciler.runBatch(inbox, extractor));

    header('Batch 2: sales and a duplicate');
    inbox.release(2);
    printSummary(await reconciler.runBatch(inbox, extractor));

    header('Review: fix records and send resolved');
    for (const ticket of reconciler.state.openTickets()) {
      const record = await ledger.get(ticket.orderRecordId);
      if (!record) continue;
      subHeader(`${record.orderNumber ?? ticket.orderRecordId}: missing ${ticket.missingFields.join(', ')}`);
      await ledger.upsert({ ...record, ...reviewerFix(record) });
      printResponses(await notifier.dispatch(`resolved ${ticket.orderRecordId}`));
    }

    header('Commands');
    printResponses(await notifier.dispatch('status'));
    printResponses(await notifier.dispatch('pending'));

    const stats = await reconciler.shutdown();
    header('Demo Complete');
    log(`${c.green}${stats.processed} order(s): ${stats.synced} synced, ${stats.review} review, ${stats.failed} failed, ${stats.skipped} skipped${c.reset}`);
  } finally { closeDatabase(db); }
}
main().catch(console.error);
