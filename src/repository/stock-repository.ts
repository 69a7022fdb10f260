//Stock Backend on SQLite: identities keyed by SKU, quantity on hand, last recorded cost
import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { AdjustmentAck, IdentityQuery, StockAdjustment, StockBackend, StockIdentity } from '../models/index.js';
import { ErrorCodes, ReconciliationError } from '../errors.js';
import { normalizeName } from '../services/normalize.js';

interface StockIdentityRow {
  id: string; sku: string; name: string; upc: string | null; product_id: string | null;
  quantity_on_hand: number; last_cost: string | null;
}

export interface StockLevel {
  stockId: string;
  sku: string;
  quantityOnHand: number;
  lastCost: string | undefined;
}

const COLUMN_BY_QUERY: Record<IdentityQuery['by'], string> = {
  sku: 'sku', upc: 'upc', productId: 'product_id', name: 'normalized_name',
};

export class SqliteStockBackend implements StockBackend {
  constructor(private db: Database.Database, private clock: () => Date = () => new Date()) {}

  async findIdentity(query: IdentityQuery): Promise<StockIdentity | undefined> {
    const value = query.by === 'name' ? normalizeName(query.value) : query.value.trim();
    const row = this.db.prepare<[string], StockIdentityRow>(
      `SELECT * FROM stock_identities WHERE ${COLUMN_BY_QUERY[query.by]} = ? ORDER BY created_at ASC LIMIT 1`,
    ).get(value);
    return row ? this.toIdentity(row) : undefined;
  }

  //idempotent per SKU: registering a known SKU returns the identity already stored
  async registerIdentity(name: string, sku: string, identifiers: { upc?: string; productId?: string } = {}): Promise<StockIdentity> {
    const existing = this.findBySku(sku);
    if (existing) return this.toIdentity(existing);

    const id = `stk_${uuidv4()}`, now = this.clock().toISOString();
    this.db.prepare(`INSERT INTO stock_identities (id, sku, name, normalized_name, upc, product_id, quantity_on_hand, last_cost, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, 0, NULL, ?, ?)`)
      .run(id, sku, name.trim(), normalizeName(name), identifiers.upc ?? null, identifiers.productId ?? null, now, now);
    return {
      stockId: id, sku, name: name.trim(),
      ...(identifiers.upc ? { upc: identifiers.upc } : {}),
      ...(identifiers.productId ? { productId: identifiers.productId } : {}),
    };
  }

  async applyAdjustment(adjustment: StockAdjustment): Promise<AdjustmentAck> {
    const apply = this.db.transaction((adj: StockAdjustment): AdjustmentAck => {
      const row = this.findById(adj.stockId);
      if (!row) {
        throw new ReconciliationError(`Unknown stock identity ${adj.stockId}`, ErrorCodes.ADJUSTMENT_REJECTED, false);
      }
      const delta = adj.direction === 'increase' ? adj.signedQuantity : -adj.signedQuantity;
      const adjustmentId = `adj_${uuidv4()}`, now = this.clock().toISOString();
      this.db.prepare(`INSERT INTO stock_adjustments (id, stock_id, signed_quantity, direction, unit_cost, source_order_number, applied_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)`)
        .run(adjustmentId, adj.stockId, adj.signedQuantity, adj.direction, adj.unitCost, adj.sourceOrderNumber, now);
      this.db.prepare(`UPDATE stock_identities SET quantity_on_hand = quantity_on_hand + ?, updated_at = ? WHERE id = ?`).run(delta, now, adj.stockId);
      return { adjustmentId, stockId: adj.stockId, quantityOnHand: row.quantity_on_hand + delta };
    });
    return apply(adjustment);
  }

  async getLastCost(stockId: string): Promise<string | undefined> {
    return this.findById(stockId)?.last_cost ?? undefined;
  }

  async setLastCost(stockId: string, cost: string): Promise<void> {
    this.db.prepare(`UPDATE stock_identities SET last_cost = ?, updated_at = ? WHERE id = ?`).run(cost, this.clock().toISOString(), stockId);
  }

  getStockLevel(stockId: string): StockLevel | undefined {
    const row = this.findById(stockId);
    return row ? { stockId: row.id, sku: row.sku, quantityOnHand: row.quantity_on_hand, lastCost: row.last_cost ?? undefined } : undefined;
  }

  listAdjustments(sourceOrderNumber?: string): StockAdjustment[] {
    const sql = `SELECT stock_id, signed_quantity, direction, unit_cost, source_order_number FROM stock_adjustments`;
    const rows = sourceOrderNumber === undefined
      ? this.db.prepare<[], AdjustmentRow>(`${sql} ORDER BY rowid ASC`).all()
      : this.db.prepare<[string], AdjustmentRow>(`${sql} WHERE source_order_number = ? ORDER BY rowid ASC`).all(sourceOrderNumber);
    return rows.map(r => ({
      stockId: r.stock_id, signedQuantity: r.signed_quantity, unitCost: r.unit_cost,
      sourceOrderNumber: r.source_order_number, direction: r.direction === 'decrease' ? 'decrease' : 'increase',
    }));
  }

  private findById(stockId: string): StockIdentityRow | undefined {
    return this.db.prepare<[string], StockIdentityRow>(`SELECT * FROM stock_identities WHERE id = ?`).get(stockId);
  }

  private findBySku(sku: string): StockIdentityRow | undefined {
    return this.db.prepare<[string], StockIdentityRow>(`SELECT * FROM stock_identities WHERE sku = ?`).get(sku);
  }

  private toIdentity(r: StockIdentityRow): StockIdentity {
    return {
      stockId: r.id, sku: r.sku, name: r.name,
      ...(r.upc ? { upc: r.upc } : {}),
      ...(r.product_id ? { productId: r.product_id } : {}),
    };
  }
}

interface AdjustmentRow { stock_id: string; signed_quantity: number; direction: string; unit_cost: string; source_order_number: string; }
