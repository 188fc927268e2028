import { Transaction } from '../db/client';
import type { StockEntry } from '../types/commerce.types';
import { SkuNotFoundError, StorageFailureError } from '../utils/errors';

/**
 * Authoritative quantity per SKU. Every mutation happens inside a caller's
 * transaction, after the row has been locked with lockAndGet.
 */
export interface StockLedger<Tx = Transaction> {
     lockAndGet(tx: Tx, sku: string): Promise<StockEntry | undefined>;
     adjust(tx: Tx, sku: string, delta: number): Promise<StockEntry>;
     createIfMissing(tx: Tx, sku: string, quantity: number): Promise<StockEntry>;
     get(tx: Tx, sku: string): Promise<StockEntry | undefined>;
     list(tx: Tx): Promise<StockEntry[]>;
     upsert(tx: Tx, entry: StockEntry): Promise<StockEntry>;
     remove(tx: Tx, sku: string): Promise<boolean>;
}

interface InventoryRow {
     sku: string;
     quantity: number;
}

function toStockEntry(row: InventoryRow): StockEntry {
     return { sku: row.sku, quantity: Number(row.quantity) };
}

export class PgStockLedger implements StockLedger {
     async lockAndGet(tx: Transaction, sku: string): Promise<StockEntry | undefined> {
          const { rows } = await tx.query<InventoryRow>(
               `
      SELECT sku, quantity
      FROM inventory
      WHERE sku = $1
      FOR UPDATE
    `,
               [sku]
          );
          return rows.length > 0 ? toStockEntry(rows[0]) : undefined;
     }

     /**
      * quantity += delta relative to the stored value, so several adjustments
      * in one transaction compose.
      */
     async adjust(tx: Transaction, sku: string, delta: number): Promise<StockEntry> {
          if (!tx.isOpen) {
               throw new StorageFailureError(
                    `Stock adjustment for ${sku} attempted outside an active transaction`
               );
          }

          const { rows } = await tx.query<InventoryRow>(
               `
      UPDATE inventory
      SET quantity = quantity + $2,
          updated_at = NOW()
      WHERE sku = $1
      RETURNING sku, quantity
    `,
               [sku, delta]
          );

          if (rows.length === 0) {
               throw new SkuNotFoundError(sku);
          }
          return toStockEntry(rows[0]);
     }

     // Recovery path for a row deleted out-of-band; a concurrent insert keeps its stock
     async createIfMissing(tx: Transaction, sku: string, quantity: number): Promise<StockEntry> {
          const { rows } = await tx.query<InventoryRow>(
               `
      INSERT INTO inventory (sku, quantity)
      VALUES ($1, $2)
      ON CONFLICT (sku) DO UPDATE
      SET quantity = inventory.quantity + EXCLUDED.quantity,
          updated_at = NOW()
      RETURNING sku, quantity
    `,
               [sku, quantity]
          );
          return toStockEntry(rows[0]);
     }

     async get(tx: Transaction, sku: string): Promise<StockEntry | undefined> {
          const { rows } = await tx.query<InventoryRow>(
               `SELECT sku, quantity FROM inventory WHERE sku = $1`,
               [sku]
          );
          return rows.length > 0 ? toStockEntry(rows[0]) : undefined;
     }

     async list(tx: Transaction): Promise<StockEntry[]> {
          const { rows } = await tx.query<InventoryRow>(
               `SELECT sku, quantity FROM inventory ORDER BY sku`
          );
          return rows.map(toStockEntry);
     }

     async upsert(tx: Transaction, entry: StockEntry): Promise<StockEntry> {
          const { rows } = await tx.query<InventoryRow>(
               `
      INSERT INTO inventory (sku, quantity)
      VALUES ($1, $2)
      ON CONFLICT (sku) DO UPDATE
      SET quantity = EXCLUDED.quantity,
          updated_at = NOW()
      RETURNING sku, quantity
    `,
               [entry.sku, entry.quantity]
          );
          return toStockEntry(rows[0]);
     }

     async remove(tx: Transaction, sku: string): Promise<boolean> {
          const { rowCount } = await tx.query(`DELETE FROM inventory WHERE sku = $1`, [sku]);
          return (rowCount ?? 0) > 0;
     }
}
