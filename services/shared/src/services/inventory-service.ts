import { Transaction, TransactionRunner, withTransaction } from '../db/client';
import { PgStockLedger, StockLedger } from '../repositories/stock-ledger';
import type { StockEntry } from '../types/commerce.types';
import {
     InsufficientStockError,
     InvalidQuantityError,
     SkuNotFoundError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { runUnitOfWork } from './unit-of-work';

export interface InventoryServiceDeps<Tx> {
     ledger: StockLedger<Tx>;
     transact: TransactionRunner<Tx>;
}

function assertQuantity(quantity: number): void {
     if (!Number.isInteger(quantity) || quantity < 0) {
          throw new InvalidQuantityError('Quantity must be a non-negative integer');
     }
}

/**
 * Direct stock administration. Reservations go through ReservationService.
 */
export class InventoryService<Tx = Transaction> {
     constructor(private readonly deps: InventoryServiceDeps<Tx>) {}

     /**
      * Create a SKU or replace its quantity
      */
     async upsertStock(entry: StockEntry): Promise<StockEntry> {
          assertQuantity(entry.quantity);
          const stored = await this.unitOfWork('upsert stock', (tx) =>
               this.deps.ledger.upsert(tx, entry)
          );
          logger.info({ sku: stored.sku, quantity: stored.quantity }, 'Stock upserted');
          return stored;
     }

     async getStock(sku: string): Promise<StockEntry> {
          const entry = await this.unitOfWork('read stock', (tx) => this.deps.ledger.get(tx, sku));
          if (!entry) {
               throw new SkuNotFoundError(sku);
          }
          return entry;
     }

     async listStock(): Promise<StockEntry[]> {
          return this.unitOfWork('list stock', (tx) => this.deps.ledger.list(tx));
     }

     /**
      * Set an existing SKU to an absolute quantity
      */
     async setStock(sku: string, quantity: number): Promise<StockEntry> {
          assertQuantity(quantity);
          return this.unitOfWork('set stock', async (tx) => {
               const current = await this.deps.ledger.lockAndGet(tx, sku);
               if (!current) {
                    throw new SkuNotFoundError(sku);
               }
               return this.deps.ledger.adjust(tx, sku, quantity - current.quantity);
          });
     }

     /**
      * Apply a signed delta. Refuses to take a SKU below zero.
      */
     async adjustStock(sku: string, delta: number): Promise<StockEntry> {
          if (!Number.isInteger(delta)) {
               throw new InvalidQuantityError('Delta must be an integer');
          }

          const entry = await this.unitOfWork('adjust stock', async (tx) => {
               const current = await this.deps.ledger.lockAndGet(tx, sku);
               if (!current) {
                    throw new SkuNotFoundError(sku);
               }
               if (current.quantity + delta < 0) {
                    throw new InsufficientStockError(sku, -delta, current.quantity);
               }
               return this.deps.ledger.adjust(tx, sku, delta);
          });

          logger.info({ sku, delta, quantity: entry.quantity }, 'Stock adjusted');
          return entry;
     }

     async deleteStock(sku: string): Promise<void> {
          const removed = await this.unitOfWork('delete stock', (tx) =>
               this.deps.ledger.remove(tx, sku)
          );
          logger.info({ sku, removed }, 'Stock deleted');
     }

     private unitOfWork<T>(action: string, fn: (tx: Tx) => Promise<T>): Promise<T> {
          return runUnitOfWork(this.deps.transact, action, fn);
     }
}

export function createInventoryService(): InventoryService {
     return new InventoryService({ ledger: new PgStockLedger(), transact: withTransaction });
}
