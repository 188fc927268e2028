import { randomUUID } from 'crypto';
import { Transaction, TransactionRunner, withTransaction } from '../db/client';
import { PgReservationStore, ReservationStore } from '../repositories/reservation-store';
import { PgStockLedger, StockLedger } from '../repositories/stock-ledger';
import type {
     Reservation,
     ReservationLine,
     ReserveInventoryRequest,
     UpdateReservationRequest,
} from '../types/commerce.types';
import {
     InsufficientStockError,
     InvalidQuantityError,
     InvalidReservationTransitionError,
     ReservationConflictError,
     ReservationNotFoundError,
     SkuNotFoundError,
} from '../utils/errors';
import { createReservationLogger, logger } from '../utils/logger';
import { runUnitOfWork } from './unit-of-work';
import { stockEffectOf } from './reservation-transitions';

export interface ReservationServiceDeps<Tx> {
     ledger: StockLedger<Tx>;
     store: ReservationStore<Tx>;
     transact: TransactionRunner<Tx>;
}

const bySku = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Total quantity per SKU, keyed in order of first appearance.
 */
export function totalsBySku(lines: ReservationLine[]): Map<string, number> {
     const totals = new Map<string, number>();
     for (const line of lines) {
          totals.set(line.sku, (totals.get(line.sku) ?? 0) + line.qty);
     }
     return totals;
}

function sameLines(a: ReservationLine[], b: ReservationLine[]): boolean {
     const left = totalsBySku(a);
     const right = totalsBySku(b);
     if (left.size !== right.size) {
          return false;
     }
     return [...left].every(([sku, qty]) => right.get(sku) === qty);
}

export function validateLines(lines: ReservationLine[]): void {
     if (!lines || lines.length === 0) {
          throw new InvalidQuantityError('Reservation must have at least one line');
     }

     for (const line of lines) {
          if (typeof line.sku !== 'string' || line.sku.length === 0) {
               throw new InvalidQuantityError('Every line must name a SKU');
          }
          if (!Number.isInteger(line.qty) || line.qty <= 0) {
               throw new InvalidQuantityError(`Quantity must be a positive integer for SKU ${line.sku}`);
          }
     }
}

/**
 * Moves stock between the ledger and reservation records. Each operation is
 * one unit of work: it either applies completely or leaves stock and
 * reservations as they were.
 */
export class ReservationService<Tx = Transaction> {
     constructor(private readonly deps: ReservationServiceDeps<Tx>) {}

     /**
      * Reserve every line or nothing. SKU rows are locked in ascending SKU
      * order so overlapping reservations cannot deadlock.
      */
     async createReservation(request: ReserveInventoryRequest): Promise<Reservation> {
          const { orderId, items } = request;
          const id = request.id ?? randomUUID();
          const log = createReservationLogger(id, orderId);

          validateLines(items);
          log.info({ lineCount: items.length }, 'Reserving inventory');

          return this.unitOfWork('reserve inventory', async (tx) => {
               if (request.id !== undefined) {
                    const existing = await this.deps.store.lockById(tx, id);
                    if (existing) {
                         return this.resolveRetry(existing, orderId, items);
                    }
               }

               const demand = totalsBySku(items);
               const available = await this.lockStock(tx, [...demand.keys()]);

               // Validate every line before touching stock
               for (const [sku, requested] of demand) {
                    const quantity = available.get(sku);
                    if (quantity === undefined) {
                         throw new SkuNotFoundError(sku, 409);
                    }
                    if (quantity < requested) {
                         throw new InsufficientStockError(sku, requested, quantity);
                    }
               }

               for (const line of items) {
                    const entry = await this.deps.ledger.adjust(tx, line.sku, -line.qty);
                    log.debug(
                         { sku: line.sku, qty: line.qty, remaining: entry.quantity },
                         'Stock reserved'
                    );
               }

               const reservation = await this.deps.store.insert(tx, {
                    id,
                    orderId,
                    items,
                    status: 'reserved',
               });

               log.info('Inventory reserved successfully');
               return reservation;
          });
     }

     async getReservation(id: string): Promise<Reservation> {
          const reservation = await this.unitOfWork('read reservation', (tx) =>
               this.deps.store.findById(tx, id)
          );
          if (!reservation) {
               throw new ReservationNotFoundError(id);
          }
          return reservation;
     }

     async listReservations(): Promise<Reservation[]> {
          return this.unitOfWork('list reservations', (tx) => this.deps.store.list(tx));
     }

     /**
      * Overwrite a reservation with a full payload. The stock effect is decided
      * by the status read under lock, never by what the caller sends, so a
      * retried release restores stock once.
      */
     async updateReservation(id: string, request: UpdateReservationRequest): Promise<Reservation> {
          const log = createReservationLogger(id, request.orderId);
          validateLines(request.items);

          return this.unitOfWork('update reservation', async (tx) => {
               const existing = await this.deps.store.lockById(tx, id);
               if (!existing) {
                    throw new ReservationNotFoundError(id);
               }

               const effect = stockEffectOf(existing.status, request.status);
               if (effect === undefined) {
                    throw new InvalidReservationTransitionError(id, existing.status, request.status);
               }

               // Lines are fixed while stock is held
               if (existing.status === 'reserved' && !sameLines(existing.items, request.items)) {
                    throw new ReservationConflictError(
                         id,
                         `Reservation ${id} is holding stock; its lines cannot be changed`
                    );
               }

               if (effect === 'restore') {
                    await this.restoreStock(tx, existing.items);
               }

               const updated = await this.deps.store.update(tx, {
                    id,
                    orderId: request.orderId,
                    items: request.items,
                    status: request.status,
               });

               log.info({ from: existing.status, to: request.status, effect }, 'Reservation updated');
               return updated;
          });
     }

     /**
      * Idempotent. A reservation still holding stock gives it back before the
      * record is removed.
      */
     async deleteReservation(id: string): Promise<void> {
          await this.unitOfWork('delete reservation', async (tx) => {
               const existing = await this.deps.store.lockById(tx, id);
               if (!existing) {
                    logger.debug({ reservationId: id }, 'Reservation already absent');
                    return;
               }

               if (existing.status === 'reserved') {
                    await this.restoreStock(tx, existing.items);
               }
               await this.deps.store.delete(tx, id);

               logger.info(
                    { reservationId: id, status: existing.status },
                    'Reservation deleted'
               );
          });
     }

     private resolveRetry(
          existing: Reservation,
          orderId: string,
          items: ReservationLine[]
     ): Reservation {
          const holdsStock = existing.status === 'reserved' || existing.status === 'committed';
          if (holdsStock && existing.orderId === orderId && sameLines(existing.items, items)) {
               logger.info(
                    { reservationId: existing.id, status: existing.status },
                    'Reservation already exists with identical lines'
               );
               return existing;
          }
          throw new ReservationConflictError(existing.id);
     }

     private async lockStock(tx: Tx, skus: string[]): Promise<Map<string, number>> {
          const quantities = new Map<string, number>();
          for (const sku of [...skus].sort(bySku)) {
               const entry = await this.deps.ledger.lockAndGet(tx, sku);
               if (entry) {
                    quantities.set(sku, entry.quantity);
               }
          }
          return quantities;
     }

     // Undo exactly what the stored lines took
     private async restoreStock(tx: Tx, items: ReservationLine[]): Promise<void> {
          const restore = [...totalsBySku(items)].sort(([a], [b]) => bySku(a, b));

          for (const [sku, qty] of restore) {
               const entry = await this.deps.ledger.lockAndGet(tx, sku);
               if (entry) {
                    await this.deps.ledger.adjust(tx, sku, qty);
               } else {
                    logger.warn({ sku, qty }, 'Restoring stock to a missing SKU, recreating row');
                    await this.deps.ledger.createIfMissing(tx, sku, qty);
               }
          }
     }

     private unitOfWork<T>(action: string, fn: (tx: Tx) => Promise<T>): Promise<T> {
          return runUnitOfWork(this.deps.transact, action, fn);
     }
}

export function createReservationService(): ReservationService {
     return new ReservationService({
          ledger: new PgStockLedger(),
          store: new PgReservationStore(),
          transact: withTransaction,
     });
}
