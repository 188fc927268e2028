import type { TransactionRunner } from '@stockroom/shared/src/db/client';
import type { ReservationStore } from '@stockroom/shared/src/repositories/reservation-store';
import type { StockLedger } from '@stockroom/shared/src/repositories/stock-ledger';
import type { Reservation, StockEntry } from '@stockroom/shared/src/types/commerce.types';
import {
     DuplicateRecordError,
     SkuNotFoundError,
     StorageFailureError,
} from '@stockroom/shared/src/utils/errors';

/**
 * In-process stand-ins for the PostgreSQL ledger and reservation store.
 * Row locks are per-key promise queues held until the transaction ends, and
 * every write records an undo step that runs on rollback.
 */

class RowLocks {
     private readonly tails = new Map<string, Promise<void>>();

     async acquire(key: string): Promise<() => void> {
          const previous = this.tails.get(key) ?? Promise.resolve();
          let release: () => void = () => undefined;
          const current = new Promise<void>((resolve) => {
               release = resolve;
          });
          const tail = previous.then(() => current);
          this.tails.set(key, tail);

          await previous;
          return () => {
               release();
               if (this.tails.get(key) === tail) {
                    this.tails.delete(key);
               }
          };
     }
}

export class MemoryTransaction {
     private open = true;
     private readonly held = new Map<string, () => void>();
     private readonly undo: Array<() => void> = [];

     constructor(private readonly locks: RowLocks) {}

     get isOpen(): boolean {
          return this.open;
     }

     async lock(key: string): Promise<void> {
          if (this.held.has(key)) {
               return;
          }
          const release = await this.locks.acquire(key);
          this.held.set(key, release);
     }

     record(step: () => void): void {
          this.undo.push(step);
     }

     rollback(): void {
          for (const step of [...this.undo].reverse()) {
               step();
          }
          this.undo.length = 0;
     }

     close(): void {
          this.open = false;
          for (const release of this.held.values()) {
               release();
          }
          this.held.clear();
     }
}

export class MemoryDatabase {
     readonly stock = new Map<string, number>();
     readonly reservations = new Map<string, Reservation>();
     readonly locks = new RowLocks();
     committed = 0;
     rolledBack = 0;

     readonly transact: TransactionRunner<MemoryTransaction> = async <T>(
          fn: (tx: MemoryTransaction) => Promise<T>
     ): Promise<T> => {
          const tx = new MemoryTransaction(this.locks);
          try {
               const result = await fn(tx);
               this.committed += 1;
               return result;
          } catch (err) {
               tx.rollback();
               this.rolledBack += 1;
               throw err;
          } finally {
               tx.close();
          }
     };

     seed(entries: Record<string, number>): void {
          for (const [sku, quantity] of Object.entries(entries)) {
               this.stock.set(sku, quantity);
          }
     }

     quantityOf(sku: string): number | undefined {
          return this.stock.get(sku);
     }
}

const stockKey = (sku: string) => `inventory:${sku}`;
const reservationKey = (id: string) => `reservation:${id}`;

export class InMemoryStockLedger implements StockLedger<MemoryTransaction> {
     private readonly failures = new Map<string, Error>();
     adjustCalls = 0;

     constructor(private readonly db: MemoryDatabase) {}

     // The next adjustment of `sku` fails as if the connection dropped
     failNextAdjust(sku: string, error: Error = new Error('connection terminated unexpectedly')) {
          this.failures.set(sku, error);
     }

     async lockAndGet(tx: MemoryTransaction, sku: string): Promise<StockEntry | undefined> {
          await tx.lock(stockKey(sku));
          return this.read(sku);
     }

     async adjust(tx: MemoryTransaction, sku: string, delta: number): Promise<StockEntry> {
          if (!tx.isOpen) {
               throw new StorageFailureError(
                    `Stock adjustment for ${sku} attempted outside an active transaction`
               );
          }
          await tx.lock(stockKey(sku));
          this.adjustCalls += 1;

          const failure = this.failures.get(sku);
          if (failure) {
               this.failures.delete(sku);
               throw failure;
          }

          const current = this.db.stock.get(sku);
          if (current === undefined) {
               throw new SkuNotFoundError(sku);
          }
          const next = current + delta;
          if (next < 0) {
               throw new Error('new row for relation "inventory" violates check constraint');
          }

          tx.record(() => this.db.stock.set(sku, current));
          this.db.stock.set(sku, next);
          return { sku, quantity: next };
     }

     async createIfMissing(tx: MemoryTransaction, sku: string, quantity: number): Promise<StockEntry> {
          await tx.lock(stockKey(sku));
          const previous = this.db.stock.get(sku);
          const next = (previous ?? 0) + quantity;

          tx.record(() => this.restore(sku, previous));
          this.db.stock.set(sku, next);
          return { sku, quantity: next };
     }

     async get(_tx: MemoryTransaction, sku: string): Promise<StockEntry | undefined> {
          return this.read(sku);
     }

     async list(_tx: MemoryTransaction): Promise<StockEntry[]> {
          return [...this.db.stock.keys()]
               .sort()
               .map((sku) => ({ sku, quantity: this.db.stock.get(sku) ?? 0 }));
     }

     async upsert(tx: MemoryTransaction, entry: StockEntry): Promise<StockEntry> {
          await tx.lock(stockKey(entry.sku));
          const previous = this.db.stock.get(entry.sku);

          tx.record(() => this.restore(entry.sku, previous));
          this.db.stock.set(entry.sku, entry.quantity);
          return { ...entry };
     }

     async remove(tx: MemoryTransaction, sku: string): Promise<boolean> {
          await tx.lock(stockKey(sku));
          const previous = this.db.stock.get(sku);
          if (previous === undefined) {
               return false;
          }

          tx.record(() => this.restore(sku, previous));
          this.db.stock.delete(sku);
          return true;
     }

     private read(sku: string): StockEntry | undefined {
          const quantity = this.db.stock.get(sku);
          return quantity === undefined ? undefined : { sku, quantity };
     }

     private restore(sku: string, quantity: number | undefined): void {
          if (quantity === undefined) {
               this.db.stock.delete(sku);
          } else {
               this.db.stock.set(sku, quantity);
          }
     }
}

function copy(reservation: Reservation): Reservation {
     return { ...reservation, items: reservation.items.map((line) => ({ ...line })) };
}

export class InMemoryReservationStore implements ReservationStore<MemoryTransaction> {
     constructor(private readonly db: MemoryDatabase) {}

     async findById(_tx: MemoryTransaction, id: string): Promise<Reservation | undefined> {
          const stored = this.db.reservations.get(id);
          return stored ? copy(stored) : undefined;
     }

     async lockById(tx: MemoryTransaction, id: string): Promise<Reservation | undefined> {
          await tx.lock(reservationKey(id));
          const stored = this.db.reservations.get(id);
          return stored ? copy(stored) : undefined;
     }

     async list(_tx: MemoryTransaction): Promise<Reservation[]> {
          return [...this.db.reservations.values()].map(copy);
     }

     async insert(tx: MemoryTransaction, reservation: Reservation): Promise<Reservation> {
          await tx.lock(reservationKey(reservation.id));
          if (this.db.reservations.has(reservation.id)) {
               throw new DuplicateRecordError('Reservation', reservation.id);
          }

          tx.record(() => this.db.reservations.delete(reservation.id));
          this.db.reservations.set(reservation.id, copy(reservation));
          return reservation;
     }

     async update(tx: MemoryTransaction, reservation: Reservation): Promise<Reservation> {
          await tx.lock(reservationKey(reservation.id));
          const previous = this.db.reservations.get(reservation.id);

          tx.record(() => this.restore(reservation.id, previous));
          this.db.reservations.set(reservation.id, copy(reservation));
          return reservation;
     }

     async delete(tx: MemoryTransaction, id: string): Promise<boolean> {
          await tx.lock(reservationKey(id));
          const previous = this.db.reservations.get(id);
          if (!previous) {
               return false;
          }

          tx.record(() => this.restore(id, previous));
          this.db.reservations.delete(id);
          return true;
     }

     private restore(id: string, reservation: Reservation | undefined): void {
          if (reservation) {
               this.db.reservations.set(id, reservation);
          } else {
               this.db.reservations.delete(id);
          }
     }
}

export interface InMemoryBackend {
     db: MemoryDatabase;
     ledger: InMemoryStockLedger;
     store: InMemoryReservationStore;
}

export function createInMemoryBackend(stock: Record<string, number> = {}): InMemoryBackend {
     const db = new MemoryDatabase();
     db.seed(stock);
     return {
          db,
          ledger: new InMemoryStockLedger(db),
          store: new InMemoryReservationStore(db),
     };
}
