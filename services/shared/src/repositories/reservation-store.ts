import { Transaction } from '../db/client';
import type { Reservation, ReservationLine } from '../types/commerce.types';
import { DuplicateRecordError, isUniqueViolation } from '../utils/errors';

/**
 * Keyed storage for reservation records. No business rules live here.
 */
export interface ReservationStore<Tx = Transaction> {
     findById(tx: Tx, id: string): Promise<Reservation | undefined>;
     lockById(tx: Tx, id: string): Promise<Reservation | undefined>;
     list(tx: Tx): Promise<Reservation[]>;
     insert(tx: Tx, reservation: Reservation): Promise<Reservation>;
     update(tx: Tx, reservation: Reservation): Promise<Reservation>;
     delete(tx: Tx, id: string): Promise<boolean>;
}

interface ReservationRow {
     id: string;
     order_id: string;
     items: ReservationLine[];
     status: string;
}

function toReservation(row: ReservationRow): Reservation {
     return {
          id: row.id,
          orderId: row.order_id,
          items: row.items.map((line) => ({ sku: line.sku, qty: Number(line.qty) })),
          status: row.status,
     };
}

const RESERVATION_COLUMNS = 'id, order_id, items, status';

export class PgReservationStore implements ReservationStore {
     async findById(tx: Transaction, id: string): Promise<Reservation | undefined> {
          const { rows } = await tx.query<ReservationRow>(
               `SELECT ${RESERVATION_COLUMNS} FROM inventory_reservations WHERE id = $1`,
               [id]
          );
          return rows.length > 0 ? toReservation(rows[0]) : undefined;
     }

     async lockById(tx: Transaction, id: string): Promise<Reservation | undefined> {
          const { rows } = await tx.query<ReservationRow>(
               `
      SELECT ${RESERVATION_COLUMNS}
      FROM inventory_reservations
      WHERE id = $1
      FOR UPDATE
    `,
               [id]
          );
          return rows.length > 0 ? toReservation(rows[0]) : undefined;
     }

     async list(tx: Transaction): Promise<Reservation[]> {
          const { rows } = await tx.query<ReservationRow>(
               `SELECT ${RESERVATION_COLUMNS} FROM inventory_reservations`
          );
          return rows.map(toReservation);
     }

     async insert(tx: Transaction, reservation: Reservation): Promise<Reservation> {
          try {
               await tx.query(
                    `
        INSERT INTO inventory_reservations (id, order_id, items, status)
        VALUES ($1, $2, $3::jsonb, $4)
      `,
                    [
                         reservation.id,
                         reservation.orderId,
                         JSON.stringify(reservation.items),
                         reservation.status,
                    ]
               );
          } catch (error) {
               if (isUniqueViolation(error)) {
                    throw new DuplicateRecordError('Reservation', reservation.id);
               }
               throw error;
          }
          return reservation;
     }

     async update(tx: Transaction, reservation: Reservation): Promise<Reservation> {
          await tx.query(
               `
      UPDATE inventory_reservations
      SET order_id = $2,
          items = $3::jsonb,
          status = $4,
          updated_at = NOW()
      WHERE id = $1
    `,
               [
                    reservation.id,
                    reservation.orderId,
                    JSON.stringify(reservation.items),
                    reservation.status,
               ]
          );
          return reservation;
     }

     async delete(tx: Transaction, id: string): Promise<boolean> {
          const { rowCount } = await tx.query(`DELETE FROM inventory_reservations WHERE id = $1`, [
               id,
          ]);
          return (rowCount ?? 0) > 0;
     }
}
