import { PoolClient } from 'pg';
import type { Payment } from '../types/commerce.types';
import { DuplicateRecordError, isUniqueViolation, PaymentNotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

interface PaymentRow {
     id: string;
     order_id: string;
     amount: number;
     status: string;
}

function toPayment(row: PaymentRow): Payment {
     return {
          id: row.id,
          orderId: row.order_id,
          amount: Number(row.amount),
          status: row.status,
     };
}

export class PaymentService {
     async createPayment(client: PoolClient, payment: Payment): Promise<Payment> {
          try {
               await client.query(
                    `
        INSERT INTO payments (id, order_id, amount, status)
        VALUES ($1, $2, $3, $4)
      `,
                    [payment.id, payment.orderId, payment.amount, payment.status]
               );
          } catch (error) {
               if (isUniqueViolation(error)) {
                    throw new DuplicateRecordError('Payment', payment.id);
               }
               throw error;
          }

          logger.info({ paymentId: payment.id, orderId: payment.orderId }, 'Payment recorded');
          return payment;
     }

     async getPayment(client: PoolClient, id: string): Promise<Payment> {
          const { rows } = await client.query<PaymentRow>(
               `SELECT id, order_id, amount, status FROM payments WHERE id = $1`,
               [id]
          );
          if (rows.length === 0) {
               throw new PaymentNotFoundError(id);
          }
          return toPayment(rows[0]);
     }

     async listPayments(client: PoolClient): Promise<Payment[]> {
          const { rows } = await client.query<PaymentRow>(
               `SELECT id, order_id, amount, status FROM payments`
          );
          return rows.map(toPayment);
     }

     async replacePayment(client: PoolClient, payment: Payment): Promise<Payment> {
          const { rowCount } = await client.query(
               `
      UPDATE payments
      SET order_id = $2,
          amount = $3,
          status = $4,
          updated_at = NOW()
      WHERE id = $1
    `,
               [payment.id, payment.orderId, payment.amount, payment.status]
          );
          if ((rowCount ?? 0) === 0) {
               throw new PaymentNotFoundError(payment.id);
          }
          return payment;
     }

     async deletePayment(client: PoolClient, id: string): Promise<void> {
          await client.query(`DELETE FROM payments WHERE id = $1`, [id]);
     }
}
