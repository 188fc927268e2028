import { PoolClient } from 'pg';
import { findOrderColumn, ORDER_COLUMNS, OrderColumn, toColumnValue } from '../db/schema';
import type {
     JsonObject,
     NewOrder,
     Order,
     OrderPatch,
     RefundMetadataResult,
} from '../types/commerce.types';
import { DuplicateRecordError, isUniqueViolation, OrderNotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

interface OrderRow {
     id: string;
     user_id: string | null;
     address: JsonObject | null;
     items: unknown[];
     total: number;
     currency: string | null;
     status: string;
     refund_attempt: JsonObject | null;
     payment_refund_status: string | null;
}

const ORDER_SELECT =
     'id, user_id, address, items, total, currency, status, refund_attempt, payment_refund_status';

function toOrder(row: OrderRow): Order {
     return {
          id: row.id,
          userId: row.user_id,
          address: row.address,
          items: row.items,
          total: Number(row.total),
          currency: row.currency,
          status: row.status,
          refundAttempt: row.refund_attempt,
          paymentRefundStatus: row.payment_refund_status,
     };
}

function placeholder(column: OrderColumn, index: number): string {
     return column.json ? `$${index}::jsonb` : `$${index}`;
}

/**
 * Shallow merge: fields present in the patch win, everything else is kept.
 */
export function mergeOrder(existing: Order, patch: OrderPatch): Order {
     return { ...existing, ...patch, id: existing.id };
}

export class OrderService {
     async createOrder(client: PoolClient, input: NewOrder): Promise<Order> {
          const order: Order = {
               userId: null,
               address: null,
               currency: 'INR',
               refundAttempt: null,
               paymentRefundStatus: null,
               ...input,
          };

          const columns = ORDER_COLUMNS.map((c) => c.column).join(', ');
          const values = ORDER_COLUMNS.map((c, i) => placeholder(c, i + 2)).join(', ');

          try {
               await client.query(`INSERT INTO orders (id, ${columns}) VALUES ($1, ${values})`, [
                    order.id,
                    ...ORDER_COLUMNS.map((c) => toColumnValue(c, order[c.field])),
               ]);
          } catch (error) {
               if (isUniqueViolation(error)) {
                    throw new DuplicateRecordError('Order', order.id);
               }
               throw error;
          }

          logger.info({ orderId: order.id, status: order.status }, 'Order created');
          return order;
     }

     async getOrder(client: PoolClient, id: string): Promise<Order> {
          const { rows } = await client.query<OrderRow>(
               `SELECT ${ORDER_SELECT} FROM orders WHERE id = $1`,
               [id]
          );
          if (rows.length === 0) {
               throw new OrderNotFoundError(id);
          }
          return toOrder(rows[0]);
     }

     async listOrders(client: PoolClient): Promise<Order[]> {
          const { rows } = await client.query<OrderRow>(`SELECT ${ORDER_SELECT} FROM orders`);
          return rows.map(toOrder);
     }

     /**
      * Merge-update under a row lock. Run inside a transaction.
      */
     async updateOrder(client: PoolClient, id: string, patch: OrderPatch): Promise<Order> {
          const { rows } = await client.query<OrderRow>(
               `
      SELECT ${ORDER_SELECT}
      FROM orders
      WHERE id = $1
      FOR UPDATE
    `,
               [id]
          );
          if (rows.length === 0) {
               throw new OrderNotFoundError(id);
          }

          const merged = mergeOrder(toOrder(rows[0]), patch);
          const assignments = ORDER_COLUMNS.map((c, i) => `${c.column} = ${placeholder(c, i + 2)}`);

          await client.query(
               `UPDATE orders SET ${assignments.join(', ')}, updated_at = NOW() WHERE id = $1`,
               [id, ...ORDER_COLUMNS.map((c) => toColumnValue(c, merged[c.field]))]
          );

          logger.info({ orderId: id, fields: Object.keys(patch) }, 'Order updated');
          return merged;
     }

     async deleteOrder(client: PoolClient, id: string): Promise<void> {
          await client.query(`DELETE FROM orders WHERE id = $1`, [id]);
     }

     /**
      * Write whichever payload keys name a known order column and report them.
      * Unknown keys are skipped, never rejected.
      */
     async patchOrderColumns(
          client: PoolClient,
          id: string,
          payload: Record<string, unknown>
     ): Promise<RefundMetadataResult> {
          const applicable = new Map<string, { key: string; column: OrderColumn; value: unknown }>();
          for (const [key, value] of Object.entries(payload)) {
               const column = findOrderColumn(key);
               if (column) {
                    applicable.set(column.column, { key, column, value });
               }
          }

          if (applicable.size === 0) {
               logger.debug({ orderId: id, keys: Object.keys(payload) }, 'No order columns to patch');
               return { updated: false, updatedKeys: [], reason: 'no matching columns' };
          }

          const entries = [...applicable.values()];
          const assignments = entries.map(
               ({ column }, i) => `${column.column} = ${placeholder(column, i + 2)}`
          );

          const { rowCount } = await client.query(
               `UPDATE orders SET ${assignments.join(', ')}, updated_at = NOW() WHERE id = $1`,
               [id, ...entries.map(({ column, value }) => toColumnValue(column, value))]
          );
          if ((rowCount ?? 0) === 0) {
               throw new OrderNotFoundError(id);
          }

          const updatedKeys = entries.map(({ key }) => key);
          logger.info({ orderId: id, updatedKeys }, 'Order columns patched');
          return { updated: true, updatedKeys };
     }
}
