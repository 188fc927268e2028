import type { OrderPatch } from '../types/commerce.types';

export interface OrderColumn {
     field: keyof OrderPatch;
     column: string;
     json: boolean;
}

/**
 * Writable columns of the orders table. Merge-updates write through this list
 * and refund-metadata patches are filtered against it.
 */
export const ORDER_COLUMNS: readonly OrderColumn[] = [
     { field: 'userId', column: 'user_id', json: false },
     { field: 'address', column: 'address', json: true },
     { field: 'items', column: 'items', json: true },
     { field: 'total', column: 'total', json: false },
     { field: 'currency', column: 'currency', json: false },
     { field: 'status', column: 'status', json: false },
     { field: 'refundAttempt', column: 'refund_attempt', json: true },
     { field: 'paymentRefundStatus', column: 'payment_refund_status', json: false },
];

// Accepts either the column name or the API field name
export function findOrderColumn(key: string): OrderColumn | undefined {
     return ORDER_COLUMNS.find((c) => c.column === key || c.field === key);
}

export function toColumnValue(column: OrderColumn, value: unknown): unknown {
     if (column.json && value !== null && value !== undefined) {
          return JSON.stringify(value);
     }
     return value ?? null;
}
