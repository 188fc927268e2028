// Type definitions for domain models

export const RESERVATION_STATUSES = ['reserved', 'released', 'committed'] as const;

export type ReservationStatus = (typeof RESERVATION_STATUSES)[number];

export function isReservationStatus(value: string): value is ReservationStatus {
     return RESERVATION_STATUSES.some((status) => status === value);
}

export interface StockEntry {
     sku: string;
     quantity: number;
}

export interface ReservationLine {
     sku: string;
     qty: number;
}

export interface Reservation {
     id: string;
     orderId: string;
     items: ReservationLine[];
     /**
      * Storage accepts any string; only the ReservationStatus values have
      * transition rules.
      */
     status: string;
}

export interface ReserveInventoryRequest {
     id?: string;
     orderId: string;
     items: ReservationLine[];
}

export interface UpdateReservationRequest {
     orderId: string;
     items: ReservationLine[];
     status: ReservationStatus;
}

export type JsonObject = Record<string, unknown>;

export interface Order {
     id: string;
     userId: string | null;
     address: JsonObject | null;
     items: unknown[];
     total: number;
     currency: string | null;
     status: string;
     refundAttempt: JsonObject | null;
     paymentRefundStatus: string | null;
}

export type NewOrder = Pick<Order, 'id' | 'items' | 'total' | 'status'> &
     Partial<Omit<Order, 'id' | 'items' | 'total' | 'status'>>;

export type OrderPatch = Partial<Omit<Order, 'id'>>;

export interface RefundMetadataResult {
     updated: boolean;
     updatedKeys: string[];
     reason?: string;
}

export interface Payment {
     id: string;
     orderId: string;
     amount: number;
     status: string;
}

export interface Shipment {
     id: string;
     orderId: string;
     address: JsonObject;
     items: unknown[];
     status: string;
}
