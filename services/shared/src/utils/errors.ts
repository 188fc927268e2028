// Custom error classes for domain-specific errors

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export class InsufficientStockError extends DomainError {
     constructor(
          public readonly sku: string,
          public readonly requested: number,
          public readonly available: number
     ) {
          super(
               `Insufficient stock for ${sku}: requested ${requested}, available ${available}`,
               'INSUFFICIENT_STOCK',
               409
          );
     }
}

/**
 * A SKU with no inventory row. Reported as 404 on direct stock access and as
 * 409 when a reservation names it.
 */
export class SkuNotFoundError extends DomainError {
     constructor(
          public readonly sku: string,
          statusCode: number = 404
     ) {
          super(`SKU ${sku} not found`, 'SKU_NOT_FOUND', statusCode);
     }
}

export class InvalidQuantityError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_QUANTITY', 400);
     }
}

export class ReservationNotFoundError extends DomainError {
     constructor(public readonly reservationId: string) {
          super(`Reservation ${reservationId} not found`, 'RESERVATION_NOT_FOUND', 404);
     }
}

export class ReservationConflictError extends DomainError {
     constructor(
          public readonly reservationId: string,
          message: string = `Reservation ${reservationId} already exists with different lines`
     ) {
          super(message, 'RESERVATION_CONFLICT', 409);
     }
}

export class InvalidReservationTransitionError extends DomainError {
     constructor(
          public readonly reservationId: string,
          public readonly from: string,
          public readonly to: string
     ) {
          super(
               `Reservation ${reservationId} cannot move from ${from} to ${to}`,
               'INVALID_RESERVATION_TRANSITION',
               409
          );
     }
}

export class OrderNotFoundError extends DomainError {
     constructor(public readonly orderId: string) {
          super(`Order ${orderId} not found`, 'ORDER_NOT_FOUND', 404);
     }
}

export class PaymentNotFoundError extends DomainError {
     constructor(public readonly paymentId: string) {
          super(`Payment ${paymentId} not found`, 'PAYMENT_NOT_FOUND', 404);
     }
}

export class ShipmentNotFoundError extends DomainError {
     constructor(public readonly shipmentId: string) {
          super(`Shipment ${shipmentId} not found`, 'SHIPMENT_NOT_FOUND', 404);
     }
}

export class DuplicateRecordError extends DomainError {
     constructor(
          public readonly entity: string,
          public readonly recordId: string
     ) {
          super(`${entity} ${recordId} already exists`, 'DUPLICATE_RECORD', 409);
     }
}

export class StorageFailureError extends DomainError {
     constructor(
          message: string,
          public readonly originalError?: unknown
     ) {
          super(message, 'STORAGE_FAILURE', 500);
     }
}

/**
 * Domain errors pass through untouched; anything else raised while talking to
 * the database becomes a StorageFailureError.
 */
export function asStorageFailure(error: unknown, action: string): DomainError {
     if (error instanceof DomainError) {
          return error;
     }
     const detail = error instanceof Error ? error.message : String(error);
     return new StorageFailureError(`Storage failure while trying to ${action}: ${detail}`, error);
}

// PostgreSQL unique_violation
export function isUniqueViolation(error: unknown): boolean {
     return (
          typeof error === 'object' && error !== null && 'code' in error && error.code === '23505'
     );
}
