import {
     asStorageFailure,
     DomainError,
     DuplicateRecordError,
     InsufficientStockError,
     InvalidQuantityError,
     InvalidReservationTransitionError,
     isUniqueViolation,
     OrderNotFoundError,
     ReservationConflictError,
     SkuNotFoundError,
     StorageFailureError,
} from '@stockroom/shared/src/utils/errors';

describe('Error Classes', () => {
     describe('DomainError', () => {
          it('should create a domain error with message and code', () => {
               const error = new DomainError('Test error', 'TEST_CODE');
               expect(error.message).toBe('Test error');
               expect(error.code).toBe('TEST_CODE');
               expect(error.statusCode).toBe(400);
               expect(error.name).toBe('DomainError');
               expect(error instanceof Error).toBe(true);
          });

          it('should accept custom status code', () => {
               const error = new DomainError('Test error', 'TEST_CODE', 500);
               expect(error.statusCode).toBe(500);
          });
     });

     describe('InsufficientStockError', () => {
          it('should carry the SKU and quantities', () => {
               const error = new InsufficientStockError('SKU-001', 7, 6);
               expect(error.message).toBe('Insufficient stock for SKU-001: requested 7, available 6');
               expect(error.code).toBe('INSUFFICIENT_STOCK');
               expect(error.statusCode).toBe(409);
               expect(error.sku).toBe('SKU-001');
               expect(error.requested).toBe(7);
               expect(error.available).toBe(6);
               expect(error.name).toBe('InsufficientStockError');
          });
     });

     describe('SkuNotFoundError', () => {
          it('should default to 404', () => {
               const error = new SkuNotFoundError('SKU-404');
               expect(error.message).toBe('SKU SKU-404 not found');
               expect(error.code).toBe('SKU_NOT_FOUND');
               expect(error.statusCode).toBe(404);
          });

          it('should accept a conflict status for reservations', () => {
               expect(new SkuNotFoundError('SKU-404', 409).statusCode).toBe(409);
          });
     });

     describe('InvalidQuantityError', () => {
          it('should create error with message', () => {
               const error = new InvalidQuantityError('Quantity must be positive');
               expect(error.message).toBe('Quantity must be positive');
               expect(error.code).toBe('INVALID_QUANTITY');
               expect(error.statusCode).toBe(400);
          });
     });

     describe('Reservation errors', () => {
          it('should use a default conflict message', () => {
               const error = new ReservationConflictError('RES-1');
               expect(error.message).toBe('Reservation RES-1 already exists with different lines');
               expect(error.statusCode).toBe(409);
          });

          it('should describe a rejected transition', () => {
               const error = new InvalidReservationTransitionError('RES-1', 'committed', 'released');
               expect(error.message).toBe('Reservation RES-1 cannot move from committed to released');
               expect(error.code).toBe('INVALID_RESERVATION_TRANSITION');
               expect(error.from).toBe('committed');
               expect(error.to).toBe('released');
          });
     });

     describe('Record errors', () => {
          it('should report a missing order', () => {
               const error = new OrderNotFoundError('ORD-1');
               expect(error.message).toBe('Order ORD-1 not found');
               expect(error.statusCode).toBe(404);
          });

          it('should report a duplicate id', () => {
               const error = new DuplicateRecordError('Payment', 'PAY-1');
               expect(error.message).toBe('Payment PAY-1 already exists');
               expect(error.code).toBe('DUPLICATE_RECORD');
               expect(error.statusCode).toBe(409);
          });
     });

     describe('asStorageFailure', () => {
          it('should pass domain errors through', () => {
               const error = new InsufficientStockError('SKU-001', 2, 1);
               expect(asStorageFailure(error, 'reserve inventory')).toBe(error);
          });

          it('should wrap driver errors', () => {
               const cause = new Error('connection reset');
               const failure = asStorageFailure(cause, 'reserve inventory');

               expect(failure).toBeInstanceOf(StorageFailureError);
               expect(failure.message).toBe(
                    'Storage failure while trying to reserve inventory: connection reset'
               );
               expect(failure.statusCode).toBe(500);
               expect(failure).toMatchObject({ originalError: cause });
          });

          it('should wrap non-Error values', () => {
               expect(asStorageFailure('timeout', 'list stock').message).toBe(
                    'Storage failure while trying to list stock: timeout'
               );
          });
     });

     describe('isUniqueViolation', () => {
          it('should detect the PostgreSQL unique_violation code', () => {
               expect(isUniqueViolation({ code: '23505' })).toBe(true);
          });

          it('should ignore other errors', () => {
               expect(isUniqueViolation({ code: '23503' })).toBe(false);
               expect(isUniqueViolation(new Error('boom'))).toBe(false);
               expect(isUniqueViolation(null)).toBe(false);
          });
     });
});
