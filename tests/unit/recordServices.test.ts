import { PoolClient } from 'pg';
import { PaymentService } from '@stockroom/shared/src/services/payment-service';
import { ShipmentService } from '@stockroom/shared/src/services/shipment-service';
import {
     DuplicateRecordError,
     PaymentNotFoundError,
     ShipmentNotFoundError,
} from '@stockroom/shared/src/utils/errors';

describe('Payment and shipment records (Unit)', () => {
     let mockClient: jest.Mocked<PoolClient>;

     beforeEach(() => {
          mockClient = {
               query: jest.fn(),
          } as unknown as jest.Mocked<PoolClient>;
     });

     describe('PaymentService', () => {
          const paymentService = new PaymentService();
          const payment = { id: 'PAY-1', orderId: 'ORD-1', amount: 99.5, status: 'captured' };

          it('should insert a payment', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [], rowCount: 1 } as never);

               await expect(paymentService.createPayment(mockClient, payment)).resolves.toEqual(
                    payment
               );
               expect(mockClient.query).toHaveBeenCalledWith(
                    expect.stringContaining('INSERT INTO payments'),
                    ['PAY-1', 'ORD-1', 99.5, 'captured']
               );
          });

          it('should reject a duplicate payment id', async () => {
               mockClient.query.mockRejectedValueOnce({ code: '23505' } as never);

               await expect(paymentService.createPayment(mockClient, payment)).rejects.toThrow(
                    'Payment PAY-1 already exists'
               );
          });

          it('should coerce numeric amounts read back', async () => {
               mockClient.query.mockResolvedValueOnce({
                    rows: [{ id: 'PAY-1', order_id: 'ORD-1', amount: '99.5', status: 'captured' }],
               } as never);

               await expect(paymentService.getPayment(mockClient, 'PAY-1')).resolves.toEqual(payment);
          });

          it('should throw when replacing a missing payment', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [], rowCount: 0 } as never);

               await expect(paymentService.replacePayment(mockClient, payment)).rejects.toThrow(
                    PaymentNotFoundError
               );
          });

          it('should delete without checking existence', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [], rowCount: 0 } as never);

               await expect(paymentService.deletePayment(mockClient, 'PAY-404')).resolves.toBeUndefined();
          });
     });

     describe('ShipmentService', () => {
          const shipmentService = new ShipmentService();
          const shipment = {
               id: 'SHP-1',
               orderId: 'ORD-1',
               address: { city: 'Pune', pin: '411001' },
               items: [{ sku: 'SKU-A', qty: 1 }],
               status: 'packed',
          };

          it('should store address and items as JSONB', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [], rowCount: 1 } as never);

               await shipmentService.createShipment(mockClient, shipment);

               expect(mockClient.query).toHaveBeenCalledWith(
                    expect.stringContaining('$3::jsonb, $4::jsonb'),
                    [
                         'SHP-1',
                         'ORD-1',
                         '{"city":"Pune","pin":"411001"}',
                         '[{"sku":"SKU-A","qty":1}]',
                         'packed',
                    ]
               );
          });

          it('should reject a duplicate shipment id', async () => {
               mockClient.query.mockRejectedValueOnce({ code: '23505' } as never);

               await expect(shipmentService.createShipment(mockClient, shipment)).rejects.toThrow(
                    DuplicateRecordError
               );
          });

          it('should throw for a missing shipment', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [] } as never);

               await expect(shipmentService.getShipment(mockClient, 'SHP-404')).rejects.toThrow(
                    ShipmentNotFoundError
               );
          });

          it('should replace an existing shipment', async () => {
               mockClient.query.mockResolvedValueOnce({ rows: [], rowCount: 1 } as never);

               await expect(
                    shipmentService.replaceShipment(mockClient, { ...shipment, status: 'shipped' })
               ).resolves.toMatchObject({ status: 'shipped' });
          });
     });
});
