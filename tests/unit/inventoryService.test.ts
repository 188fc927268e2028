import { InventoryService } from '@stockroom/shared/src/services/inventory-service';
import {
     InsufficientStockError,
     InvalidQuantityError,
     SkuNotFoundError,
} from '@stockroom/shared/src/utils/errors';
import { createInMemoryBackend, MemoryTransaction } from '../helpers/inMemoryStores';

function setup(stock: Record<string, number>) {
     const backend = createInMemoryBackend(stock);
     const service = new InventoryService<MemoryTransaction>({
          ledger: backend.ledger,
          transact: backend.db.transact,
     });
     return { ...backend, service };
}

describe('InventoryService (Unit)', () => {
     describe('upsertStock', () => {
          it('should create a new SKU', async () => {
               const { service, db } = setup({});

               await expect(service.upsertStock({ sku: 'A', quantity: 3 })).resolves.toEqual({
                    sku: 'A',
                    quantity: 3,
               });
               expect(db.quantityOf('A')).toBe(3);
          });

          it('should replace an existing quantity', async () => {
               const { service, db } = setup({ A: 9 });

               await service.upsertStock({ sku: 'A', quantity: 0 });

               expect(db.quantityOf('A')).toBe(0);
          });

          it('should reject negative quantities', async () => {
               const { service } = setup({});

               await expect(service.upsertStock({ sku: 'A', quantity: -1 })).rejects.toThrow(
                    InvalidQuantityError
               );
          });
     });

     describe('getStock and listStock', () => {
          it('should return a single SKU', async () => {
               const { service } = setup({ A: 4 });

               await expect(service.getStock('A')).resolves.toEqual({ sku: 'A', quantity: 4 });
          });

          it('should throw a 404 for an unknown SKU', async () => {
               const { service } = setup({});

               await expect(service.getStock('GHOST')).rejects.toMatchObject({
                    code: 'SKU_NOT_FOUND',
                    statusCode: 404,
               });
          });

          it('should list SKUs in order', async () => {
               const { service } = setup({ B: 2, A: 1 });

               await expect(service.listStock()).resolves.toEqual([
                    { sku: 'A', quantity: 1 },
                    { sku: 'B', quantity: 2 },
               ]);
          });
     });

     describe('setStock', () => {
          it('should set an absolute quantity', async () => {
               const { service, db } = setup({ A: 4 });

               await expect(service.setStock('A', 10)).resolves.toEqual({ sku: 'A', quantity: 10 });
               expect(db.quantityOf('A')).toBe(10);
          });

          it('should not create a missing SKU', async () => {
               const { service, db } = setup({});

               await expect(service.setStock('A', 10)).rejects.toThrow(SkuNotFoundError);
               expect(db.quantityOf('A')).toBeUndefined();
          });
     });

     describe('adjustStock', () => {
          it('should apply a signed delta', async () => {
               const { service, db } = setup({ A: 4 });

               await service.adjustStock('A', 3);
               await service.adjustStock('A', -5);

               expect(db.quantityOf('A')).toBe(2);
          });

          it('should refuse to go below zero', async () => {
               const { service, db } = setup({ A: 4 });

               const attempt = service.adjustStock('A', -5);

               await expect(attempt).rejects.toThrow(InsufficientStockError);
               await expect(attempt).rejects.toThrow(
                    'Insufficient stock for A: requested 5, available 4'
               );
               expect(db.quantityOf('A')).toBe(4);
          });

          it('should reject a fractional delta', async () => {
               const { service } = setup({ A: 4 });

               await expect(service.adjustStock('A', 0.5)).rejects.toThrow('Delta must be an integer');
          });

          it('should throw for an unknown SKU', async () => {
               const { service } = setup({});

               await expect(service.adjustStock('GHOST', 1)).rejects.toThrow(SkuNotFoundError);
          });

          it('should surface storage errors as storage failures', async () => {
               const { service, ledger, db } = setup({ A: 4 });
               ledger.failNextAdjust('A', new Error('deadlock detected'));

               await expect(service.adjustStock('A', 1)).rejects.toMatchObject({
                    code: 'STORAGE_FAILURE',
                    message: 'Storage failure while trying to adjust stock: deadlock detected',
               });
               expect(db.quantityOf('A')).toBe(4);
          });
     });

     describe('deleteStock', () => {
          it('should remove a SKU and tolerate repeats', async () => {
               const { service, db } = setup({ A: 4 });

               await service.deleteStock('A');
               await service.deleteStock('A');

               expect(db.stock.has('A')).toBe(false);
          });
     });
});
