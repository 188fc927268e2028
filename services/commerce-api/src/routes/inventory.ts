import { FastifyInstance, FastifyPluginOptions } from 'fastify';
import {
     createInventoryService,
     InventoryService,
} from '@stockroom/shared/src/services/inventory-service';
import type { StockEntry } from '@stockroom/shared/src/types/commerce.types';
import {
     adjustStockSchema,
     deleteStockSchema,
     getStockSchema,
     listStockSchema,
     setStockSchema,
     upsertStockSchema,
} from '../schemas/inventory.schemas';
import { sendError } from './errors';

export type InventoryOperations = Pick<
     InventoryService,
     'upsertStock' | 'getStock' | 'listStock' | 'setStock' | 'adjustStock' | 'deleteStock'
>;

export interface InventoryRoutesOptions extends FastifyPluginOptions {
     inventoryService?: InventoryOperations;
}

type SkuParams = { Params: { sku: string } };

export async function registerInventoryRoutes(
     app: FastifyInstance,
     options: InventoryRoutesOptions
) {
     const inventoryService = options.inventoryService ?? createInventoryService();

     app.post<{ Body: StockEntry }>('/', { schema: upsertStockSchema }, async (request, reply) => {
          try {
               return reply.code(201).send(await inventoryService.upsertStock(request.body));
          } catch (error) {
               return sendError(request, reply, error, 'Failed to upsert stock');
          }
     });

     app.get('/', { schema: listStockSchema }, async (request, reply) => {
          try {
               return reply.send(await inventoryService.listStock());
          } catch (error) {
               return sendError(request, reply, error, 'Failed to list stock');
          }
     });

     app.get<SkuParams>('/:sku', { schema: getStockSchema }, async (request, reply) => {
          try {
               return reply.send(await inventoryService.getStock(request.params.sku));
          } catch (error) {
               return sendError(request, reply, error, 'Failed to get stock');
          }
     });

     app.put<SkuParams & { Body: { quantity: number } }>(
          '/:sku',
          { schema: setStockSchema },
          async (request, reply) => {
               try {
                    const entry = await inventoryService.setStock(
                         request.params.sku,
                         request.body.quantity
                    );
                    return reply.send(entry);
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to set stock');
               }
          }
     );

     // Manual adjustment
     app.post<SkuParams & { Body: { delta: number } }>(
          '/:sku/adjust',
          { schema: adjustStockSchema },
          async (request, reply) => {
               try {
                    const entry = await inventoryService.adjustStock(
                         request.params.sku,
                         request.body.delta
                    );
                    request.log.info(
                         { sku: entry.sku, delta: request.body.delta },
                         'Manual adjustment applied'
                    );
                    return reply.send(entry);
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to adjust stock');
               }
          }
     );

     app.delete<SkuParams>('/:sku', { schema: deleteStockSchema }, async (request, reply) => {
          try {
               await inventoryService.deleteStock(request.params.sku);
               return reply.code(204).send();
          } catch (error) {
               return sendError(request, reply, error, 'Failed to delete stock');
          }
     });
}
