import { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { withConnection, withTransaction } from '@stockroom/shared/src/db/client';
import { OrderService } from '@stockroom/shared/src/services/order-service';
import type { NewOrder, OrderPatch } from '@stockroom/shared/src/types/commerce.types';
import {
     createOrderSchema,
     deleteOrderSchema,
     getOrderSchema,
     listOrdersSchema,
     refundMetadataSchema,
     updateOrderSchema,
} from '../schemas/order.schemas';
import { sendStorageError } from './errors';

export interface OrderRoutesOptions extends FastifyPluginOptions {
     orderService?: OrderService;
}

type IdParams = { Params: { id: string } };

export async function registerOrderRoutes(app: FastifyInstance, options: OrderRoutesOptions) {
     const orderService = options.orderService ?? new OrderService();

     app.post<{ Body: NewOrder }>('/', { schema: createOrderSchema }, async (request, reply) => {
          try {
               const order = await withTransaction((tx) =>
                    orderService.createOrder(tx.client, request.body)
               );
               return reply.code(201).send(order);
          } catch (error) {
               return sendStorageError(request, reply, error, 'create order');
          }
     });

     app.get('/', { schema: listOrdersSchema }, async (request, reply) => {
          try {
               return reply.send(await withConnection((client) => orderService.listOrders(client)));
          } catch (error) {
               return sendStorageError(request, reply, error, 'list orders');
          }
     });

     app.get<IdParams>('/:id', { schema: getOrderSchema }, async (request, reply) => {
          try {
               const order = await withConnection((client) =>
                    orderService.getOrder(client, request.params.id)
               );
               return reply.send(order);
          } catch (error) {
               return sendStorageError(request, reply, error, 'get order');
          }
     });

     app.put<IdParams & { Body: OrderPatch }>(
          '/:id',
          { schema: updateOrderSchema },
          async (request, reply) => {
               try {
                    const order = await withTransaction((tx) =>
                         orderService.updateOrder(tx.client, request.params.id, request.body)
                    );
                    return reply.send(order);
               } catch (error) {
                    return sendStorageError(request, reply, error, 'update order');
               }
          }
     );

     app.delete<IdParams>('/:id', { schema: deleteOrderSchema }, async (request, reply) => {
          try {
               await withTransaction((tx) => orderService.deleteOrder(tx.client, request.params.id));
               return reply.code(204).send();
          } catch (error) {
               return sendStorageError(request, reply, error, 'delete order');
          }
     });

     // Refund bookkeeping writes only allow-listed columns
     app.post<IdParams & { Body: Record<string, unknown> }>(
          '/:id/refund-metadata',
          { schema: refundMetadataSchema },
          async (request, reply) => {
               try {
                    const result = await withTransaction((tx) =>
                         orderService.patchOrderColumns(tx.client, request.params.id, request.body)
                    );
                    return reply.send(result);
               } catch (error) {
                    return sendStorageError(request, reply, error, 'patch refund metadata');
               }
          }
     );
}
