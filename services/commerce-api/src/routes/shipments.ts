import { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { withConnection, withTransaction } from '@stockroom/shared/src/db/client';
import { ShipmentService } from '@stockroom/shared/src/services/shipment-service';
import type { Shipment } from '@stockroom/shared/src/types/commerce.types';
import {
     createShipmentSchema,
     deleteShipmentSchema,
     getShipmentSchema,
     listShipmentsSchema,
     replaceShipmentSchema,
} from '../schemas/shipment.schemas';
import { sendStorageError } from './errors';

export interface ShipmentRoutesOptions extends FastifyPluginOptions {
     shipmentService?: ShipmentService;
}

type IdParams = { Params: { id: string } };

export async function registerShipmentRoutes(
     app: FastifyInstance,
     options: ShipmentRoutesOptions
) {
     const shipmentService = options.shipmentService ?? new ShipmentService();

     app.post<{ Body: Shipment }>('/', { schema: createShipmentSchema }, async (request, reply) => {
          try {
               const shipment = await withTransaction((tx) =>
                    shipmentService.createShipment(tx.client, request.body)
               );
               return reply.code(201).send(shipment);
          } catch (error) {
               return sendStorageError(request, reply, error, 'create shipment');
          }
     });

     app.get('/', { schema: listShipmentsSchema }, async (request, reply) => {
          try {
               return reply.send(
                    await withConnection((client) => shipmentService.listShipments(client))
               );
          } catch (error) {
               return sendStorageError(request, reply, error, 'list shipments');
          }
     });

     app.get<IdParams>('/:id', { schema: getShipmentSchema }, async (request, reply) => {
          try {
               const shipment = await withConnection((client) =>
                    shipmentService.getShipment(client, request.params.id)
               );
               return reply.send(shipment);
          } catch (error) {
               return sendStorageError(request, reply, error, 'get shipment');
          }
     });

     app.put<IdParams & { Body: Omit<Shipment, 'id'> }>(
          '/:id',
          { schema: replaceShipmentSchema },
          async (request, reply) => {
               try {
                    const shipment = await withTransaction((tx) =>
                         shipmentService.replaceShipment(tx.client, {
                              ...request.body,
                              id: request.params.id,
                         })
                    );
                    return reply.send(shipment);
               } catch (error) {
                    return sendStorageError(request, reply, error, 'replace shipment');
               }
          }
     );

     app.delete<IdParams>('/:id', { schema: deleteShipmentSchema }, async (request, reply) => {
          try {
               await withTransaction((tx) =>
                    shipmentService.deleteShipment(tx.client, request.params.id)
               );
               return reply.code(204).send();
          } catch (error) {
               return sendStorageError(request, reply, error, 'delete shipment');
          }
     });
}
