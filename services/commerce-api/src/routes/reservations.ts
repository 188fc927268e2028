import { FastifyInstance, FastifyPluginOptions } from 'fastify';
import {
     createReservationService,
     ReservationService,
} from '@stockroom/shared/src/services/reservation-service';
import type {
     ReserveInventoryRequest,
     UpdateReservationRequest,
} from '@stockroom/shared/src/types/commerce.types';
import {
     createReservationSchema,
     deleteReservationSchema,
     getReservationSchema,
     listReservationsSchema,
     updateReservationSchema,
} from '../schemas/reservation.schemas';
import { sendError } from './errors';

export type ReservationOperations = Pick<
     ReservationService,
     | 'createReservation'
     | 'getReservation'
     | 'listReservations'
     | 'updateReservation'
     | 'deleteReservation'
>;

export interface ReservationRoutesOptions extends FastifyPluginOptions {
     reservationService?: ReservationOperations;
}

export async function registerReservationRoutes(
     app: FastifyInstance,
     options: ReservationRoutesOptions
) {
     const reservationService = options.reservationService ?? createReservationService();

     // Reserve stock for an order
     app.post<{ Body: ReserveInventoryRequest }>(
          '/',
          { schema: createReservationSchema },
          async (request, reply) => {
               try {
                    const reservation = await reservationService.createReservation(request.body);
                    return reply.code(201).send(reservation);
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to reserve inventory');
               }
          }
     );

     app.get('/', { schema: listReservationsSchema }, async (request, reply) => {
          try {
               return reply.send(await reservationService.listReservations());
          } catch (error) {
               return sendError(request, reply, error, 'Failed to list reservations');
          }
     });

     app.get<{ Params: { id: string } }>(
          '/:id',
          { schema: getReservationSchema },
          async (request, reply) => {
               try {
                    return reply.send(await reservationService.getReservation(request.params.id));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to get reservation');
               }
          }
     );

     // Release, commit or overwrite a reservation
     app.put<{ Params: { id: string }; Body: UpdateReservationRequest }>(
          '/:id',
          { schema: updateReservationSchema },
          async (request, reply) => {
               try {
                    const reservation = await reservationService.updateReservation(
                         request.params.id,
                         request.body
                    );
                    return reply.send(reservation);
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to update reservation');
               }
          }
     );

     app.delete<{ Params: { id: string } }>(
          '/:id',
          { schema: deleteReservationSchema },
          async (request, reply) => {
               try {
                    await reservationService.deleteReservation(request.params.id);
                    return reply.code(204).send();
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to delete reservation');
               }
          }
     );
}
