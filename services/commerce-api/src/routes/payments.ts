import { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { withConnection, withTransaction } from '@stockroom/shared/src/db/client';
import { PaymentService } from '@stockroom/shared/src/services/payment-service';
import type { Payment } from '@stockroom/shared/src/types/commerce.types';
import {
     createPaymentSchema,
     deletePaymentSchema,
     getPaymentSchema,
     listPaymentsSchema,
     replacePaymentSchema,
} from '../schemas/payment.schemas';
import { sendStorageError } from './errors';

export interface PaymentRoutesOptions extends FastifyPluginOptions {
     paymentService?: PaymentService;
}

type IdParams = { Params: { id: string } };

export async function registerPaymentRoutes(app: FastifyInstance, options: PaymentRoutesOptions) {
     const paymentService = options.paymentService ?? new PaymentService();

     app.post<{ Body: Payment }>('/', { schema: createPaymentSchema }, async (request, reply) => {
          try {
               const payment = await withTransaction((tx) =>
                    paymentService.createPayment(tx.client, request.body)
               );
               return reply.code(201).send(payment);
          } catch (error) {
               return sendStorageError(request, reply, error, 'create payment');
          }
     });

     app.get('/', { schema: listPaymentsSchema }, async (request, reply) => {
          try {
               return reply.send(
                    await withConnection((client) => paymentService.listPayments(client))
               );
          } catch (error) {
               return sendStorageError(request, reply, error, 'list payments');
          }
     });

     app.get<IdParams>('/:id', { schema: getPaymentSchema }, async (request, reply) => {
          try {
               const payment = await withConnection((client) =>
                    paymentService.getPayment(client, request.params.id)
               );
               return reply.send(payment);
          } catch (error) {
               return sendStorageError(request, reply, error, 'get payment');
          }
     });

     app.put<IdParams & { Body: Omit<Payment, 'id'> }>(
          '/:id',
          { schema: replacePaymentSchema },
          async (request, reply) => {
               try {
                    const payment = await withTransaction((tx) =>
                         paymentService.replacePayment(tx.client, {
                              ...request.body,
                              id: request.params.id,
                         })
                    );
                    return reply.send(payment);
               } catch (error) {
                    return sendStorageError(request, reply, error, 'replace payment');
               }
          }
     );

     app.delete<IdParams>('/:id', { schema: deletePaymentSchema }, async (request, reply) => {
          try {
               await withTransaction((tx) =>
                    paymentService.deletePayment(tx.client, request.params.id)
               );
               return reply.code(204).send();
          } catch (error) {
               return sendStorageError(request, reply, error, 'delete payment');
          }
     });
}
