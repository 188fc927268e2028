import Fastify, { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import { randomUUID } from 'crypto';
import { checkConnection } from '@stockroom/shared/src/db/client';
import { registerInventoryRoutes, InventoryOperations } from './routes/inventory';
import { registerOrderRoutes } from './routes/orders';
import { registerPaymentRoutes } from './routes/payments';
import { registerReservationRoutes, ReservationOperations } from './routes/reservations';
import { registerShipmentRoutes } from './routes/shipments';
import { OrderService } from '@stockroom/shared/src/services/order-service';
import { PaymentService } from '@stockroom/shared/src/services/payment-service';
import { ShipmentService } from '@stockroom/shared/src/services/shipment-service';

export interface AppOptions {
     logger?: boolean;
     docs?: boolean;
     reservationService?: ReservationOperations;
     inventoryService?: InventoryOperations;
     orderService?: OrderService;
     paymentService?: PaymentService;
     shipmentService?: ShipmentService;
     readinessCheck?: () => Promise<boolean>;
}

function correlationId(header: string | string[] | undefined): string {
     if (typeof header === 'string' && header.length > 0) {
          return header;
     }
     return `req-${randomUUID()}`;
}

export async function buildApp(options: AppOptions = {}): Promise<FastifyInstance> {
     const app = Fastify({
          logger: options.logger ?? true,
          requestIdHeader: 'x-correlation-id',
          genReqId: (req) => correlationId(req.headers['x-correlation-id']),
          ajv: {
               customOptions: {
                    // Only schemas with additionalProperties: false drop unknown keys
                    removeAdditional: true,
                    coerceTypes: true,
                    useDefaults: true,
                    strict: false,
               },
          },
     });

     await app.register(cors, {
          origin: true,
     });

     if (options.docs ?? true) {
          await app.register(swagger, {
               openapi: {
                    info: {
                         title: 'Stockroom Commerce API',
                         description:
                              'Inventory reservations, stock ledger and order records for the checkout path',
                         version: '1.0.0',
                    },
                    servers: [{ url: 'http://localhost:8000', description: 'Development' }],
                    tags: [
                         { name: 'reservations', description: 'Reserve, release and commit stock' },
                         { name: 'inventory', description: 'Stock ledger administration' },
                         { name: 'orders', description: 'Order records' },
                         { name: 'payments', description: 'Payment records' },
                         { name: 'shipments', description: 'Shipment records' },
                         { name: 'health', description: 'Health and readiness checks' },
                    ],
               },
          });

          await app.register(swaggerUi, {
               routePrefix: '/docs',
               uiConfig: {
                    docExpansion: 'list',
                    deepLinking: true,
               },
          });
     }

     const readinessCheck = options.readinessCheck ?? checkConnection;

     app.get(
          '/health',
          {
               schema: {
                    tags: ['health'],
                    description: 'Basic health check',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ok' },
                                   timestamp: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          async () => {
               return {
                    status: 'ok',
                    timestamp: new Date().toISOString(),
               };
          }
     );

     app.get(
          '/health/ready',
          {
               schema: {
                    tags: ['health'],
                    description: 'Readiness check with dependency validation',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ready' },
                                   dependencies: {
                                        type: 'object',
                                        properties: {
                                             database: { type: 'string' },
                                        },
                                   },
                              },
                         },
                         503: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string' },
                                   error: { type: 'string' },
                              },
                         },
                    },
               },
          },
          async (_request, reply) => {
               try {
                    const dbHealthy = await readinessCheck();
                    if (!dbHealthy) {
                         reply.code(503);
                         return {
                              status: 'not_ready',
                              error: 'Database connection failed',
                         };
                    }

                    return {
                         status: 'ready',
                         dependencies: {
                              database: 'ok',
                         },
                    };
               } catch (error) {
                    reply.code(503);
                    return {
                         status: 'not_ready',
                         error: error instanceof Error ? error.message : 'Unknown error',
                    };
               }
          }
     );

     await app.register(registerReservationRoutes, {
          prefix: '/reservations',
          reservationService: options.reservationService,
     });
     await app.register(registerInventoryRoutes, {
          prefix: '/inventory',
          inventoryService: options.inventoryService,
     });
     await app.register(registerOrderRoutes, {
          prefix: '/orders',
          orderService: options.orderService,
     });
     await app.register(registerPaymentRoutes, {
          prefix: '/payments',
          paymentService: options.paymentService,
     });
     await app.register(registerShipmentRoutes, {
          prefix: '/shipments',
          shipmentService: options.shipmentService,
     });

     return app;
}
