import { RESERVATION_STATUSES } from '@stockroom/shared/src/types/commerce.types';
import {
     errorResponse,
     idParams,
     internalErrorResponse,
     storageFailureResponse,
} from './common.schemas';

const lineSchema = {
     type: 'object',
     required: ['sku', 'qty'],
     additionalProperties: false,
     properties: {
          sku: {
               type: 'string',
               minLength: 1,
               description: 'Stock-keeping unit',
               example: 'SKU-MUG-CERAMIC',
          },
          qty: { type: 'integer', minimum: 1, description: 'Quantity to hold', example: 2 },
     },
};

const reservationSchema = {
     type: 'object',
     properties: {
          id: { type: 'string', example: 'RES-2024-0001' },
          orderId: { type: 'string', example: 'ORD-2024-12345' },
          items: { type: 'array', items: lineSchema },
          status: { type: 'string', example: 'reserved' },
     },
};

const notFound = errorResponse(
     'Reservation not found',
     'RESERVATION_NOT_FOUND',
     'Reservation RES-2024-0001 not found'
);

export const createReservationSchema = {
     tags: ['reservations'],
     summary: 'Reserve inventory for an order',
     description:
          'Atomically checks and decrements stock for every line. Either all lines are reserved or none are.',
     body: {
          type: 'object',
          required: ['orderId', 'items'],
          additionalProperties: false,
          properties: {
               id: {
                    type: 'string',
                    minLength: 1,
                    description: 'Optional client-chosen reservation id; generated when omitted',
                    example: 'RES-2024-0001',
               },
               orderId: { type: 'string', minLength: 1, example: 'ORD-2024-12345' },
               items: { type: 'array', minItems: 1, items: lineSchema },
          },
     },
     response: {
          201: { description: 'Inventory reserved', ...reservationSchema },
          400: errorResponse('Invalid request', 'INVALID_QUANTITY', 'Quantity must be a positive integer'),
          409: errorResponse(
               'Unknown SKU, insufficient stock or conflicting reservation id',
               'INSUFFICIENT_STOCK',
               'Insufficient stock for SKU-MUG-CERAMIC: requested 7, available 6'
          ),
          500: storageFailureResponse,
     },
};

export const listReservationsSchema = {
     tags: ['reservations'],
     summary: 'List reservations',
     response: {
          200: { type: 'array', items: reservationSchema },
          500: internalErrorResponse,
     },
};

export const getReservationSchema = {
     tags: ['reservations'],
     summary: 'Get a reservation',
     params: idParams('Reservation id', 'RES-2024-0001'),
     response: {
          200: reservationSchema,
          404: notFound,
          500: internalErrorResponse,
     },
};

export const updateReservationSchema = {
     tags: ['reservations'],
     summary: 'Replace a reservation and apply its status transition',
     description:
          'reserved -> released returns stock, reserved -> committed consumes it. Other status changes are rejected.',
     params: idParams('Reservation id', 'RES-2024-0001'),
     body: {
          type: 'object',
          required: ['orderId', 'items', 'status'],
          additionalProperties: false,
          properties: {
               orderId: { type: 'string', minLength: 1, example: 'ORD-2024-12345' },
               items: { type: 'array', minItems: 1, items: lineSchema },
               status: { type: 'string', enum: [...RESERVATION_STATUSES], example: 'released' },
          },
     },
     response: {
          200: reservationSchema,
          404: notFound,
          409: errorResponse(
               'Transition not allowed',
               'INVALID_RESERVATION_TRANSITION',
               'Reservation RES-2024-0001 cannot move from released to committed'
          ),
          500: storageFailureResponse,
     },
};

export const deleteReservationSchema = {
     tags: ['reservations'],
     summary: 'Delete a reservation',
     description: 'Idempotent. A reservation still holding stock returns it first.',
     params: idParams('Reservation id', 'RES-2024-0001'),
     response: {
          204: { description: 'Deleted or already absent', type: 'null' },
          500: storageFailureResponse,
     },
};
