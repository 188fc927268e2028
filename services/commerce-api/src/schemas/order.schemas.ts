import { errorResponse, idParams, storageFailureResponse } from './common.schemas';

const jsonObject = { type: ['object', 'null'], additionalProperties: true };

const orderFields = {
     userId: { type: ['string', 'null'], example: 'USR-1001' },
     address: { ...jsonObject, description: 'Delivery address' },
     items: { type: 'array', items: {}, description: 'Order lines as placed' },
     total: { type: 'number', example: 1499.5 },
     currency: { type: ['string', 'null'], example: 'INR' },
     status: { type: 'string', example: 'paid' },
     refundAttempt: { ...jsonObject, description: 'Last refund attempt payload' },
     paymentRefundStatus: { type: ['string', 'null'], example: 'refunded' },
};

const orderSchema = {
     type: 'object',
     properties: {
          id: { type: 'string', example: 'ORD-2024-12345' },
          ...orderFields,
     },
};

const notFound = errorResponse('Order not found', 'ORDER_NOT_FOUND', 'Order ORD-2024-12345 not found');

export const createOrderSchema = {
     tags: ['orders'],
     summary: 'Create an order',
     body: {
          type: 'object',
          required: ['id', 'items', 'total', 'status'],
          additionalProperties: false,
          properties: {
               id: { type: 'string', minLength: 1, example: 'ORD-2024-12345' },
               ...orderFields,
          },
     },
     response: {
          201: orderSchema,
          409: errorResponse('Order id already used', 'DUPLICATE_RECORD', 'Order ORD-2024-12345 already exists'),
          500: storageFailureResponse,
     },
};

export const listOrdersSchema = {
     tags: ['orders'],
     summary: 'List orders',
     response: {
          200: { type: 'array', items: orderSchema },
          500: storageFailureResponse,
     },
};

export const getOrderSchema = {
     tags: ['orders'],
     summary: 'Get an order',
     params: idParams('Order id', 'ORD-2024-12345'),
     response: {
          200: orderSchema,
          404: notFound,
          500: storageFailureResponse,
     },
};

export const updateOrderSchema = {
     tags: ['orders'],
     summary: 'Merge-update an order',
     description: 'Only the fields present in the body are replaced; omitted fields keep their stored value.',
     params: idParams('Order id', 'ORD-2024-12345'),
     body: {
          type: 'object',
          additionalProperties: false,
          properties: orderFields,
     },
     response: {
          200: orderSchema,
          404: notFound,
          500: storageFailureResponse,
     },
};

export const deleteOrderSchema = {
     tags: ['orders'],
     summary: 'Delete an order',
     params: idParams('Order id', 'ORD-2024-12345'),
     response: {
          204: { description: 'Deleted or already absent', type: 'null' },
          500: storageFailureResponse,
     },
};

export const refundMetadataSchema = {
     tags: ['orders'],
     summary: 'Patch refund metadata on an order',
     description:
          'Applies the keys that name a known order column (e.g. refund_attempt, payment_refund_status) and ignores the rest.',
     params: idParams('Order id', 'ORD-2024-12345'),
     body: {
          type: 'object',
          example: { refund_attempt: { amount: 1499.5 }, payment_refund_status: 'refunded' },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    updated: { type: 'boolean', example: true },
                    updatedKeys: {
                         type: 'array',
                         items: { type: 'string' },
                         example: ['refund_attempt', 'payment_refund_status'],
                    },
                    reason: { type: 'string', example: 'no matching columns' },
               },
          },
          404: notFound,
          500: storageFailureResponse,
     },
};
