import { errorResponse, idParams, storageFailureResponse } from './common.schemas';

const paymentFields = {
     orderId: { type: 'string', minLength: 1, example: 'ORD-2024-12345' },
     amount: { type: 'number', example: 1499.5 },
     status: { type: 'string', example: 'captured' },
};

const paymentSchema = {
     type: 'object',
     properties: {
          id: { type: 'string', example: 'PAY-7781' },
          ...paymentFields,
     },
};

const notFound = errorResponse('Payment not found', 'PAYMENT_NOT_FOUND', 'Payment PAY-7781 not found');

export const createPaymentSchema = {
     tags: ['payments'],
     summary: 'Record a payment',
     body: {
          type: 'object',
          required: ['id', 'orderId', 'amount', 'status'],
          additionalProperties: false,
          properties: {
               id: { type: 'string', minLength: 1, example: 'PAY-7781' },
               ...paymentFields,
          },
     },
     response: {
          201: paymentSchema,
          409: errorResponse('Payment id already used', 'DUPLICATE_RECORD', 'Payment PAY-7781 already exists'),
          500: storageFailureResponse,
     },
};

export const listPaymentsSchema = {
     tags: ['payments'],
     summary: 'List payments',
     response: {
          200: { type: 'array', items: paymentSchema },
          500: storageFailureResponse,
     },
};

export const getPaymentSchema = {
     tags: ['payments'],
     summary: 'Get a payment',
     params: idParams('Payment id', 'PAY-7781'),
     response: {
          200: paymentSchema,
          404: notFound,
          500: storageFailureResponse,
     },
};

export const replacePaymentSchema = {
     tags: ['payments'],
     summary: 'Replace a payment',
     params: idParams('Payment id', 'PAY-7781'),
     body: {
          type: 'object',
          required: ['orderId', 'amount', 'status'],
          additionalProperties: false,
          properties: paymentFields,
     },
     response: {
          200: paymentSchema,
          404: notFound,
          500: storageFailureResponse,
     },
};

export const deletePaymentSchema = {
     tags: ['payments'],
     summary: 'Delete a payment',
     params: idParams('Payment id', 'PAY-7781'),
     response: {
          204: { description: 'Deleted or already absent', type: 'null' },
          500: storageFailureResponse,
     },
};
