import { errorResponse, internalErrorResponse, storageFailureResponse } from './common.schemas';

const stockEntrySchema = {
     type: 'object',
     properties: {
          sku: { type: 'string', example: 'SKU-MUG-CERAMIC' },
          quantity: { type: 'integer', example: 45 },
     },
};

const skuParams = {
     type: 'object',
     required: ['sku'],
     properties: {
          sku: { type: 'string', description: 'Stock-keeping unit', example: 'SKU-MUG-CERAMIC' },
     },
};

const notFound = errorResponse('SKU not found', 'SKU_NOT_FOUND', 'SKU SKU-MUG-CERAMIC not found');

export const upsertStockSchema = {
     tags: ['inventory'],
     summary: 'Create a SKU or replace its quantity',
     body: {
          type: 'object',
          required: ['sku', 'quantity'],
          additionalProperties: false,
          properties: {
               sku: { type: 'string', minLength: 1, example: 'SKU-MUG-CERAMIC' },
               quantity: { type: 'integer', minimum: 0, example: 45 },
          },
     },
     response: {
          201: stockEntrySchema,
          400: errorResponse('Invalid request', 'INVALID_QUANTITY', 'Quantity must be a non-negative integer'),
          500: storageFailureResponse,
     },
};

export const listStockSchema = {
     tags: ['inventory'],
     summary: 'List stock for every SKU',
     response: {
          200: { type: 'array', items: stockEntrySchema },
          500: internalErrorResponse,
     },
};

export const getStockSchema = {
     tags: ['inventory'],
     summary: 'Get stock for a SKU',
     params: skuParams,
     response: {
          200: stockEntrySchema,
          404: notFound,
          500: internalErrorResponse,
     },
};

export const setStockSchema = {
     tags: ['inventory'],
     summary: 'Set the quantity of an existing SKU',
     params: skuParams,
     body: {
          type: 'object',
          required: ['quantity'],
          additionalProperties: false,
          properties: {
               quantity: { type: 'integer', minimum: 0, example: 60 },
          },
     },
     response: {
          200: stockEntrySchema,
          404: notFound,
          500: storageFailureResponse,
     },
};

export const adjustStockSchema = {
     tags: ['inventory'],
     summary: 'Adjust stock by a signed delta',
     description: 'Applied under a row lock. Fails with 409 when the result would be negative.',
     params: skuParams,
     body: {
          type: 'object',
          required: ['delta'],
          additionalProperties: false,
          properties: {
               delta: { type: 'integer', description: 'Change in quantity', example: -5 },
          },
     },
     response: {
          200: stockEntrySchema,
          404: notFound,
          409: errorResponse(
               'Adjustment would make stock negative',
               'INSUFFICIENT_STOCK',
               'Insufficient stock for SKU-MUG-CERAMIC: requested 50, available 45'
          ),
          500: storageFailureResponse,
     },
};

export const deleteStockSchema = {
     tags: ['inventory'],
     summary: 'Delete a SKU',
     params: skuParams,
     response: {
          204: { description: 'Deleted or already absent', type: 'null' },
          500: storageFailureResponse,
     },
};
