import { errorResponse, idParams, storageFailureResponse } from './common.schemas';

const shipmentFields = {
     orderId: { type: 'string', minLength: 1, example: 'ORD-2024-12345' },
     address: { type: 'object', additionalProperties: true, description: 'Destination address' },
     items: { type: 'array', items: {}, description: 'Shipped lines' },
     status: { type: 'string', example: 'in_transit' },
};

const shipmentSchema = {
     type: 'object',
     properties: {
          id: { type: 'string', example: 'SHP-3302' },
          ...shipmentFields,
     },
};

const notFound = errorResponse('Shipment not found', 'SHIPMENT_NOT_FOUND', 'Shipment SHP-3302 not found');

export const createShipmentSchema = {
     tags: ['shipments'],
     summary: 'Create a shipment',
     body: {
          type: 'object',
          required: ['id', 'orderId', 'address', 'items', 'status'],
          additionalProperties: false,
          properties: {
               id: { type: 'string', minLength: 1, example: 'SHP-3302' },
               ...shipmentFields,
          },
     },
     response: {
          201: shipmentSchema,
          409: errorResponse('Shipment id already used', 'DUPLICATE_RECORD', 'Shipment SHP-3302 already exists'),
          500: storageFailureResponse,
     },
};

export const listShipmentsSchema = {
     tags: ['shipments'],
     summary: 'List shipments',
     response: {
          200: { type: 'array', items: shipmentSchema },
          500: storageFailureResponse,
     },
};

export const getShipmentSchema = {
     tags: ['shipments'],
     summary: 'Get a shipment',
     params: idParams('Shipment id', 'SHP-3302'),
     response: {
          200: shipmentSchema,
          404: notFound,
          500: storageFailureResponse,
     },
};

export const replaceShipmentSchema = {
     tags: ['shipments'],
     summary: 'Replace a shipment',
     params: idParams('Shipment id', 'SHP-3302'),
     body: {
          type: 'object',
          required: ['orderId', 'address', 'items', 'status'],
          additionalProperties: false,
          properties: shipmentFields,
     },
     response: {
          200: shipmentSchema,
          404: notFound,
          500: storageFailureResponse,
     },
};

export const deleteShipmentSchema = {
     tags: ['shipments'],
     summary: 'Delete a shipment',
     params: idParams('Shipment id', 'SHP-3302'),
     response: {
          204: { description: 'Deleted or already absent', type: 'null' },
          500: storageFailureResponse,
     },
};
