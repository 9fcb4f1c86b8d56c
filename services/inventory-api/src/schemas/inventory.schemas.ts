import {
     errorResponse,
     idParams,
     internalErrorResponse,
} from '@stockroom/shared/src/utils/schemas';

const headerProperties = {
     id: { type: 'integer', example: 42 },
     number: { type: 'string', example: 'R-0001' },
     documentTypeId: { type: 'integer', example: 1 },
     documentTypeName: { type: 'string', example: 'Receipt' },
     direction: { type: 'integer', enum: [-1, 1], example: 1 },
     warehouseId: { type: 'integer', example: 1 },
     warehouseName: { type: 'string', example: 'Main' },
     contractorId: { type: 'integer', example: 5 },
     contractorName: { type: 'string', example: 'Fastener Supply Co' },
     documentDate: { type: 'string', format: 'date', example: '2024-03-01' },
     comment: { type: 'string', nullable: true },
     transferId: {
          type: 'string',
          nullable: true,
          description: 'Shared by both legs of a transfer',
     },
     createdAt: { type: 'string', format: 'date-time' },
     lineCount: { type: 'integer', example: 2 },
     label: { type: 'string', example: 'Receipt #R-0001 of 2024-03-01' },
};

const documentHeader = { type: 'object', properties: headerProperties };

const document = {
     type: 'object',
     properties: {
          ...headerProperties,
          lines: {
               type: 'array',
               items: {
                    type: 'object',
                    properties: {
                         assetId: { type: 'integer', example: 10 },
                         partNumber: { type: 'string', example: 'BOLT-M8-40' },
                         assetName: { type: 'string', example: 'Hex bolt M8x40' },
                         unitName: { type: 'string', example: 'pcs' },
                         amount: { type: 'integer', example: 500 },
                         delta: {
                              type: 'integer',
                              description: 'Signed change of the on-hand quantity',
                              example: 500,
                         },
                    },
               },
          },
     },
};

const lines = {
     type: 'array',
     minItems: 1,
     items: {
          type: 'object',
          required: ['assetId', 'amount'],
          properties: {
               assetId: { type: 'integer', minimum: 1, example: 10 },
               amount: {
                    type: 'integer',
                    description: 'Positive quantity; the document type gives the sign',
                    minimum: 1,
                    example: 500,
               },
          },
     },
};

const date = { type: 'string', format: 'date', example: '2024-03-01' };

const notFound = errorResponse(
     'Referenced entity not found',
     'WAREHOUSE_NOT_FOUND',
     'Warehouse 1 not found'
);
const insufficientStock = errorResponse(
     'Not enough stock',
     'INSUFFICIENT_STOCK',
     'Insufficient stock for asset 10 at warehouse 1: requested 100, available 50'
);
const invalidAmount = errorResponse(
     'Invalid document lines',
     'INVALID_AMOUNT',
     'Asset 10 appears on more than one line'
);

export const postDocumentSchema = {
     tags: ['documents'],
     summary: 'Post a document',
     description:
          'Records a movement atomically. Out documents cannot take stock below zero; constraint violations are raised as events.',
     body: {
          type: 'object',
          required: ['number', 'documentTypeId', 'warehouseId', 'contractorId', 'lines'],
          properties: {
               number: { type: 'string', minLength: 1, maxLength: 50, example: 'R-0001' },
               documentTypeId: { type: 'integer', minimum: 1, example: 1 },
               warehouseId: { type: 'integer', minimum: 1, example: 1 },
               contractorId: { type: 'integer', minimum: 1, example: 5 },
               documentDate: date,
               comment: { type: 'string', maxLength: 1000 },
               lines,
          },
     },
     response: {
          201: document,
          400: invalidAmount,
          404: notFound,
          409: insufficientStock,
          500: internalErrorResponse,
     },
};

export const listDocumentsSchema = {
     tags: ['documents'],
     summary: 'List document headers',
     description: 'Newest first',
     querystring: {
          type: 'object',
          properties: {
               warehouseId: { type: 'integer', minimum: 1 },
               documentTypeId: { type: 'integer', minimum: 1 },
               contractorId: { type: 'integer', minimum: 1 },
               dateFrom: { type: 'string', format: 'date' },
               dateTo: { type: 'string', format: 'date' },
               limit: { type: 'integer', minimum: 1, maximum: 500, default: 50 },
               offset: { type: 'integer', minimum: 0, default: 0 },
          },
     },
     response: {
          200: { type: 'array', items: documentHeader },
          500: internalErrorResponse,
     },
};

export const getDocumentSchema = {
     tags: ['documents'],
     summary: 'Get a document with its lines',
     params: idParams,
     response: {
          200: document,
          404: errorResponse('Document not found', 'DOCUMENT_NOT_FOUND', 'Document 1 not found'),
          500: internalErrorResponse,
     },
};

export const updateDocumentSchema = {
     tags: ['documents'],
     summary: 'Update a document header',
     description: 'Lines are immutable; delete and re-post to change them',
     params: idParams,
     body: {
          type: 'object',
          properties: {
               number: { type: 'string', minLength: 1, maxLength: 50 },
               documentDate: date,
               comment: { type: ['string', 'null'], maxLength: 1000 },
               contractorId: { type: 'integer', minimum: 1 },
          },
     },
     response: {
          200: document,
          404: errorResponse('Document not found', 'DOCUMENT_NOT_FOUND', 'Document 1 not found'),
          409: errorResponse('Duplicate number', 'DUPLICATE_ENTITY', 'Document already exists'),
          500: internalErrorResponse,
     },
};

export const deleteDocumentSchema = {
     tags: ['documents'],
     summary: 'Delete a document',
     description: 'Deleting one leg of a transfer deletes both',
     params: idParams,
     response: {
          200: {
               type: 'object',
               properties: {
                    deletedIds: { type: 'array', items: { type: 'integer' }, example: [42] },
               },
          },
          404: errorResponse('Document not found', 'DOCUMENT_NOT_FOUND', 'Document 1 not found'),
          409: insufficientStock,
          500: internalErrorResponse,
     },
};

export const transferSchema = {
     tags: ['transfers'],
     summary: 'Move assets between warehouses',
     description: 'Posts an Out document at the source and an In document at the destination',
     body: {
          type: 'object',
          required: [
               'number',
               'outgoingTypeId',
               'incomingTypeId',
               'fromWarehouseId',
               'toWarehouseId',
               'contractorId',
               'lines',
          ],
          properties: {
               number: { type: 'string', minLength: 1, maxLength: 50, example: 'T-0001' },
               outgoingTypeId: { type: 'integer', minimum: 1, example: 3 },
               incomingTypeId: { type: 'integer', minimum: 1, example: 4 },
               fromWarehouseId: { type: 'integer', minimum: 1, example: 1 },
               toWarehouseId: { type: 'integer', minimum: 1, example: 4 },
               contractorId: { type: 'integer', minimum: 1, example: 5 },
               documentDate: date,
               comment: { type: 'string', maxLength: 1000 },
               lines,
          },
     },
     response: {
          201: {
               type: 'object',
               properties: {
                    transferId: { type: 'string' },
                    outgoing: document,
                    incoming: document,
               },
          },
          400: errorResponse(
               'Invalid transfer',
               'INVALID_TRANSFER',
               'Source and destination warehouses must differ'
          ),
          404: notFound,
          409: insufficientStock,
          500: internalErrorResponse,
     },
};

export const getAssetStockSchema = {
     tags: ['stock'],
     summary: 'Stock of one asset across warehouses',
     params: {
          type: 'object',
          required: ['assetId'],
          properties: {
               assetId: { type: 'integer', minimum: 1, example: 10 },
          },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    assetId: { type: 'integer' },
                    partNumber: { type: 'string' },
                    total: { type: 'integer', example: 480 },
                    warehouses: {
                         type: 'array',
                         items: {
                              type: 'object',
                              properties: {
                                   warehouseId: { type: 'integer' },
                                   warehouseName: { type: 'string' },
                                   onHand: { type: 'integer' },
                              },
                         },
                    },
               },
          },
          404: errorResponse(
               'Asset not found',
               'MATERIAL_ASSET_NOT_FOUND',
               'Material asset 10 not found'
          ),
          500: internalErrorResponse,
     },
};

export const getWarehouseStockSchema = {
     tags: ['stock'],
     summary: 'Stock held at a warehouse',
     params: idParams,
     querystring: {
          type: 'object',
          properties: {
               includeChildren: {
                    type: 'boolean',
                    default: false,
                    description: 'Sum over the whole subtree of the warehouse',
               },
          },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    warehouseId: { type: 'integer' },
                    warehouseIds: { type: 'array', items: { type: 'integer' } },
                    assets: {
                         type: 'array',
                         items: {
                              type: 'object',
                              properties: {
                                   assetId: { type: 'integer' },
                                   partNumber: { type: 'string' },
                                   assetName: { type: 'string' },
                                   unitName: { type: 'string' },
                                   onHand: { type: 'integer' },
                              },
                         },
                    },
               },
          },
          404: errorResponse('Warehouse not found', 'WAREHOUSE_NOT_FOUND', 'Warehouse 1 not found'),
          500: internalErrorResponse,
     },
};

export const listAlertsSchema = {
     tags: ['stock'],
     summary: 'Current amount constraint violations',
     description: 'Compares the total on-hand quantity across all warehouses with each constraint',
     querystring: {
          type: 'object',
          properties: {
               assetId: { type: 'integer', minimum: 1 },
          },
     },
     response: {
          200: {
               type: 'array',
               items: {
                    type: 'object',
                    properties: {
                         assetId: { type: 'integer' },
                         partNumber: { type: 'string' },
                         onHand: { type: 'integer' },
                         minAmount: { type: ['integer', 'null'] },
                         maxAmount: { type: ['integer', 'null'] },
                         kind: { type: 'string', enum: ['BELOW_MINIMUM', 'ABOVE_MAXIMUM'] },
                    },
               },
          },
          500: internalErrorResponse,
     },
};
