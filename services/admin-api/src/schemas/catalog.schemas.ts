import {
     errorResponse,
     idParams,
     internalErrorResponse,
} from '@stockroom/shared/src/utils/schemas';

const measureUnit = {
     type: 'object',
     properties: {
          id: { type: 'integer', example: 1 },
          name: { type: 'string', example: 'kg' },
          label: { type: 'string', example: 'kg' },
     },
};

const materialAsset = {
     type: 'object',
     properties: {
          id: { type: 'integer', example: 10 },
          partNumber: { type: 'string', example: 'BOLT-M8-40' },
          name: { type: 'string', example: 'Hex bolt M8x40' },
          unitId: { type: 'integer', example: 1 },
          unitName: { type: 'string', example: 'pcs' },
          description: { type: 'string', nullable: true },
          label: { type: 'string', example: 'BOLT-M8-40, Hex bolt M8x40 [pcs]' },
     },
};

const amountConstraint = {
     type: 'object',
     properties: {
          id: { type: 'integer', example: 3 },
          assetId: { type: 'integer', example: 10 },
          partNumber: { type: 'string', example: 'BOLT-M8-40' },
          minAmount: {
               type: ['integer', 'null'],
               description: 'Minimum on-hand amount, null when unbounded',
               example: 100,
          },
          maxAmount: {
               type: ['integer', 'null'],
               description: 'Maximum on-hand amount, null when unbounded',
               example: null,
          },
          label: { type: 'string', example: 'BOLT-M8-40 [100:inf]' },
     },
};

const documentType = {
     type: 'object',
     properties: {
          id: { type: 'integer', example: 1 },
          name: { type: 'string', example: 'Receipt' },
          direction: { type: 'integer', enum: [-1, 1], example: 1 },
          label: { type: 'string', example: 'Receipt In' },
     },
};

const notFound = (entity: string) =>
     errorResponse(
          `${entity} not found`,
          `${entity.toUpperCase().replace(/ /g, '_')}_NOT_FOUND`,
          `${entity} 1 not found`
     );
const duplicate = errorResponse('Duplicate entity', 'DUPLICATE_ENTITY', 'Already exists');
const inUse = errorResponse(
     'Entity is referenced by other records',
     'ENTITY_IN_USE',
     'Entity 1 is referenced by other records'
);
const invalid = (code: string) => errorResponse('Invalid request', code, 'Invalid value');

const bound = {
     type: ['integer', 'null'],
     minimum: -1,
     description: 'Non-negative amount; null or -1 means unbounded',
};

// Measure units

export const listMeasureUnitsSchema = {
     tags: ['measure-units'],
     summary: 'List measure units',
     response: {
          200: { type: 'array', items: measureUnit },
          500: internalErrorResponse,
     },
};

export const getMeasureUnitSchema = {
     tags: ['measure-units'],
     summary: 'Get a measure unit',
     params: idParams,
     response: {
          200: measureUnit,
          404: notFound('Measure unit'),
          500: internalErrorResponse,
     },
};

export const createMeasureUnitSchema = {
     tags: ['measure-units'],
     summary: 'Create a measure unit',
     body: {
          type: 'object',
          required: ['name'],
          properties: {
               name: { type: 'string', minLength: 1, maxLength: 50, example: 'kg' },
          },
     },
     response: {
          201: measureUnit,
          409: duplicate,
          500: internalErrorResponse,
     },
};

export const renameMeasureUnitSchema = {
     tags: ['measure-units'],
     summary: 'Rename a measure unit',
     params: idParams,
     body: createMeasureUnitSchema.body,
     response: {
          200: measureUnit,
          404: notFound('Measure unit'),
          409: duplicate,
          500: internalErrorResponse,
     },
};

export const deleteMeasureUnitSchema = {
     tags: ['measure-units'],
     summary: 'Delete a measure unit',
     description: 'Fails while any material asset uses the unit',
     params: idParams,
     response: {
          204: { type: 'null' },
          404: notFound('Measure unit'),
          409: inUse,
          500: internalErrorResponse,
     },
};

// Material assets

export const listMaterialAssetsSchema = {
     tags: ['material-assets'],
     summary: 'List material assets',
     description: 'Ordered by part number, then name',
     querystring: {
          type: 'object',
          properties: {
               search: {
                    type: 'string',
                    description: 'Case-insensitive match on part number or name',
               },
               unitId: { type: 'integer', minimum: 1 },
          },
     },
     response: {
          200: { type: 'array', items: materialAsset },
          500: internalErrorResponse,
     },
};

export const getMaterialAssetSchema = {
     tags: ['material-assets'],
     summary: 'Get a material asset',
     params: idParams,
     response: {
          200: materialAsset,
          404: notFound('Material asset'),
          500: internalErrorResponse,
     },
};

export const createMaterialAssetSchema = {
     tags: ['material-assets'],
     summary: 'Create a material asset',
     body: {
          type: 'object',
          required: ['partNumber', 'name', 'unitId'],
          properties: {
               partNumber: { type: 'string', minLength: 1, maxLength: 150, example: 'BOLT-M8-40' },
               name: { type: 'string', minLength: 1, maxLength: 250, example: 'Hex bolt M8x40' },
               unitId: { type: 'integer', minimum: 1, example: 1 },
               description: { type: ['string', 'null'] },
          },
     },
     response: {
          201: materialAsset,
          404: notFound('Measure unit'),
          409: duplicate,
          500: internalErrorResponse,
     },
};

export const updateMaterialAssetSchema = {
     tags: ['material-assets'],
     summary: 'Update a material asset',
     description: 'Partial update; description null clears it',
     params: idParams,
     body: {
          type: 'object',
          properties: createMaterialAssetSchema.body.properties,
     },
     response: {
          200: materialAsset,
          404: notFound('Material asset'),
          409: duplicate,
          500: internalErrorResponse,
     },
};

export const deleteMaterialAssetSchema = {
     tags: ['material-assets'],
     summary: 'Delete a material asset',
     description: 'Fails while a constraint or a document line references the asset',
     params: idParams,
     response: {
          204: { type: 'null' },
          404: notFound('Material asset'),
          409: inUse,
          500: internalErrorResponse,
     },
};

// Amount constraints

const assetParams = {
     type: 'object',
     required: ['assetId'],
     properties: {
          assetId: { type: 'integer', minimum: 1, example: 10 },
     },
};

export const listAmountConstraintsSchema = {
     tags: ['amount-constraints'],
     summary: 'List amount constraints',
     response: {
          200: { type: 'array', items: amountConstraint },
          500: internalErrorResponse,
     },
};

export const getAmountConstraintSchema = {
     tags: ['amount-constraints'],
     summary: 'Get the constraint of an asset',
     params: assetParams,
     response: {
          200: amountConstraint,
          404: notFound('Amount constraint'),
          500: internalErrorResponse,
     },
};

export const setAmountConstraintSchema = {
     tags: ['amount-constraints'],
     summary: 'Create or update the constraint of an asset',
     description: 'Omitted bounds keep their current value; a new constraint starts unbounded',
     params: assetParams,
     body: {
          type: 'object',
          properties: {
               minAmount: bound,
               maxAmount: bound,
          },
     },
     response: {
          200: amountConstraint,
          400: invalid('INVALID_CONSTRAINT'),
          404: notFound('Material asset'),
          500: internalErrorResponse,
     },
};

export const deleteAmountConstraintSchema = {
     tags: ['amount-constraints'],
     summary: 'Delete the constraint of an asset',
     params: assetParams,
     response: {
          204: { type: 'null' },
          404: notFound('Amount constraint'),
          500: internalErrorResponse,
     },
};

// Document types

export const listDocumentTypesSchema = {
     tags: ['document-types'],
     summary: 'List document types',
     response: {
          200: { type: 'array', items: documentType },
          500: internalErrorResponse,
     },
};

export const getDocumentTypeSchema = {
     tags: ['document-types'],
     summary: 'Get a document type',
     params: idParams,
     response: {
          200: documentType,
          404: notFound('Document type'),
          500: internalErrorResponse,
     },
};

export const createDocumentTypeSchema = {
     tags: ['document-types'],
     summary: 'Create a document type',
     body: {
          type: 'object',
          required: ['name', 'direction'],
          properties: {
               name: { type: 'string', minLength: 1, maxLength: 50, example: 'Receipt' },
               direction: {
                    type: 'integer',
                    description: '1 for incoming, -1 for outgoing',
                    example: 1,
               },
          },
     },
     response: {
          201: documentType,
          400: invalid('INVALID_DIRECTION'),
          409: duplicate,
          500: internalErrorResponse,
     },
};

export const updateDocumentTypeSchema = {
     tags: ['document-types'],
     summary: 'Update a document type',
     description: 'The direction cannot change once documents use the type',
     params: idParams,
     body: {
          type: 'object',
          properties: createDocumentTypeSchema.body.properties,
     },
     response: {
          200: documentType,
          400: invalid('INVALID_DIRECTION'),
          404: notFound('Document type'),
          409: inUse,
          500: internalErrorResponse,
     },
};

export const deleteDocumentTypeSchema = {
     tags: ['document-types'],
     summary: 'Delete a document type',
     params: idParams,
     response: {
          204: { type: 'null' },
          404: notFound('Document type'),
          409: inUse,
          500: internalErrorResponse,
     },
};
