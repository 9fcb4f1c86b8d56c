import {
     errorResponse,
     idParams,
     internalErrorResponse,
     nullableId,
} from '@stockroom/shared/src/utils/schemas';

const treePosition = {
     depth: { type: 'integer', description: 'Distance from the root', example: 1 },
     path: {
          type: 'array',
          items: { type: 'string' },
          description: 'Names from the root down to this node',
          example: ['Main', 'Main / Rack A'],
     },
};

const warehouseProperties = {
     id: { type: 'integer', example: 2 },
     name: { type: 'string', example: 'Main / Rack A' },
     parentId: { type: 'integer', nullable: true, example: 1 },
     kind: { type: 'string', enum: ['PHYSICAL', 'VIRTUAL'] },
     label: { type: 'string', example: 'Main / Rack A' },
};

const warehouse = { type: 'object', properties: warehouseProperties };

const contractorGroupProperties = {
     id: { type: 'integer', example: 1 },
     name: { type: 'string', example: 'Suppliers' },
     parentId: { type: 'integer', nullable: true },
     label: { type: 'string', example: 'Suppliers' },
};

const contractorGroup = { type: 'object', properties: contractorGroupProperties };

const contractor = {
     type: 'object',
     properties: {
          id: { type: 'integer', example: 5 },
          name: { type: 'string', example: 'Fastener Supply Co' },
          groupId: { type: 'integer', nullable: true, example: 1 },
          groupName: { type: 'string', nullable: true, example: 'Suppliers' },
          description: { type: 'string', nullable: true },
          label: { type: 'string', example: 'Fastener Supply Co' },
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
const cycle = errorResponse(
     'Move would create a cycle',
     'TREE_CYCLE',
     'Warehouse 1 cannot be moved under 2: it would create a cycle'
);

// Warehouses

export const listWarehousesSchema = {
     tags: ['warehouses'],
     summary: 'List the warehouse tree',
     description: 'Depth-first, siblings ordered by name',
     response: {
          200: {
               type: 'array',
               items: { type: 'object', properties: { ...warehouseProperties, ...treePosition } },
          },
          500: internalErrorResponse,
     },
};

export const getWarehouseSchema = {
     tags: ['warehouses'],
     summary: 'Get a warehouse',
     params: idParams,
     response: {
          200: warehouse,
          404: notFound('Warehouse'),
          500: internalErrorResponse,
     },
};

export const getWarehouseAncestorsSchema = {
     tags: ['warehouses'],
     summary: 'List the ancestors of a warehouse',
     description: 'Root first, excluding the warehouse itself',
     params: idParams,
     response: {
          200: { type: 'array', items: warehouse },
          404: notFound('Warehouse'),
          500: internalErrorResponse,
     },
};

export const createWarehouseSchema = {
     tags: ['warehouses'],
     summary: 'Create a warehouse',
     body: {
          type: 'object',
          required: ['name'],
          properties: {
               name: { type: 'string', minLength: 1, maxLength: 50, example: 'Main / Rack A' },
               parentId: nullableId,
               kind: { type: 'string', enum: ['PHYSICAL', 'VIRTUAL'] },
          },
     },
     response: {
          201: warehouse,
          404: notFound('Warehouse'),
          409: duplicate,
          500: internalErrorResponse,
     },
};

export const updateWarehouseSchema = {
     tags: ['warehouses'],
     summary: 'Rename, move or re-kind a warehouse',
     description: 'parentId null turns the warehouse into a root',
     params: idParams,
     body: {
          type: 'object',
          properties: createWarehouseSchema.body.properties,
     },
     response: {
          200: warehouse,
          404: notFound('Warehouse'),
          409: cycle,
          500: internalErrorResponse,
     },
};

export const deleteWarehouseSchema = {
     tags: ['warehouses'],
     summary: 'Delete a warehouse',
     description: 'Fails while the warehouse has children or documents',
     params: idParams,
     response: {
          204: { type: 'null' },
          404: notFound('Warehouse'),
          409: inUse,
          500: internalErrorResponse,
     },
};

// Contractor groups

export const listContractorGroupsSchema = {
     tags: ['contractor-groups'],
     summary: 'List the contractor group tree',
     response: {
          200: {
               type: 'array',
               items: {
                    type: 'object',
                    properties: { ...contractorGroupProperties, ...treePosition },
               },
          },
          500: internalErrorResponse,
     },
};

export const getContractorGroupSchema = {
     tags: ['contractor-groups'],
     summary: 'Get a contractor group',
     params: idParams,
     response: {
          200: contractorGroup,
          404: notFound('Contractor group'),
          500: internalErrorResponse,
     },
};

export const createContractorGroupSchema = {
     tags: ['contractor-groups'],
     summary: 'Create a contractor group',
     body: {
          type: 'object',
          required: ['name'],
          properties: {
               name: { type: 'string', minLength: 1, maxLength: 100, example: 'Suppliers' },
               parentId: nullableId,
          },
     },
     response: {
          201: contractorGroup,
          404: notFound('Contractor group'),
          409: duplicate,
          500: internalErrorResponse,
     },
};

export const updateContractorGroupSchema = {
     tags: ['contractor-groups'],
     summary: 'Rename or move a contractor group',
     params: idParams,
     body: {
          type: 'object',
          properties: createContractorGroupSchema.body.properties,
     },
     response: {
          200: contractorGroup,
          404: notFound('Contractor group'),
          409: cycle,
          500: internalErrorResponse,
     },
};

export const deleteContractorGroupSchema = {
     tags: ['contractor-groups'],
     summary: 'Delete a contractor group',
     params: idParams,
     response: {
          204: { type: 'null' },
          404: notFound('Contractor group'),
          409: inUse,
          500: internalErrorResponse,
     },
};

// Contractors

export const listContractorsSchema = {
     tags: ['contractors'],
     summary: 'List contractors',
     querystring: {
          type: 'object',
          properties: {
               groupId: { type: 'integer', minimum: 1 },
               includeSubgroups: { type: 'boolean', default: false },
          },
     },
     response: {
          200: { type: 'array', items: contractor },
          404: notFound('Contractor group'),
          500: internalErrorResponse,
     },
};

export const getContractorSchema = {
     tags: ['contractors'],
     summary: 'Get a contractor',
     params: idParams,
     response: {
          200: contractor,
          404: notFound('Contractor'),
          500: internalErrorResponse,
     },
};

export const createContractorSchema = {
     tags: ['contractors'],
     summary: 'Create a contractor',
     body: {
          type: 'object',
          required: ['name'],
          properties: {
               name: { type: 'string', minLength: 1, maxLength: 250, example: 'Fastener Supply Co' },
               groupId: nullableId,
               description: { type: ['string', 'null'] },
          },
     },
     response: {
          201: contractor,
          404: notFound('Contractor group'),
          409: duplicate,
          500: internalErrorResponse,
     },
};

export const updateContractorSchema = {
     tags: ['contractors'],
     summary: 'Update a contractor',
     params: idParams,
     body: {
          type: 'object',
          properties: createContractorSchema.body.properties,
     },
     response: {
          200: contractor,
          404: notFound('Contractor'),
          409: duplicate,
          500: internalErrorResponse,
     },
};

export const deleteContractorSchema = {
     tags: ['contractors'],
     summary: 'Delete a contractor',
     description: 'Fails while documents reference the contractor',
     params: idParams,
     response: {
          204: { type: 'null' },
          404: notFound('Contractor'),
          409: inUse,
          500: internalErrorResponse,
     },
};
