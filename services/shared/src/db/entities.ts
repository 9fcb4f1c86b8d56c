// Entity names shared by error reporting and generic lookups

export type EntityName =
     | 'MEASURE_UNIT'
     | 'MATERIAL_ASSET'
     | 'AMOUNT_CONSTRAINT'
     | 'DOCUMENT_TYPE'
     | 'WAREHOUSE'
     | 'CONTRACTOR_GROUP'
     | 'CONTRACTOR'
     | 'DOCUMENT';

export const ENTITY_TABLES: Record<EntityName, string> = {
     MEASURE_UNIT: 'measure_unit',
     MATERIAL_ASSET: 'material_asset',
     AMOUNT_CONSTRAINT: 'amount_constraint',
     DOCUMENT_TYPE: 'document_type',
     WAREHOUSE: 'warehouse',
     CONTRACTOR_GROUP: 'contractor_group',
     CONTRACTOR: 'contractor',
     DOCUMENT: 'document',
};

export const ENTITY_LABELS: Record<EntityName, string> = {
     MEASURE_UNIT: 'Measure unit',
     MATERIAL_ASSET: 'Material asset',
     AMOUNT_CONSTRAINT: 'Amount constraint',
     DOCUMENT_TYPE: 'Document type',
     WAREHOUSE: 'Warehouse',
     CONTRACTOR_GROUP: 'Contractor group',
     CONTRACTOR: 'Contractor',
     DOCUMENT: 'Document',
};
