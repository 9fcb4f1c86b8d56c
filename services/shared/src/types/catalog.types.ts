import type { Direction } from '../domain/direction';

// Reference data: units, assets, constraints and document types

export interface MeasureUnit {
     id: number;
     name: string;
}

export interface MaterialAsset {
     id: number;
     partNumber: string;
     name: string;
     unitId: number;
     unitName: string;
     description?: string;
}

export interface CreateMaterialAssetRequest {
     partNumber: string;
     name: string;
     unitId: number;
     description?: string | null;
}

export type UpdateMaterialAssetRequest = Partial<CreateMaterialAssetRequest>;

export interface MaterialAssetFilter {
     search?: string;
     unitId?: number;
}

/**
 * Min/max allowed on-hand quantity for one asset. Unbounded sides read as
 * -Infinity (min) and Infinity (max).
 */
export interface AmountConstraint {
     id: number;
     assetId: number;
     partNumber: string;
     minAmount: number;
     maxAmount: number;
}

export interface SetAmountConstraintRequest {
     assetId: number;
     minAmount?: number;
     maxAmount?: number;
}

export interface DocumentType {
     id: number;
     name: string;
     direction: Direction;
}

export interface CreateDocumentTypeRequest {
     name: string;
     direction: number;
}

export type UpdateDocumentTypeRequest = Partial<CreateDocumentTypeRequest>;
