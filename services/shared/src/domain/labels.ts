import type {
     AmountConstraint,
     DocumentType,
     MaterialAsset,
     MeasureUnit,
} from '../types/catalog.types';
import type { Contractor, ContractorGroup, Warehouse } from '../types/structure.types';
import type { DocumentHeader } from '../types/document.types';
import { formatBound } from './amount-bounds';
import { DIRECTION_LABELS } from './direction';

// Display strings used as the `label` of API responses

export function measureUnitLabel(unit: MeasureUnit): string {
     return unit.name;
}

export function materialAssetLabel(asset: MaterialAsset): string {
     return `${asset.partNumber}, ${asset.name} [${asset.unitName}]`;
}

export function amountConstraintLabel(constraint: AmountConstraint): string {
     return `${constraint.partNumber} [${formatBound(constraint.minAmount)}:${formatBound(constraint.maxAmount)}]`;
}

export function documentTypeLabel(type: DocumentType): string {
     return `${type.name} ${DIRECTION_LABELS[type.direction]}`;
}

export function warehouseLabel(warehouse: Warehouse): string {
     return warehouse.name;
}

export function contractorGroupLabel(group: ContractorGroup): string {
     return group.name;
}

export function contractorLabel(contractor: Contractor): string {
     return contractor.name;
}

export function documentLabel(document: DocumentHeader): string {
     return `${document.documentTypeName} #${document.number} of ${document.documentDate}`;
}
