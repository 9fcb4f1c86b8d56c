import { boundToJson } from '../domain/amount-bounds';
import {
     amountConstraintLabel,
     contractorGroupLabel,
     contractorLabel,
     documentLabel,
     documentTypeLabel,
     materialAssetLabel,
     measureUnitLabel,
     warehouseLabel,
} from '../domain/labels';
import type {
     AmountConstraint,
     DocumentType,
     MaterialAsset,
     MeasureUnit,
} from '../types/catalog.types';
import type { ConstraintViolation, Document, DocumentHeader } from '../types/document.types';
import type { Contractor, ContractorGroup, Warehouse } from '../types/structure.types';

// Response bodies: entities plus their display label, infinite bounds as null

export function presentMeasureUnit(unit: MeasureUnit) {
     return { ...unit, label: measureUnitLabel(unit) };
}

export function presentMaterialAsset(asset: MaterialAsset) {
     return { ...asset, label: materialAssetLabel(asset) };
}

export function presentAmountConstraint(constraint: AmountConstraint) {
     return {
          ...constraint,
          minAmount: boundToJson(constraint.minAmount),
          maxAmount: boundToJson(constraint.maxAmount),
          label: amountConstraintLabel(constraint),
     };
}

export function presentDocumentType(type: DocumentType) {
     return { ...type, label: documentTypeLabel(type) };
}

export function presentWarehouse<T extends Warehouse>(warehouse: T) {
     return { ...warehouse, label: warehouseLabel(warehouse) };
}

export function presentContractorGroup<T extends ContractorGroup>(group: T) {
     return { ...group, label: contractorGroupLabel(group) };
}

export function presentContractor(contractor: Contractor) {
     return { ...contractor, label: contractorLabel(contractor) };
}

export function presentDocumentHeader(document: DocumentHeader) {
     return { ...document, label: documentLabel(document) };
}

export function presentDocument(document: Document) {
     return { ...document, label: documentLabel(document) };
}

export function presentViolation(violation: ConstraintViolation) {
     return {
          ...violation,
          minAmount: boundToJson(violation.minAmount),
          maxAmount: boundToJson(violation.maxAmount),
     };
}
