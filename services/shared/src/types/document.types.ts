import type { Direction } from '../domain/direction';
import type { ViolationKind } from '../domain/amount-bounds';

// Inventory movement documents, stock levels and domain events

export interface DocumentLineInput {
     assetId: number;
     amount: number;
}

export interface DocumentLine {
     assetId: number;
     partNumber: string;
     assetName: string;
     unitName: string;
     amount: number;
     delta: number;
}

export interface DocumentHeader {
     id: number;
     number: string;
     documentTypeId: number;
     documentTypeName: string;
     direction: Direction;
     warehouseId: number;
     warehouseName: string;
     contractorId: number;
     contractorName: string;
     documentDate: string;
     comment?: string;
     transferId?: string;
     createdAt: Date;
     lineCount: number;
}

export interface Document extends DocumentHeader {
     lines: DocumentLine[];
}

export interface PostDocumentRequest {
     number: string;
     documentTypeId: number;
     warehouseId: number;
     contractorId: number;
     documentDate?: string;
     comment?: string;
     lines: DocumentLineInput[];
}

export interface UpdateDocumentRequest {
     number?: string;
     documentDate?: string;
     comment?: string | null;
     contractorId?: number;
}

export interface DocumentFilter {
     warehouseId?: number;
     documentTypeId?: number;
     contractorId?: number;
     dateFrom?: string;
     dateTo?: string;
     limit: number;
     offset: number;
}

export interface TransferRequest {
     number: string;
     outgoingTypeId: number;
     incomingTypeId: number;
     fromWarehouseId: number;
     toWarehouseId: number;
     contractorId: number;
     documentDate?: string;
     comment?: string;
     lines: DocumentLineInput[];
}

export interface TransferResult {
     transferId: string;
     outgoing: Document;
     incoming: Document;
}

// Stock levels

export interface WarehouseQuantity {
     warehouseId: number;
     warehouseName: string;
     onHand: number;
}

export interface AssetStock {
     assetId: number;
     partNumber: string;
     total: number;
     warehouses: WarehouseQuantity[];
}

export interface AssetQuantity {
     assetId: number;
     partNumber: string;
     assetName: string;
     unitName: string;
     onHand: number;
}

export interface WarehouseStock {
     warehouseId: number;
     warehouseIds: number[];
     assets: AssetQuantity[];
}

export interface ConstraintViolation {
     assetId: number;
     partNumber: string;
     onHand: number;
     minAmount: number;
     maxAmount: number;
     kind: ViolationKind;
}

// Domain events

export type DomainEventType = 'DocumentPosted' | 'DocumentDeleted' | 'AmountConstraintViolated';

export interface DomainEvent {
     id: number;
     type: DomainEventType;
     payload: Record<string, unknown>;
     status: 'PENDING' | 'SENT' | 'FAILED';
     createdAt: Date;
}

export interface DocumentPostedEvent {
     documentId: number;
     number: string;
     documentTypeId: number;
     direction: Direction;
     warehouseId: number;
     contractorId: number;
     transferId: string | null;
     lines: Array<{ assetId: number; amount: number; delta: number }>;
     timestamp: string;
}

export interface DocumentDeletedEvent {
     documentId: number;
     number: string;
     warehouseId: number;
     transferId: string | null;
     timestamp: string;
}

export interface AmountConstraintViolatedEvent {
     assetId: number;
     partNumber: string;
     onHand: number;
     minAmount: number | null;
     maxAmount: number | null;
     kind: ViolationKind;
     documentId: number;
     timestamp: string;
}
