import { randomUUID } from 'crypto';
import { PoolClient } from 'pg';
import { recordEvent } from '../db/events';
import { assertExists, queryEntity } from '../db/queries';
import { boundToJson } from '../domain/amount-bounds';
import { Direction, DIRECTION_IN, DIRECTION_OUT, parseDirection, signedAmount } from '../domain/direction';
import type { DocumentType } from '../types/catalog.types';
import {
     AmountConstraintViolatedEvent,
     ConstraintViolation,
     Document,
     DocumentDeletedEvent,
     DocumentFilter,
     DocumentHeader,
     DocumentLineInput,
     DocumentPostedEvent,
     PostDocumentRequest,
     TransferRequest,
     TransferResult,
     UpdateDocumentRequest,
} from '../types/document.types';
import {
     EntityNotFoundError,
     InsufficientStockError,
     InvalidAmountError,
     InvalidTransferError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import { toDocumentType } from './catalog-service';
import { StockService } from './stock-service';

interface DocumentHeaderRow {
     id: number;
     number: string;
     document_type_id: number;
     document_type_name: string;
     direction: number;
     warehouse_id: number;
     warehouse_name: string;
     contractor_id: number;
     contractor_name: string;
     document_date: string;
     comment: string | null;
     transfer_id: string | null;
     created_at: Date;
     line_count: number;
}

interface DocumentLineRow {
     asset_id: number;
     part_number: string;
     asset_name: string;
     unit_name: string;
     amount: number;
}

interface NewDocument {
     number: string;
     type: DocumentType;
     warehouseId: number;
     contractorId: number;
     documentDate?: string;
     comment?: string;
     transferId: string | null;
     lines: DocumentLineInput[];
}

const HEADER_SELECT = `
      SELECT d.id, d.number, d.document_type_id, t.name AS document_type_name, t.direction,
             d.warehouse_id, w.name AS warehouse_name,
             d.contractor_id, c.name AS contractor_name,
             d.document_date, d.comment, d.transfer_id, d.created_at,
             (SELECT COUNT(*) FROM document_line l WHERE l.document_id = d.id)::int AS line_count
      FROM document d
      JOIN document_type t ON t.id = d.document_type_id
      JOIN warehouse w ON w.id = d.warehouse_id
      JOIN contractor c ON c.id = d.contractor_id
`;

function toDocumentHeader(row: DocumentHeaderRow): DocumentHeader {
     return {
          id: row.id,
          number: row.number,
          documentTypeId: row.document_type_id,
          documentTypeName: row.document_type_name,
          direction: parseDirection(row.direction),
          warehouseId: row.warehouse_id,
          warehouseName: row.warehouse_name,
          contractorId: row.contractor_id,
          contractorName: row.contractor_name,
          documentDate: row.document_date,
          comment: row.comment ?? undefined,
          transferId: row.transfer_id ?? undefined,
          createdAt: row.created_at,
          lineCount: row.line_count,
     };
}

/**
 * Lines must be non-empty, name each asset once and carry positive integer
 * amounts.
 */
export function validateLines(lines: DocumentLineInput[]): void {
     if (!lines || lines.length === 0) {
          throw new InvalidAmountError('Document must have at least one line');
     }

     const seen = new Set<number>();
     for (const line of lines) {
          if (!Number.isInteger(line.amount) || line.amount <= 0) {
               throw new InvalidAmountError(
                    `Amount must be a positive integer for asset ${line.assetId}`
               );
          }
          if (seen.has(line.assetId)) {
               throw new InvalidAmountError(`Asset ${line.assetId} appears on more than one line`);
          }
          seen.add(line.assetId);
     }
}

export class DocumentService {
     constructor(private readonly stockService: StockService = new StockService()) {}

     /**
      * Record a movement. Out documents may not take a warehouse below zero;
      * constraints of the touched assets are re-evaluated afterwards.
      */
     async postDocument(client: PoolClient, request: PostDocumentRequest): Promise<Document> {
          validateLines(request.lines);

          logger.info(
               {
                    number: request.number,
                    documentTypeId: request.documentTypeId,
                    warehouseId: request.warehouseId,
                    lineCount: request.lines.length,
               },
               'Posting document'
          );

          const type = await this.loadDocumentType(client, request.documentTypeId);
          await assertExists(client, 'WAREHOUSE', request.warehouseId);
          await assertExists(client, 'CONTRACTOR', request.contractorId);

          const assetIds = request.lines.map((l) => l.assetId);
          await this.lockAssets(client, assetIds);

          if (type.direction === DIRECTION_OUT) {
               await this.assertStockAvailable(client, request.warehouseId, request.lines);
          }

          const documentId = await this.insertDocument(client, {
               number: request.number,
               type,
               warehouseId: request.warehouseId,
               contractorId: request.contractorId,
               documentDate: request.documentDate,
               comment: request.comment,
               transferId: null,
               lines: request.lines,
          });

          const violations = await this.stockService.evaluateConstraints(client, assetIds);
          await this.recordViolations(client, violations, documentId);

          logger.info(
               { documentId, violations: violations.length },
               'Document posted successfully'
          );

          return this.getDocument(client, documentId);
     }

     /**
      * Move stock between two warehouses as an Out/In document pair sharing a
      * transfer id. Totals do not change, so constraints are not evaluated.
      */
     async transferAssets(client: PoolClient, request: TransferRequest): Promise<TransferResult> {
          validateLines(request.lines);

          if (request.fromWarehouseId === request.toWarehouseId) {
               throw new InvalidTransferError('Source and destination warehouses must differ');
          }

          const outgoingType = await this.loadDocumentType(client, request.outgoingTypeId);
          const incomingType = await this.loadDocumentType(client, request.incomingTypeId);

          if (outgoingType.direction !== DIRECTION_OUT) {
               throw new InvalidTransferError(
                    `Document type ${outgoingType.id} is not an outgoing type`
               );
          }
          if (incomingType.direction !== DIRECTION_IN) {
               throw new InvalidTransferError(
                    `Document type ${incomingType.id} is not an incoming type`
               );
          }

          await assertExists(client, 'WAREHOUSE', request.fromWarehouseId);
          await assertExists(client, 'WAREHOUSE', request.toWarehouseId);
          await assertExists(client, 'CONTRACTOR', request.contractorId);

          await this.lockAssets(
               client,
               request.lines.map((l) => l.assetId)
          );
          await this.assertStockAvailable(client, request.fromWarehouseId, request.lines);

          const transferId = randomUUID();
          const common = {
               number: request.number,
               contractorId: request.contractorId,
               documentDate: request.documentDate,
               comment: request.comment,
               transferId,
               lines: request.lines,
          };

          const outgoingId = await this.insertDocument(client, {
               ...common,
               type: outgoingType,
               warehouseId: request.fromWarehouseId,
          });
          const incomingId = await this.insertDocument(client, {
               ...common,
               type: incomingType,
               warehouseId: request.toWarehouseId,
          });

          logger.info(
               {
                    transferId,
                    fromWarehouseId: request.fromWarehouseId,
                    toWarehouseId: request.toWarehouseId,
               },
               'Transfer recorded'
          );

          return {
               transferId,
               outgoing: await this.getDocument(client, outgoingId),
               incoming: await this.getDocument(client, incomingId),
          };
     }

     async getDocument(client: PoolClient, id: number): Promise<Document> {
          const { rows } = await client.query<DocumentHeaderRow>(`${HEADER_SELECT} WHERE d.id = $1`, [
               id,
          ]);
          if (rows.length === 0) {
               throw new EntityNotFoundError('DOCUMENT', id);
          }
          const header = toDocumentHeader(rows[0]);

          const { rows: lines } = await client.query<DocumentLineRow>(
               `
      SELECT l.asset_id, a.part_number, a.name AS asset_name, u.name AS unit_name, l.amount
      FROM document_line l
      JOIN material_asset a ON a.id = l.asset_id
      JOIN measure_unit u ON u.id = a.unit_id
      WHERE l.document_id = $1
      ORDER BY a.part_number
    `,
               [id]
          );

          return {
               ...header,
               lines: lines.map((line) => ({
                    assetId: line.asset_id,
                    partNumber: line.part_number,
                    assetName: line.asset_name,
                    unitName: line.unit_name,
                    amount: line.amount,
                    delta: signedAmount(header.direction, line.amount),
               })),
          };
     }

     async listDocuments(client: PoolClient, filter: DocumentFilter): Promise<DocumentHeader[]> {
          const { rows } = await client.query<DocumentHeaderRow>(
               `
      ${HEADER_SELECT}
      WHERE ($1::bigint IS NULL OR d.warehouse_id = $1)
        AND ($2::bigint IS NULL OR d.document_type_id = $2)
        AND ($3::bigint IS NULL OR d.contractor_id = $3)
        AND ($4::date IS NULL OR d.document_date >= $4)
        AND ($5::date IS NULL OR d.document_date <= $5)
      ORDER BY d.document_date DESC, d.id DESC
      LIMIT $6 OFFSET $7
    `,
               [
                    filter.warehouseId ?? null,
                    filter.documentTypeId ?? null,
                    filter.contractorId ?? null,
                    filter.dateFrom ?? null,
                    filter.dateTo ?? null,
                    filter.limit,
                    filter.offset,
               ]
          );
          return rows.map(toDocumentHeader);
     }

     /**
      * Header-only changes; lines are immutable once posted. Both legs of a
      * transfer share their header, so an edit to one applies to the other.
      */
     async updateDocument(
          client: PoolClient,
          id: number,
          request: UpdateDocumentRequest
     ): Promise<Document> {
          if (request.contractorId !== undefined) {
               await assertExists(client, 'CONTRACTOR', request.contractorId);
          }

          const { rows } = await queryEntity<{ id: number }>(
               client,
               'DOCUMENT',
               `
      UPDATE document
      SET number = COALESCE($2, number),
          document_date = COALESCE($3::date, document_date),
          comment = CASE WHEN $4::boolean THEN $5::text ELSE comment END,
          contractor_id = COALESCE($6, contractor_id),
          updated_at = NOW()
      WHERE id = $1
         OR transfer_id = (SELECT transfer_id FROM document WHERE id = $1)
      RETURNING id
    `,
               [
                    id,
                    request.number ?? null,
                    request.documentDate ?? null,
                    request.comment !== undefined,
                    request.comment ?? null,
                    request.contractorId ?? null,
               ]
          );

          if (rows.length === 0) {
               throw new EntityNotFoundError('DOCUMENT', id);
          }

          return this.getDocument(client, id);
     }

     /**
      * Delete a document, or both legs when it belongs to a transfer. The
      * reversal may not take any warehouse below zero.
      */
     async deleteDocument(client: PoolClient, id: number): Promise<number[]> {
          const { rows: targets } = await client.query<{
               id: number;
               number: string;
               warehouse_id: number;
               transfer_id: string | null;
               direction: number;
          }>(
               `
      SELECT d.id, d.number, d.warehouse_id, d.transfer_id, t.direction
      FROM document d
      JOIN document_type t ON t.id = d.document_type_id
      WHERE d.id = $1
      FOR UPDATE OF d
    `,
               [id]
          );

          if (targets.length === 0) {
               throw new EntityNotFoundError('DOCUMENT', id);
          }

          const transferId = targets[0].transfer_id;
          let documents = targets;
          if (transferId) {
               const { rows: legs } = await client.query<(typeof targets)[number]>(
                    `
        SELECT d.id, d.number, d.warehouse_id, d.transfer_id, t.direction
        FROM document d
        JOIN document_type t ON t.id = d.document_type_id
        WHERE d.transfer_id = $1
        ORDER BY d.id
        FOR UPDATE OF d
      `,
                    [transferId]
               );
               documents = legs;
          }

          const documentIds = documents.map((d) => d.id);
          const { rows: lines } = await client.query<{
               document_id: number;
               asset_id: number;
               amount: number;
          }>(
               `
      SELECT l.document_id, l.asset_id, l.amount
      FROM document_line l
      WHERE l.document_id = ANY($1::bigint[])
    `,
               [documentIds]
          );

          const assetIds = [...new Set(lines.map((l) => l.asset_id))];
          await this.lockAssets(client, assetIds);

          // Reversal per warehouse and asset: the negated signed amounts
          const reversals = new Map<number, Map<number, number>>();
          for (const line of lines) {
               const document = documents.find((d) => d.id === line.document_id);
               if (!document) {
                    continue;
               }
               const direction = parseDirection(document.direction);
               const perAsset = reversals.get(document.warehouse_id) ?? new Map<number, number>();
               perAsset.set(
                    line.asset_id,
                    (perAsset.get(line.asset_id) ?? 0) - signedAmount(direction, line.amount)
               );
               reversals.set(document.warehouse_id, perAsset);
          }

          for (const [warehouseId, perAsset] of reversals) {
               const decreasing = [...perAsset].filter(([, delta]) => delta < 0);
               if (decreasing.length === 0) {
                    continue;
               }
               const balances = await this.stockService.getWarehouseBalances(
                    client,
                    warehouseId,
                    decreasing.map(([assetId]) => assetId)
               );
               for (const [assetId, delta] of decreasing) {
                    const available = balances.get(assetId) ?? 0;
                    if (available + delta < 0) {
                         throw new InsufficientStockError(
                              `Cannot delete document ${id}: asset ${assetId} at warehouse ${warehouseId} would drop to ${available + delta}`,
                              assetId,
                              warehouseId,
                              -delta,
                              available
                         );
                    }
               }
          }

          await client.query(`DELETE FROM document WHERE id = ANY($1::bigint[])`, [documentIds]);

          for (const document of documents) {
               const payload: DocumentDeletedEvent = {
                    documentId: document.id,
                    number: document.number,
                    warehouseId: document.warehouse_id,
                    transferId: document.transfer_id,
                    timestamp: new Date().toISOString(),
               };
               await recordEvent(client, 'DocumentDeleted', payload);
          }

          if (!transferId && assetIds.length > 0) {
               const violations = await this.stockService.evaluateConstraints(client, assetIds);
               await this.recordViolations(client, violations, id);
          }

          logger.info({ documentIds, transferId }, 'Documents deleted');
          return documentIds;
     }

     /**
      * Reads the type under a share lock: its direction cannot change until
      * the posting commits.
      */
     private async loadDocumentType(client: PoolClient, id: number): Promise<DocumentType> {
          const { rows } = await client.query<{ id: number; name: string; direction: number }>(
               `SELECT id, name, direction FROM document_type WHERE id = $1 FOR SHARE`,
               [id]
          );
          if (rows.length === 0) {
               throw new EntityNotFoundError('DOCUMENT_TYPE', id);
          }
          return toDocumentType(rows[0]);
     }

     /**
      * Row locks on the assets serialize concurrent postings that touch them.
      * Locks are taken in id order to avoid deadlocks.
      */
     private async lockAssets(client: PoolClient, assetIds: number[]): Promise<void> {
          if (assetIds.length === 0) {
               return;
          }
          const ids = [...new Set(assetIds)].sort((a, b) => a - b);

          const { rows } = await client.query<{ id: number }>(
               `
      SELECT id
      FROM material_asset
      WHERE id = ANY($1::bigint[])
      ORDER BY id
      FOR UPDATE
    `,
               [ids]
          );

          const found = new Set(rows.map((r) => r.id));
          const missing = ids.find((assetId) => !found.has(assetId));
          if (missing !== undefined) {
               throw new EntityNotFoundError('MATERIAL_ASSET', missing);
          }
     }

     private async assertStockAvailable(
          client: PoolClient,
          warehouseId: number,
          lines: DocumentLineInput[]
     ): Promise<void> {
          const balances = await this.stockService.getWarehouseBalances(
               client,
               warehouseId,
               lines.map((l) => l.assetId)
          );

          for (const line of lines) {
               const available = balances.get(line.assetId) ?? 0;
               if (available < line.amount) {
                    throw new InsufficientStockError(
                         `Insufficient stock for asset ${line.assetId} at warehouse ${warehouseId}: requested ${line.amount}, available ${available}`,
                         line.assetId,
                         warehouseId,
                         line.amount,
                         available
                    );
               }
          }
     }

     private async insertDocument(client: PoolClient, document: NewDocument): Promise<number> {
          const { rows } = await queryEntity<{ id: number }>(
               client,
               'DOCUMENT',
               `
      INSERT INTO document (
        number,
        document_type_id,
        warehouse_id,
        contractor_id,
        document_date,
        comment,
        transfer_id
      ) VALUES ($1, $2, $3, $4, COALESCE($5::date, CURRENT_DATE), $6, $7)
      RETURNING id
    `,
               [
                    document.number,
                    document.type.id,
                    document.warehouseId,
                    document.contractorId,
                    document.documentDate ?? null,
                    document.comment ?? null,
                    document.transferId,
               ]
          );
          const documentId = rows[0].id;

          await client.query(
               `
      INSERT INTO document_line (document_id, asset_id, amount)
      SELECT $1, line.asset_id, line.amount
      FROM UNNEST($2::bigint[], $3::bigint[]) AS line(asset_id, amount)
    `,
               [documentId, document.lines.map((l) => l.assetId), document.lines.map((l) => l.amount)]
          );

          const direction: Direction = document.type.direction;
          const payload: DocumentPostedEvent = {
               documentId,
               number: document.number,
               documentTypeId: document.type.id,
               direction,
               warehouseId: document.warehouseId,
               contractorId: document.contractorId,
               transferId: document.transferId,
               lines: document.lines.map((l) => ({
                    assetId: l.assetId,
                    amount: l.amount,
                    delta: signedAmount(direction, l.amount),
               })),
               timestamp: new Date().toISOString(),
          };
          await recordEvent(client, 'DocumentPosted', payload);

          logger.debug(
               { documentId, warehouseId: document.warehouseId, direction },
               'Document inserted'
          );
          return documentId;
     }

     private async recordViolations(
          client: PoolClient,
          violations: ConstraintViolation[],
          documentId: number
     ): Promise<void> {
          for (const violation of violations) {
               const payload: AmountConstraintViolatedEvent = {
                    assetId: violation.assetId,
                    partNumber: violation.partNumber,
                    onHand: violation.onHand,
                    minAmount: boundToJson(violation.minAmount),
                    maxAmount: boundToJson(violation.maxAmount),
                    kind: violation.kind,
                    documentId,
                    timestamp: new Date().toISOString(),
               };
               await recordEvent(client, 'AmountConstraintViolated', payload);

               logger.warn(
                    { assetId: violation.assetId, onHand: violation.onHand, kind: violation.kind },
                    'Amount constraint violated'
               );
          }
     }
}
