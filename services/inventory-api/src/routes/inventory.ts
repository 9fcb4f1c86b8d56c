import { FastifyInstance } from 'fastify';
import { withConnection, withTransaction } from '@stockroom/shared/src/db/client';
import { DocumentService } from '@stockroom/shared/src/services/document-service';
import { StockService } from '@stockroom/shared/src/services/stock-service';
import type {
    DocumentFilter,
    PostDocumentRequest,
    TransferRequest,
    UpdateDocumentRequest,
} from '@stockroom/shared/src/types/document.types';
import { sendError } from '@stockroom/shared/src/utils/http';
import {
    presentDocument,
    presentDocumentHeader,
    presentViolation,
} from '@stockroom/shared/src/utils/presenters';
import {
    deleteDocumentSchema,
    getAssetStockSchema,
    getDocumentSchema,
    getWarehouseStockSchema,
    listAlertsSchema,
    listDocumentsSchema,
    postDocumentSchema,
    transferSchema,
    updateDocumentSchema,
} from '../schemas/inventory.schemas';

type IdParams = { Params: { id: number } };

const stockService = new StockService();
const documentService = new DocumentService(stockService);

export async function registerInventoryRoutes(app: FastifyInstance) {
    // Post a document
    app.post<{ Body: PostDocumentRequest }>(
        '/documents',
        { schema: postDocumentSchema },
        async (request, reply) => {
            try {
                const document = await withTransaction((client) =>
                    documentService.postDocument(client, request.body)
                );

                request.log.info(
                    { documentId: document.id, number: document.number },
                    'Document posted'
                );

                return reply.code(201).send(presentDocument(document));
            } catch (error) {
                return sendError(request, reply, error, 'Failed to post document');
            }
        }
    );

    // List document headers
    app.get<{ Querystring: DocumentFilter }>(
        '/documents',
        { schema: listDocumentsSchema },
        async (request, reply) => {
            try {
                const documents = await withConnection((client) =>
                    documentService.listDocuments(client, request.query)
                );
                return reply.send(documents.map(presentDocumentHeader));
            } catch (error) {
                return sendError(request, reply, error, 'Failed to list documents');
            }
        }
    );

    // Get a document with its lines
    app.get<IdParams>('/documents/:id', { schema: getDocumentSchema }, async (request, reply) => {
        try {
            const document = await withConnection((client) =>
                documentService.getDocument(client, request.params.id)
            );
            return reply.send(presentDocument(document));
        } catch (error) {
            return sendError(request, reply, error, 'Failed to get document');
        }
    });

    // Update a document header
    app.patch<IdParams & { Body: UpdateDocumentRequest }>(
        '/documents/:id',
        { schema: updateDocumentSchema },
        async (request, reply) => {
            try {
                const document = await withTransaction((client) =>
                    documentService.updateDocument(client, request.params.id, request.body)
                );
                return reply.send(presentDocument(document));
            } catch (error) {
                return sendError(request, reply, error, 'Failed to update document');
            }
        }
    );

    // Delete a document (and its transfer leg)
    app.delete<IdParams>(
        '/documents/:id',
        { schema: deleteDocumentSchema },
        async (request, reply) => {
            try {
                const deletedIds = await withTransaction((client) =>
                    documentService.deleteDocument(client, request.params.id)
                );

                request.log.info({ deletedIds }, 'Document deleted');

                return reply.send({ deletedIds });
            } catch (error) {
                return sendError(request, reply, error, 'Failed to delete document');
            }
        }
    );

    // Move assets between warehouses
    app.post<{ Body: TransferRequest }>(
        '/transfers',
        { schema: transferSchema },
        async (request, reply) => {
            try {
                const result = await withTransaction((client) =>
                    documentService.transferAssets(client, request.body)
                );

                request.log.info(
                    {
                        transferId: result.transferId,
                        from: request.body.fromWarehouseId,
                        to: request.body.toWarehouseId,
                    },
                    'Transfer posted'
                );

                return reply.code(201).send({
                    transferId: result.transferId,
                    outgoing: presentDocument(result.outgoing),
                    incoming: presentDocument(result.incoming),
                });
            } catch (error) {
                return sendError(request, reply, error, 'Failed to post transfer');
            }
        }
    );

    // Stock of one asset
    app.get<{ Params: { assetId: number } }>(
        '/stock/assets/:assetId',
        { schema: getAssetStockSchema },
        async (request, reply) => {
            try {
                const stock = await withConnection((client) =>
                    stockService.getAssetStock(client, request.params.assetId)
                );
                return reply.send(stock);
            } catch (error) {
                return sendError(request, reply, error, 'Failed to get asset stock');
            }
        }
    );

    // Stock held at a warehouse
    app.get<IdParams & { Querystring: { includeChildren?: boolean } }>(
        '/stock/warehouses/:id',
        { schema: getWarehouseStockSchema },
        async (request, reply) => {
            try {
                const stock = await withConnection((client) =>
                    stockService.getWarehouseStock(
                        client,
                        request.params.id,
                        request.query.includeChildren ?? false
                    )
                );
                return reply.send(stock);
            } catch (error) {
                return sendError(request, reply, error, 'Failed to get warehouse stock');
            }
        }
    );

    // Constraint violations
    app.get<{ Querystring: { assetId?: number } }>(
        '/alerts',
        { schema: listAlertsSchema },
        async (request, reply) => {
            const { assetId } = request.query;
            try {
                const violations = await withConnection((client) =>
                    stockService.evaluateConstraints(
                        client,
                        assetId === undefined ? undefined : [assetId]
                    )
                );
                return reply.send(violations.map(presentViolation));
            } catch (error) {
                return sendError(request, reply, error, 'Failed to evaluate constraints');
            }
        }
    );
}
