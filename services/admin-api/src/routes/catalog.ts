import { FastifyInstance } from 'fastify';
import { withConnection, withTransaction } from '@stockroom/shared/src/db/client';
import { boundFromJson } from '@stockroom/shared/src/domain/amount-bounds';
import { CatalogService } from '@stockroom/shared/src/services/catalog-service';
import type {
     CreateDocumentTypeRequest,
     CreateMaterialAssetRequest,
     MaterialAssetFilter,
     UpdateDocumentTypeRequest,
     UpdateMaterialAssetRequest,
} from '@stockroom/shared/src/types/catalog.types';
import { sendError } from '@stockroom/shared/src/utils/http';
import {
     presentAmountConstraint,
     presentDocumentType,
     presentMaterialAsset,
     presentMeasureUnit,
} from '@stockroom/shared/src/utils/presenters';
import {
     createDocumentTypeSchema,
     createMaterialAssetSchema,
     createMeasureUnitSchema,
     deleteAmountConstraintSchema,
     deleteDocumentTypeSchema,
     deleteMaterialAssetSchema,
     deleteMeasureUnitSchema,
     getAmountConstraintSchema,
     getDocumentTypeSchema,
     getMaterialAssetSchema,
     getMeasureUnitSchema,
     listAmountConstraintsSchema,
     listDocumentTypesSchema,
     listMaterialAssetsSchema,
     listMeasureUnitsSchema,
     renameMeasureUnitSchema,
     setAmountConstraintSchema,
     updateDocumentTypeSchema,
     updateMaterialAssetSchema,
} from '../schemas/catalog.schemas';

type IdParams = { Params: { id: number } };
type AssetParams = { Params: { assetId: number } };

const catalog = new CatalogService();

export async function registerCatalogRoutes(app: FastifyInstance) {
     // Measure units

     app.get('/measure-units', { schema: listMeasureUnitsSchema }, async (request, reply) => {
          try {
               const units = await withConnection((client) => catalog.listMeasureUnits(client));
               return reply.send(units.map(presentMeasureUnit));
          } catch (error) {
               return sendError(request, reply, error, 'Failed to list measure units');
          }
     });

     app.get<IdParams>(
          '/measure-units/:id',
          { schema: getMeasureUnitSchema },
          async (request, reply) => {
               try {
                    const unit = await withConnection((client) =>
                         catalog.getMeasureUnit(client, request.params.id)
                    );
                    return reply.send(presentMeasureUnit(unit));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to get measure unit');
               }
          }
     );

     app.post<{ Body: { name: string } }>(
          '/measure-units',
          { schema: createMeasureUnitSchema },
          async (request, reply) => {
               try {
                    const unit = await withTransaction((client) =>
                         catalog.createMeasureUnit(client, request.body.name)
                    );
                    return reply.code(201).send(presentMeasureUnit(unit));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to create measure unit');
               }
          }
     );

     app.put<IdParams & { Body: { name: string } }>(
          '/measure-units/:id',
          { schema: renameMeasureUnitSchema },
          async (request, reply) => {
               try {
                    const unit = await withTransaction((client) =>
                         catalog.renameMeasureUnit(client, request.params.id, request.body.name)
                    );
                    return reply.send(presentMeasureUnit(unit));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to rename measure unit');
               }
          }
     );

     app.delete<IdParams>(
          '/measure-units/:id',
          { schema: deleteMeasureUnitSchema },
          async (request, reply) => {
               try {
                    await withTransaction((client) =>
                         catalog.deleteMeasureUnit(client, request.params.id)
                    );
                    return reply.code(204).send();
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to delete measure unit');
               }
          }
     );

     // Material assets

     app.get<{ Querystring: MaterialAssetFilter }>(
          '/material-assets',
          { schema: listMaterialAssetsSchema },
          async (request, reply) => {
               try {
                    const assets = await withConnection((client) =>
                         catalog.listMaterialAssets(client, request.query)
                    );
                    return reply.send(assets.map(presentMaterialAsset));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to list material assets');
               }
          }
     );

     app.get<IdParams>(
          '/material-assets/:id',
          { schema: getMaterialAssetSchema },
          async (request, reply) => {
               try {
                    const asset = await withConnection((client) =>
                         catalog.getMaterialAsset(client, request.params.id)
                    );
                    return reply.send(presentMaterialAsset(asset));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to get material asset');
               }
          }
     );

     app.post<{ Body: CreateMaterialAssetRequest }>(
          '/material-assets',
          { schema: createMaterialAssetSchema },
          async (request, reply) => {
               try {
                    const asset = await withTransaction((client) =>
                         catalog.createMaterialAsset(client, request.body)
                    );
                    return reply.code(201).send(presentMaterialAsset(asset));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to create material asset');
               }
          }
     );

     app.patch<IdParams & { Body: UpdateMaterialAssetRequest }>(
          '/material-assets/:id',
          { schema: updateMaterialAssetSchema },
          async (request, reply) => {
               try {
                    const asset = await withTransaction((client) =>
                         catalog.updateMaterialAsset(client, request.params.id, request.body)
                    );
                    return reply.send(presentMaterialAsset(asset));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to update material asset');
               }
          }
     );

     app.delete<IdParams>(
          '/material-assets/:id',
          { schema: deleteMaterialAssetSchema },
          async (request, reply) => {
               try {
                    await withTransaction((client) =>
                         catalog.deleteMaterialAsset(client, request.params.id)
                    );
                    return reply.code(204).send();
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to delete material asset');
               }
          }
     );

     // Amount constraints

     app.get(
          '/amount-constraints',
          { schema: listAmountConstraintsSchema },
          async (request, reply) => {
               try {
                    const constraints = await withConnection((client) =>
                         catalog.listAmountConstraints(client)
                    );
                    return reply.send(constraints.map(presentAmountConstraint));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to list amount constraints');
               }
          }
     );

     app.get<AssetParams>(
          '/amount-constraints/:assetId',
          { schema: getAmountConstraintSchema },
          async (request, reply) => {
               try {
                    const constraint = await withConnection((client) =>
                         catalog.getAmountConstraint(client, request.params.assetId)
                    );
                    return reply.send(presentAmountConstraint(constraint));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to get amount constraint');
               }
          }
     );

     app.put<AssetParams & { Body: { minAmount?: number | null; maxAmount?: number | null } }>(
          '/amount-constraints/:assetId',
          { schema: setAmountConstraintSchema },
          async (request, reply) => {
               const { minAmount, maxAmount } = request.body;
               try {
                    const constraint = await withTransaction((client) =>
                         catalog.setAmountConstraint(client, {
                              assetId: request.params.assetId,
                              minAmount:
                                   minAmount === undefined ? undefined : boundFromJson(minAmount, 'min'),
                              maxAmount:
                                   maxAmount === undefined ? undefined : boundFromJson(maxAmount, 'max'),
                         })
                    );
                    request.log.info(
                         { assetId: constraint.assetId, constraintId: constraint.id },
                         'Amount constraint set'
                    );
                    return reply.send(presentAmountConstraint(constraint));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to set amount constraint');
               }
          }
     );

     app.delete<AssetParams>(
          '/amount-constraints/:assetId',
          { schema: deleteAmountConstraintSchema },
          async (request, reply) => {
               try {
                    await withTransaction((client) =>
                         catalog.deleteAmountConstraint(client, request.params.assetId)
                    );
                    return reply.code(204).send();
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to delete amount constraint');
               }
          }
     );

     // Document types

     app.get('/document-types', { schema: listDocumentTypesSchema }, async (request, reply) => {
          try {
               const types = await withConnection((client) => catalog.listDocumentTypes(client));
               return reply.send(types.map(presentDocumentType));
          } catch (error) {
               return sendError(request, reply, error, 'Failed to list document types');
          }
     });

     app.get<IdParams>(
          '/document-types/:id',
          { schema: getDocumentTypeSchema },
          async (request, reply) => {
               try {
                    const type = await withConnection((client) =>
                         catalog.getDocumentType(client, request.params.id)
                    );
                    return reply.send(presentDocumentType(type));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to get document type');
               }
          }
     );

     app.post<{ Body: CreateDocumentTypeRequest }>(
          '/document-types',
          { schema: createDocumentTypeSchema },
          async (request, reply) => {
               try {
                    const type = await withTransaction((client) =>
                         catalog.createDocumentType(client, request.body)
                    );
                    return reply.code(201).send(presentDocumentType(type));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to create document type');
               }
          }
     );

     app.patch<IdParams & { Body: UpdateDocumentTypeRequest }>(
          '/document-types/:id',
          { schema: updateDocumentTypeSchema },
          async (request, reply) => {
               try {
                    const type = await withTransaction((client) =>
                         catalog.updateDocumentType(client, request.params.id, request.body)
                    );
                    return reply.send(presentDocumentType(type));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to update document type');
               }
          }
     );

     app.delete<IdParams>(
          '/document-types/:id',
          { schema: deleteDocumentTypeSchema },
          async (request, reply) => {
               try {
                    await withTransaction((client) =>
                         catalog.deleteDocumentType(client, request.params.id)
                    );
                    return reply.code(204).send();
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to delete document type');
               }
          }
     );
}
