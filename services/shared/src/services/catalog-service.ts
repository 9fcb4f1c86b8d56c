import { PoolClient } from 'pg';
import { assertExists, queryEntity } from '../db/queries';
import {
     assertValidBounds,
     decodeBound,
     encodeBound,
     UNBOUNDED,
} from '../domain/amount-bounds';
import { parseDirection } from '../domain/direction';
import {
     AmountConstraint,
     CreateDocumentTypeRequest,
     CreateMaterialAssetRequest,
     DocumentType,
     MaterialAsset,
     MaterialAssetFilter,
     MeasureUnit,
     SetAmountConstraintRequest,
     UpdateDocumentTypeRequest,
     UpdateMaterialAssetRequest,
} from '../types/catalog.types';
import { EntityInUseError, EntityNotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

interface MeasureUnitRow {
     id: number;
     name: string;
}

interface MaterialAssetRow {
     id: number;
     part_number: string;
     name: string;
     unit_id: number;
     unit_name: string;
     description: string | null;
}

interface AmountConstraintRow {
     id: number;
     asset_id: number;
     part_number: string;
     min_amount: number;
     max_amount: number;
}

interface DocumentTypeRow {
     id: number;
     name: string;
     direction: number;
}

function toMaterialAsset(row: MaterialAssetRow): MaterialAsset {
     return {
          id: row.id,
          partNumber: row.part_number,
          name: row.name,
          unitId: row.unit_id,
          unitName: row.unit_name,
          description: row.description ?? undefined,
     };
}

function toAmountConstraint(row: AmountConstraintRow): AmountConstraint {
     return {
          id: row.id,
          assetId: row.asset_id,
          partNumber: row.part_number,
          minAmount: decodeBound(row.min_amount, 'min'),
          maxAmount: decodeBound(row.max_amount, 'max'),
     };
}

export function toDocumentType(row: DocumentTypeRow): DocumentType {
     return {
          id: row.id,
          name: row.name,
          direction: parseDirection(row.direction),
     };
}

const ASSET_COLUMNS = `a.id, a.part_number, a.name, a.unit_id, u.name AS unit_name, a.description`;

const CONSTRAINT_SELECT = `
      SELECT c.id, c.asset_id, a.part_number, c.min_amount, c.max_amount
      FROM amount_constraint c
      JOIN material_asset a ON a.id = c.asset_id
`;

/**
 * Reference data: measure units, material assets, amount constraints and
 * document types.
 */
export class CatalogService {
     // Measure units

     async listMeasureUnits(client: PoolClient): Promise<MeasureUnit[]> {
          const { rows } = await client.query<MeasureUnitRow>(
               `SELECT id, name FROM measure_unit ORDER BY name`
          );
          return rows.map((row) => ({ id: row.id, name: row.name }));
     }

     async getMeasureUnit(client: PoolClient, id: number): Promise<MeasureUnit> {
          const { rows } = await client.query<MeasureUnitRow>(
               `SELECT id, name FROM measure_unit WHERE id = $1`,
               [id]
          );
          if (rows.length === 0) {
               throw new EntityNotFoundError('MEASURE_UNIT', id);
          }
          return { id: rows[0].id, name: rows[0].name };
     }

     async createMeasureUnit(client: PoolClient, name: string): Promise<MeasureUnit> {
          const { rows } = await queryEntity<MeasureUnitRow>(
               client,
               'MEASURE_UNIT',
               `INSERT INTO measure_unit (name) VALUES ($1) RETURNING id, name`,
               [name]
          );
          logger.info({ unitId: rows[0].id, name }, 'Measure unit created');
          return { id: rows[0].id, name: rows[0].name };
     }

     async renameMeasureUnit(client: PoolClient, id: number, name: string): Promise<MeasureUnit> {
          const { rows } = await queryEntity<MeasureUnitRow>(
               client,
               'MEASURE_UNIT',
               `
      UPDATE measure_unit
      SET name = $2,
          updated_at = NOW()
      WHERE id = $1
      RETURNING id, name
    `,
               [id, name]
          );
          if (rows.length === 0) {
               throw new EntityNotFoundError('MEASURE_UNIT', id);
          }
          return { id: rows[0].id, name: rows[0].name };
     }

     async deleteMeasureUnit(client: PoolClient, id: number): Promise<void> {
          const { rows } = await queryEntity<{ id: number }>(
               client,
               'MEASURE_UNIT',
               `DELETE FROM measure_unit WHERE id = $1 RETURNING id`,
               [id],
               id
          );
          if (rows.length === 0) {
               throw new EntityNotFoundError('MEASURE_UNIT', id);
          }
          logger.info({ unitId: id }, 'Measure unit deleted');
     }

     // Material assets

     async listMaterialAssets(
          client: PoolClient,
          filter: MaterialAssetFilter = {}
     ): Promise<MaterialAsset[]> {
          const { rows } = await client.query<MaterialAssetRow>(
               `
      SELECT ${ASSET_COLUMNS}
      FROM material_asset a
      JOIN measure_unit u ON u.id = a.unit_id
      WHERE ($1::text IS NULL OR a.part_number ILIKE $1 OR a.name ILIKE $1)
        AND ($2::bigint IS NULL OR a.unit_id = $2)
      ORDER BY a.part_number, a.name
    `,
               [filter.search ? `%${filter.search}%` : null, filter.unitId ?? null]
          );
          return rows.map(toMaterialAsset);
     }

     async getMaterialAsset(client: PoolClient, id: number): Promise<MaterialAsset> {
          const { rows } = await client.query<MaterialAssetRow>(
               `
      SELECT ${ASSET_COLUMNS}
      FROM material_asset a
      JOIN measure_unit u ON u.id = a.unit_id
      WHERE a.id = $1
    `,
               [id]
          );
          if (rows.length === 0) {
               throw new EntityNotFoundError('MATERIAL_ASSET', id);
          }
          return toMaterialAsset(rows[0]);
     }

     async createMaterialAsset(
          client: PoolClient,
          request: CreateMaterialAssetRequest
     ): Promise<MaterialAsset> {
          await assertExists(client, 'MEASURE_UNIT', request.unitId);

          const { rows } = await queryEntity<MaterialAssetRow>(
               client,
               'MATERIAL_ASSET',
               `
      WITH a AS (
        INSERT INTO material_asset (part_number, name, unit_id, description)
        VALUES ($1, $2, $3, $4)
        RETURNING *
      )
      SELECT ${ASSET_COLUMNS}
      FROM a
      JOIN measure_unit u ON u.id = a.unit_id
    `,
               [request.partNumber, request.name, request.unitId, request.description ?? null]
          );

          logger.info(
               { assetId: rows[0].id, partNumber: request.partNumber },
               'Material asset created'
          );
          return toMaterialAsset(rows[0]);
     }

     async updateMaterialAsset(
          client: PoolClient,
          id: number,
          request: UpdateMaterialAssetRequest
     ): Promise<MaterialAsset> {
          if (request.unitId !== undefined) {
               await assertExists(client, 'MEASURE_UNIT', request.unitId);
          }

          const { rows } = await queryEntity<MaterialAssetRow>(
               client,
               'MATERIAL_ASSET',
               `
      WITH a AS (
        UPDATE material_asset
        SET part_number = COALESCE($2, part_number),
            name = COALESCE($3, name),
            unit_id = COALESCE($4, unit_id),
            description = CASE WHEN $5::boolean THEN $6::text ELSE description END,
            updated_at = NOW()
        WHERE id = $1
        RETURNING *
      )
      SELECT ${ASSET_COLUMNS}
      FROM a
      JOIN measure_unit u ON u.id = a.unit_id
    `,
               [
                    id,
                    request.partNumber ?? null,
                    request.name ?? null,
                    request.unitId ?? null,
                    request.description !== undefined,
                    request.description ?? null,
               ]
          );

          if (rows.length === 0) {
               throw new EntityNotFoundError('MATERIAL_ASSET', id);
          }
          return toMaterialAsset(rows[0]);
     }

     async deleteMaterialAsset(client: PoolClient, id: number): Promise<void> {
          const { rows } = await queryEntity<{ id: number }>(
               client,
               'MATERIAL_ASSET',
               `DELETE FROM material_asset WHERE id = $1 RETURNING id`,
               [id],
               id
          );
          if (rows.length === 0) {
               throw new EntityNotFoundError('MATERIAL_ASSET', id);
          }
          logger.info({ assetId: id }, 'Material asset deleted');
     }

     // Amount constraints

     async listAmountConstraints(client: PoolClient): Promise<AmountConstraint[]> {
          const { rows } = await client.query<AmountConstraintRow>(
               `${CONSTRAINT_SELECT} ORDER BY a.part_number`
          );
          return rows.map(toAmountConstraint);
     }

     async getAmountConstraint(client: PoolClient, assetId: number): Promise<AmountConstraint> {
          const { rows } = await client.query<AmountConstraintRow>(
               `${CONSTRAINT_SELECT} WHERE c.asset_id = $1`,
               [assetId]
          );
          if (rows.length === 0) {
               throw new EntityNotFoundError('AMOUNT_CONSTRAINT', assetId);
          }
          return toAmountConstraint(rows[0]);
     }

     /**
      * Create or update the constraint of an asset. Omitted bounds keep their
      * current value; a new constraint starts unbounded on both sides.
      */
     async setAmountConstraint(
          client: PoolClient,
          request: SetAmountConstraintRequest
     ): Promise<AmountConstraint> {
          const { rows: current } = await client.query<{
               id: number;
               part_number: string;
               min_amount: number | null;
               max_amount: number | null;
          }>(
               `
      SELECT a.id, a.part_number, c.min_amount, c.max_amount
      FROM material_asset a
      LEFT JOIN amount_constraint c ON c.asset_id = a.id
      WHERE a.id = $1
      FOR UPDATE OF a
    `,
               [request.assetId]
          );

          if (current.length === 0) {
               throw new EntityNotFoundError('MATERIAL_ASSET', request.assetId);
          }

          const bounds = {
               minAmount: request.minAmount ?? decodeBound(current[0].min_amount ?? UNBOUNDED, 'min'),
               maxAmount: request.maxAmount ?? decodeBound(current[0].max_amount ?? UNBOUNDED, 'max'),
          };
          assertValidBounds(bounds);

          const { rows } = await client.query<Omit<AmountConstraintRow, 'part_number'>>(
               `
      INSERT INTO amount_constraint (asset_id, min_amount, max_amount)
      VALUES ($1, $2, $3)
      ON CONFLICT (asset_id) DO UPDATE
      SET min_amount = EXCLUDED.min_amount,
          max_amount = EXCLUDED.max_amount,
          updated_at = NOW()
      RETURNING id, asset_id, min_amount, max_amount
    `,
               [
                    request.assetId,
                    encodeBound(bounds.minAmount, 'min'),
                    encodeBound(bounds.maxAmount, 'max'),
               ]
          );

          logger.info(
               {
                    assetId: request.assetId,
                    minAmount: rows[0].min_amount,
                    maxAmount: rows[0].max_amount,
               },
               'Amount constraint set'
          );

          return toAmountConstraint({ ...rows[0], part_number: current[0].part_number });
     }

     async deleteAmountConstraint(client: PoolClient, assetId: number): Promise<void> {
          const { rows } = await client.query<{ id: number }>(
               `DELETE FROM amount_constraint WHERE asset_id = $1 RETURNING id`,
               [assetId]
          );
          if (rows.length === 0) {
               throw new EntityNotFoundError('AMOUNT_CONSTRAINT', assetId);
          }
          logger.info({ assetId }, 'Amount constraint deleted');
     }

     // Document types

     async listDocumentTypes(client: PoolClient): Promise<DocumentType[]> {
          const { rows } = await client.query<DocumentTypeRow>(
               `SELECT id, name, direction FROM document_type ORDER BY name`
          );
          return rows.map(toDocumentType);
     }

     async getDocumentType(client: PoolClient, id: number): Promise<DocumentType> {
          const { rows } = await client.query<DocumentTypeRow>(
               `SELECT id, name, direction FROM document_type WHERE id = $1`,
               [id]
          );
          if (rows.length === 0) {
               throw new EntityNotFoundError('DOCUMENT_TYPE', id);
          }
          return toDocumentType(rows[0]);
     }

     async createDocumentType(
          client: PoolClient,
          request: CreateDocumentTypeRequest
     ): Promise<DocumentType> {
          const direction = parseDirection(request.direction);

          const { rows } = await queryEntity<DocumentTypeRow>(
               client,
               'DOCUMENT_TYPE',
               `
      INSERT INTO document_type (name, direction)
      VALUES ($1, $2)
      RETURNING id, name, direction
    `,
               [request.name, direction]
          );

          logger.info({ documentTypeId: rows[0].id, direction }, 'Document type created');
          return toDocumentType(rows[0]);
     }

     /**
      * Rename a type or change its direction. The direction is frozen once
      * documents use the type.
      */
     async updateDocumentType(
          client: PoolClient,
          id: number,
          request: UpdateDocumentTypeRequest
     ): Promise<DocumentType> {
          const direction =
               request.direction === undefined ? null : parseDirection(request.direction);

          if (direction !== null) {
               // Postings read the type FOR SHARE, so this waits for them to commit
               const { rows: current } = await client.query<{ direction: number }>(
                    `SELECT direction FROM document_type WHERE id = $1 FOR UPDATE`,
                    [id]
               );

               if (current.length === 0) {
                    throw new EntityNotFoundError('DOCUMENT_TYPE', id);
               }

               if (current[0].direction !== direction) {
                    // Separate statement: its snapshot includes documents committed while waiting
                    const { rows: usage } = await client.query<{ in_use: boolean }>(
                         `SELECT EXISTS (SELECT 1 FROM document WHERE document_type_id = $1) AS in_use`,
                         [id]
                    );

                    if (usage[0].in_use) {
                         throw new EntityInUseError(
                              'DOCUMENT_TYPE',
                              id,
                              `Direction of document type ${id} cannot change: documents already use it`
                         );
                    }
               }
          }

          const { rows } = await queryEntity<DocumentTypeRow>(
               client,
               'DOCUMENT_TYPE',
               `
      UPDATE document_type
      SET name = COALESCE($2, name),
          direction = COALESCE($3, direction),
          updated_at = NOW()
      WHERE id = $1
      RETURNING id, name, direction
    `,
               [id, request.name ?? null, direction]
          );

          if (rows.length === 0) {
               throw new EntityNotFoundError('DOCUMENT_TYPE', id);
          }
          return toDocumentType(rows[0]);
     }

     async deleteDocumentType(client: PoolClient, id: number): Promise<void> {
          const { rows } = await queryEntity<{ id: number }>(
               client,
               'DOCUMENT_TYPE',
               `DELETE FROM document_type WHERE id = $1 RETURNING id`,
               [id],
               id
          );
          if (rows.length === 0) {
               throw new EntityNotFoundError('DOCUMENT_TYPE', id);
          }
          logger.info({ documentTypeId: id }, 'Document type deleted');
     }
}
