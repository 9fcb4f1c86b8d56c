import { PoolClient } from 'pg';
import { assertExists } from '../db/queries';
import { checkAmount, decodeBound } from '../domain/amount-bounds';
import {
     AssetStock,
     ConstraintViolation,
     WarehouseStock,
} from '../types/document.types';
import { EntityNotFoundError } from '../utils/errors';
import { WarehouseService } from './warehouse-service';

// Every stock figure is derived from document lines: Σ direction × amount
const MOVEMENTS = `
      document_line l
      JOIN document d ON d.id = l.document_id
      JOIN document_type t ON t.id = d.document_type_id
`;
const ON_HAND = `SUM(l.amount * t.direction)::bigint`;

export class StockService {
     constructor(private readonly warehouses: WarehouseService = new WarehouseService()) {}

     /**
      * On-hand quantity of the given assets at one warehouse. Assets without
      * movements there map to 0.
      */
     async getWarehouseBalances(
          client: PoolClient,
          warehouseId: number,
          assetIds: number[]
     ): Promise<Map<number, number>> {
          const { rows } = await client.query<{ asset_id: number; on_hand: number }>(
               `
      SELECT l.asset_id, ${ON_HAND} AS on_hand
      FROM ${MOVEMENTS}
      WHERE d.warehouse_id = $1
        AND l.asset_id = ANY($2::bigint[])
      GROUP BY l.asset_id
    `,
               [warehouseId, assetIds]
          );

          const balances = new Map<number, number>(assetIds.map((id) => [id, 0]));
          for (const row of rows) {
               balances.set(row.asset_id, row.on_hand);
          }
          return balances;
     }

     /**
      * Per-warehouse quantities of one asset plus the total
      */
     async getAssetStock(client: PoolClient, assetId: number): Promise<AssetStock> {
          const { rows: assets } = await client.query<{ id: number; part_number: string }>(
               `SELECT id, part_number FROM material_asset WHERE id = $1`,
               [assetId]
          );
          if (assets.length === 0) {
               throw new EntityNotFoundError('MATERIAL_ASSET', assetId);
          }

          const { rows } = await client.query<{
               warehouse_id: number;
               warehouse_name: string;
               on_hand: number;
          }>(
               `
      SELECT d.warehouse_id, w.name AS warehouse_name, ${ON_HAND} AS on_hand
      FROM ${MOVEMENTS}
      JOIN warehouse w ON w.id = d.warehouse_id
      WHERE l.asset_id = $1
      GROUP BY d.warehouse_id, w.name
      HAVING SUM(l.amount * t.direction) <> 0
      ORDER BY w.name
    `,
               [assetId]
          );

          const warehouses = rows.map((row) => ({
               warehouseId: row.warehouse_id,
               warehouseName: row.warehouse_name,
               onHand: row.on_hand,
          }));

          return {
               assetId,
               partNumber: assets[0].part_number,
               total: warehouses.reduce((sum, w) => sum + w.onHand, 0),
               warehouses,
          };
     }

     /**
      * Per-asset quantities at a warehouse, optionally summed over its subtree
      */
     async getWarehouseStock(
          client: PoolClient,
          warehouseId: number,
          includeChildren: boolean = false
     ): Promise<WarehouseStock> {
          let warehouseIds: number[];
          if (includeChildren) {
               warehouseIds = await this.warehouses.getSubtreeIds(client, warehouseId);
          } else {
               await assertExists(client, 'WAREHOUSE', warehouseId);
               warehouseIds = [warehouseId];
          }

          const { rows } = await client.query<{
               asset_id: number;
               part_number: string;
               asset_name: string;
               unit_name: string;
               on_hand: number;
          }>(
               `
      SELECT l.asset_id, a.part_number, a.name AS asset_name, u.name AS unit_name,
             ${ON_HAND} AS on_hand
      FROM ${MOVEMENTS}
      JOIN material_asset a ON a.id = l.asset_id
      JOIN measure_unit u ON u.id = a.unit_id
      WHERE d.warehouse_id = ANY($1::bigint[])
      GROUP BY l.asset_id, a.part_number, a.name, u.name
      HAVING SUM(l.amount * t.direction) <> 0
      ORDER BY a.part_number
    `,
               [warehouseIds]
          );

          return {
               warehouseId,
               warehouseIds,
               assets: rows.map((row) => ({
                    assetId: row.asset_id,
                    partNumber: row.part_number,
                    assetName: row.asset_name,
                    unitName: row.unit_name,
                    onHand: row.on_hand,
               })),
          };
     }

     /**
      * Compares the total on-hand quantity (all warehouses) of constrained
      * assets with their bounds. `assetIds` narrows the check.
      */
     async evaluateConstraints(
          client: PoolClient,
          assetIds?: number[]
     ): Promise<ConstraintViolation[]> {
          const { rows } = await client.query<{
               asset_id: number;
               part_number: string;
               min_amount: number;
               max_amount: number;
               on_hand: number;
          }>(
               `
      SELECT c.asset_id, a.part_number, c.min_amount, c.max_amount,
             COALESCE(s.on_hand, 0)::bigint AS on_hand
      FROM amount_constraint c
      JOIN material_asset a ON a.id = c.asset_id
      LEFT JOIN (
        SELECT l.asset_id, SUM(l.amount * t.direction) AS on_hand
        FROM ${MOVEMENTS}
        GROUP BY l.asset_id
      ) s ON s.asset_id = c.asset_id
      WHERE ($1::bigint[] IS NULL OR c.asset_id = ANY($1::bigint[]))
      ORDER BY a.part_number
    `,
               [assetIds ?? null]
          );

          const violations: ConstraintViolation[] = [];
          for (const row of rows) {
               const bounds = {
                    minAmount: decodeBound(row.min_amount, 'min'),
                    maxAmount: decodeBound(row.max_amount, 'max'),
               };
               const kind = checkAmount(bounds, row.on_hand);
               if (kind) {
                    violations.push({
                         assetId: row.asset_id,
                         partNumber: row.part_number,
                         onHand: row.on_hand,
                         ...bounds,
                         kind,
                    });
               }
          }
          return violations;
     }
}
