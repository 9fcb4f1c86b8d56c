import { PoolClient } from 'pg';
import { queryEntity } from '../db/queries';
import {
     CreateWarehouseRequest,
     TreeEntry,
     UpdateWarehouseRequest,
     Warehouse,
     WarehouseKind,
} from '../types/structure.types';
import { EntityNotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { TreeStore } from './tree-store';

interface WarehouseRow {
     id: number;
     name: string;
     parent_id: number | null;
     kind: WarehouseKind;
}

function toWarehouse(row: WarehouseRow): Warehouse {
     return {
          id: row.id,
          name: row.name,
          parentId: row.parent_id ?? undefined,
          kind: row.kind,
     };
}

export class WarehouseService {
     private readonly tree = new TreeStore<WarehouseRow, Warehouse>({
          entity: 'WAREHOUSE',
          columns: 'n.id, n.name, n.parent_id, n.kind',
          mapRow: toWarehouse,
     });

     async listWarehouses(client: PoolClient): Promise<Array<TreeEntry<Warehouse>>> {
          return this.tree.listTree(client);
     }

     async getWarehouse(client: PoolClient, id: number): Promise<Warehouse> {
          return this.tree.get(client, id);
     }

     async getAncestors(client: PoolClient, id: number): Promise<Warehouse[]> {
          return this.tree.getAncestors(client, id);
     }

     async getSubtreeIds(client: PoolClient, id: number): Promise<number[]> {
          return this.tree.getSubtreeIds(client, id);
     }

     async createWarehouse(client: PoolClient, request: CreateWarehouseRequest): Promise<Warehouse> {
          if (request.parentId != null) {
               await this.tree.assertParentAllowed(client, null, request.parentId);
          }

          const { rows } = await queryEntity<WarehouseRow>(
               client,
               'WAREHOUSE',
               `
      INSERT INTO warehouse (name, parent_id, kind)
      VALUES ($1, $2, $3)
      RETURNING id, name, parent_id, kind
    `,
               [request.name, request.parentId ?? null, request.kind ?? 'PHYSICAL']
          );

          logger.info(
               { warehouseId: rows[0].id, parentId: rows[0].parent_id },
               'Warehouse created'
          );
          return toWarehouse(rows[0]);
     }

     /**
      * Rename, re-kind or move a warehouse. `parentId: null` makes it a root.
      */
     async updateWarehouse(
          client: PoolClient,
          id: number,
          request: UpdateWarehouseRequest
     ): Promise<Warehouse> {
          if (request.parentId != null) {
               await this.tree.assertParentAllowed(client, id, request.parentId);
          }

          const { rows } = await queryEntity<WarehouseRow>(
               client,
               'WAREHOUSE',
               `
      UPDATE warehouse
      SET name = COALESCE($2, name),
          kind = COALESCE($3, kind),
          parent_id = CASE WHEN $4::boolean THEN $5::bigint ELSE parent_id END,
          updated_at = NOW()
      WHERE id = $1
      RETURNING id, name, parent_id, kind
    `,
               [
                    id,
                    request.name ?? null,
                    request.kind ?? null,
                    request.parentId !== undefined,
                    request.parentId ?? null,
               ]
          );

          if (rows.length === 0) {
               throw new EntityNotFoundError('WAREHOUSE', id);
          }
          return toWarehouse(rows[0]);
     }

     async deleteWarehouse(client: PoolClient, id: number): Promise<void> {
          await this.tree.delete(client, id);
          logger.info({ warehouseId: id }, 'Warehouse deleted');
     }
}
