import { PoolClient } from 'pg';
import { ENTITY_TABLES } from '../db/entities';
import { assertExists, queryEntity } from '../db/queries';
import type { TreeEntry } from '../types/structure.types';
import { EntityNotFoundError, TreeCycleError } from '../utils/errors';

export interface TreeRow {
     id: number;
     name: string;
     parent_id: number | null;
}

export interface TreeTable<R extends TreeRow, T> {
     entity: 'WAREHOUSE' | 'CONTRACTOR_GROUP';
     // Select list over the table aliased as `n`
     columns: string;
     mapRow: (row: R) => T;
}

/**
 * Queries shared by the self-referencing `parent_id` tables. Traversal uses
 * recursive CTEs; siblings are ordered by name.
 */
export class TreeStore<R extends TreeRow, T> {
     constructor(private readonly table: TreeTable<R, T>) {}

     private get tableName(): string {
          return ENTITY_TABLES[this.table.entity];
     }

     /**
      * Depth-first listing of every tree in the table
      */
     async listTree(client: PoolClient): Promise<Array<TreeEntry<T>>> {
          const { rows } = await client.query<R & { depth: number; path: string[] }>(
               `
      WITH RECURSIVE tree AS (
        SELECT id, 0 AS depth, ARRAY[name]::text[] AS path
        FROM ${this.tableName}
        WHERE parent_id IS NULL
        UNION ALL
        SELECT c.id, t.depth + 1, t.path || c.name::text
        FROM ${this.tableName} c
        JOIN tree t ON c.parent_id = t.id
      )
      SELECT ${this.table.columns}, tree.depth, tree.path
      FROM tree
      JOIN ${this.tableName} n ON n.id = tree.id
      ORDER BY tree.path
    `
          );

          return rows.map((row) => ({
               ...this.table.mapRow(row),
               depth: row.depth,
               path: row.path,
          }));
     }

     async get(client: PoolClient, id: number): Promise<T> {
          const { rows } = await client.query<R>(
               `SELECT ${this.table.columns} FROM ${this.tableName} n WHERE n.id = $1`,
               [id]
          );
          if (rows.length === 0) {
               throw new EntityNotFoundError(this.table.entity, id);
          }
          return this.table.mapRow(rows[0]);
     }

     /**
      * Ancestors of a node, root first, excluding the node itself
      */
     async getAncestors(client: PoolClient, id: number): Promise<T[]> {
          const { rows } = await client.query<R & { distance: number }>(
               `
      WITH RECURSIVE chain AS (
        SELECT id, parent_id, 0 AS distance
        FROM ${this.tableName}
        WHERE id = $1
        UNION ALL
        SELECT p.id, p.parent_id, chain.distance + 1
        FROM ${this.tableName} p
        JOIN chain ON p.id = chain.parent_id
      )
      SELECT ${this.table.columns}, chain.distance
      FROM chain
      JOIN ${this.tableName} n ON n.id = chain.id
      ORDER BY chain.distance DESC
    `,
               [id]
          );

          if (rows.length === 0) {
               throw new EntityNotFoundError(this.table.entity, id);
          }

          return rows.filter((row) => row.distance > 0).map((row) => this.table.mapRow(row));
     }

     /**
      * Ids of the node and everything below it
      */
     async getSubtreeIds(client: PoolClient, id: number): Promise<number[]> {
          const { rows } = await client.query<{ id: number }>(
               `
      WITH RECURSIVE subtree AS (
        SELECT id FROM ${this.tableName} WHERE id = $1
        UNION ALL
        SELECT c.id
        FROM ${this.tableName} c
        JOIN subtree s ON c.parent_id = s.id
      )
      SELECT id FROM subtree
    `,
               [id]
          );

          if (rows.length === 0) {
               throw new EntityNotFoundError(this.table.entity, id);
          }

          return rows.map((row) => row.id);
     }

     /**
      * Checks that `parentId` exists and, for an existing node, that it is
      * not the node itself or one of its descendants.
      *
      * Moves take a table lock that conflicts with itself, so two moves in
      * one tree cannot each pass the check against a stale subtree. The lock
      * is held until the surrounding transaction ends.
      */
     async assertParentAllowed(
          client: PoolClient,
          nodeId: number | null,
          parentId: number
     ): Promise<void> {
          if (nodeId === parentId) {
               throw new TreeCycleError(this.table.entity, nodeId, parentId);
          }

          if (nodeId !== null) {
               await client.query(`LOCK TABLE ${this.tableName} IN SHARE ROW EXCLUSIVE MODE`);
          }

          await assertExists(client, this.table.entity, parentId);

          if (nodeId === null) {
               return;
          }

          const { rows } = await client.query<{ id: number }>(
               `
      WITH RECURSIVE subtree AS (
        SELECT id FROM ${this.tableName} WHERE id = $1
        UNION ALL
        SELECT c.id
        FROM ${this.tableName} c
        JOIN subtree s ON c.parent_id = s.id
      )
      SELECT id FROM subtree WHERE id = $2
    `,
               [nodeId, parentId]
          );

          if (rows.length > 0) {
               throw new TreeCycleError(this.table.entity, nodeId, parentId);
          }
     }

     /**
      * Deletes a node. Children and other references keep it in place.
      */
     async delete(client: PoolClient, id: number): Promise<void> {
          const { rows } = await queryEntity<{ id: number }>(
               client,
               this.table.entity,
               `DELETE FROM ${this.tableName} WHERE id = $1 RETURNING id`,
               [id],
               id
          );
          if (rows.length === 0) {
               throw new EntityNotFoundError(this.table.entity, id);
          }
     }
}
