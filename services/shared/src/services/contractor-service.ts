import { PoolClient } from 'pg';
import { assertExists, queryEntity } from '../db/queries';
import {
     Contractor,
     ContractorFilter,
     ContractorGroup,
     CreateContractorGroupRequest,
     CreateContractorRequest,
     TreeEntry,
     UpdateContractorGroupRequest,
     UpdateContractorRequest,
} from '../types/structure.types';
import { EntityNotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { TreeRow, TreeStore } from './tree-store';

interface ContractorRow {
     id: number;
     name: string;
     group_id: number | null;
     group_name: string | null;
     description: string | null;
}

function toContractorGroup(row: TreeRow): ContractorGroup {
     return {
          id: row.id,
          name: row.name,
          parentId: row.parent_id ?? undefined,
     };
}

function toContractor(row: ContractorRow): Contractor {
     return {
          id: row.id,
          name: row.name,
          groupId: row.group_id ?? undefined,
          groupName: row.group_name ?? undefined,
          description: row.description ?? undefined,
     };
}

const CONTRACTOR_COLUMNS = `c.id, c.name, c.group_id, g.name AS group_name, c.description`;

export class ContractorService {
     private readonly groups = new TreeStore<TreeRow, ContractorGroup>({
          entity: 'CONTRACTOR_GROUP',
          columns: 'n.id, n.name, n.parent_id',
          mapRow: toContractorGroup,
     });

     // Contractor groups

     async listGroups(client: PoolClient): Promise<Array<TreeEntry<ContractorGroup>>> {
          return this.groups.listTree(client);
     }

     async getGroup(client: PoolClient, id: number): Promise<ContractorGroup> {
          return this.groups.get(client, id);
     }

     async createGroup(
          client: PoolClient,
          request: CreateContractorGroupRequest
     ): Promise<ContractorGroup> {
          if (request.parentId != null) {
               await this.groups.assertParentAllowed(client, null, request.parentId);
          }

          const { rows } = await queryEntity<TreeRow>(
               client,
               'CONTRACTOR_GROUP',
               `
      INSERT INTO contractor_group (name, parent_id)
      VALUES ($1, $2)
      RETURNING id, name, parent_id
    `,
               [request.name, request.parentId ?? null]
          );

          logger.info({ groupId: rows[0].id }, 'Contractor group created');
          return toContractorGroup(rows[0]);
     }

     async updateGroup(
          client: PoolClient,
          id: number,
          request: UpdateContractorGroupRequest
     ): Promise<ContractorGroup> {
          if (request.parentId != null) {
               await this.groups.assertParentAllowed(client, id, request.parentId);
          }

          const { rows } = await queryEntity<TreeRow>(
               client,
               'CONTRACTOR_GROUP',
               `
      UPDATE contractor_group
      SET name = COALESCE($2, name),
          parent_id = CASE WHEN $3::boolean THEN $4::bigint ELSE parent_id END,
          updated_at = NOW()
      WHERE id = $1
      RETURNING id, name, parent_id
    `,
               [id, request.name ?? null, request.parentId !== undefined, request.parentId ?? null]
          );

          if (rows.length === 0) {
               throw new EntityNotFoundError('CONTRACTOR_GROUP', id);
          }
          return toContractorGroup(rows[0]);
     }

     async deleteGroup(client: PoolClient, id: number): Promise<void> {
          await this.groups.delete(client, id);
          logger.info({ groupId: id }, 'Contractor group deleted');
     }

     // Contractors

     async listContractors(
          client: PoolClient,
          filter: ContractorFilter = {}
     ): Promise<Contractor[]> {
          let groupIds: number[] | null = null;
          if (filter.groupId !== undefined) {
               groupIds = filter.includeSubgroups
                    ? await this.groups.getSubtreeIds(client, filter.groupId)
                    : [filter.groupId];
          }

          const { rows } = await client.query<ContractorRow>(
               `
      SELECT ${CONTRACTOR_COLUMNS}
      FROM contractor c
      LEFT JOIN contractor_group g ON g.id = c.group_id
      WHERE ($1::bigint[] IS NULL OR c.group_id = ANY($1::bigint[]))
      ORDER BY c.name
    `,
               [groupIds]
          );
          return rows.map(toContractor);
     }

     async getContractor(client: PoolClient, id: number): Promise<Contractor> {
          const { rows } = await client.query<ContractorRow>(
               `
      SELECT ${CONTRACTOR_COLUMNS}
      FROM contractor c
      LEFT JOIN contractor_group g ON g.id = c.group_id
      WHERE c.id = $1
    `,
               [id]
          );
          if (rows.length === 0) {
               throw new EntityNotFoundError('CONTRACTOR', id);
          }
          return toContractor(rows[0]);
     }

     async createContractor(
          client: PoolClient,
          request: CreateContractorRequest
     ): Promise<Contractor> {
          if (request.groupId != null) {
               await assertExists(client, 'CONTRACTOR_GROUP', request.groupId);
          }

          const { rows } = await queryEntity<ContractorRow>(
               client,
               'CONTRACTOR',
               `
      WITH c AS (
        INSERT INTO contractor (name, group_id, description)
        VALUES ($1, $2, $3)
        RETURNING *
      )
      SELECT ${CONTRACTOR_COLUMNS}
      FROM c
      LEFT JOIN contractor_group g ON g.id = c.group_id
    `,
               [request.name, request.groupId ?? null, request.description ?? null]
          );

          logger.info({ contractorId: rows[0].id }, 'Contractor created');
          return toContractor(rows[0]);
     }

     async updateContractor(
          client: PoolClient,
          id: number,
          request: UpdateContractorRequest
     ): Promise<Contractor> {
          if (request.groupId != null) {
               await assertExists(client, 'CONTRACTOR_GROUP', request.groupId);
          }

          const { rows } = await queryEntity<ContractorRow>(
               client,
               'CONTRACTOR',
               `
      WITH c AS (
        UPDATE contractor
        SET name = COALESCE($2, name),
            group_id = CASE WHEN $3::boolean THEN $4::bigint ELSE group_id END,
            description = CASE WHEN $5::boolean THEN $6::text ELSE description END,
            updated_at = NOW()
        WHERE id = $1
        RETURNING *
      )
      SELECT ${CONTRACTOR_COLUMNS}
      FROM c
      LEFT JOIN contractor_group g ON g.id = c.group_id
    `,
               [
                    id,
                    request.name ?? null,
                    request.groupId !== undefined,
                    request.groupId ?? null,
                    request.description !== undefined,
                    request.description ?? null,
               ]
          );

          if (rows.length === 0) {
               throw new EntityNotFoundError('CONTRACTOR', id);
          }
          return toContractor(rows[0]);
     }

     async deleteContractor(client: PoolClient, id: number): Promise<void> {
          const { rows } = await queryEntity<{ id: number }>(
               client,
               'CONTRACTOR',
               `DELETE FROM contractor WHERE id = $1 RETURNING id`,
               [id],
               id
          );
          if (rows.length === 0) {
               throw new EntityNotFoundError('CONTRACTOR', id);
          }
          logger.info({ contractorId: id }, 'Contractor deleted');
     }
}
