import { PoolClient, QueryResult, QueryResultRow } from 'pg';
import { ENTITY_TABLES, EntityName } from './entities';
import { EntityNotFoundError, mapDatabaseError } from '../utils/errors';

/**
 * Throws EntityNotFoundError unless a row with the given id exists.
 */
export async function assertExists(
     client: PoolClient,
     entity: EntityName,
     id: number
): Promise<void> {
     const { rows } = await client.query<{ id: number }>(
          `SELECT id FROM ${ENTITY_TABLES[entity]} WHERE id = $1`,
          [id]
     );
     if (rows.length === 0) {
          throw new EntityNotFoundError(entity, id);
     }
}

/**
 * Runs a statement and rethrows constraint violations as domain errors for
 * the given entity.
 */
export async function queryEntity<R extends QueryResultRow>(
     client: PoolClient,
     entity: EntityName,
     text: string,
     values: unknown[],
     entityId?: number
): Promise<QueryResult<R>> {
     try {
          return await client.query<R>(text, values);
     } catch (error) {
          throw mapDatabaseError(error, entity, entityId);
     }
}
