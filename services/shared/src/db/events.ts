import { PoolClient } from 'pg';
import type { DomainEventType } from '../types/document.types';

/**
 * Appends an event to the outbox. Must run on the client of the transaction
 * that made the change so both commit or roll back together.
 */
export async function recordEvent(
     client: PoolClient,
     type: DomainEventType,
     payload: object
): Promise<void> {
     await client.query(
          `
      INSERT INTO domain_event (type, payload)
      VALUES ($1, $2::jsonb)
    `,
          [type, JSON.stringify(payload)]
     );
}
