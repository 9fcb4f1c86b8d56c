import { withTransaction } from '@stockroom/shared/src/db/client';
import { publishEvent, routingKeyFor } from '@stockroom/shared/src/messaging/client';
import { logger } from '@stockroom/shared/src/utils/logger';

export interface DispatcherOptions {
     batchSize: number;
     pollIntervalMs: number;
     // Failed events are picked up again until they have failed this often
     maxRetries: number;
}

interface PendingEvent {
     id: number;
     type: string;
     payload: Record<string, unknown>;
     created_at: Date;
}

/**
 * Relays the domain_event outbox to RabbitMQ. Each batch runs in one
 * transaction; rows locked by another dispatcher are skipped.
 */
export class EventDispatcher {
     private running = false;

     constructor(private readonly options: DispatcherOptions) {}

     async start() {
          this.running = true;
          logger.info(
               {
                    batchSize: this.options.batchSize,
                    pollIntervalMs: this.options.pollIntervalMs,
                    maxRetries: this.options.maxRetries,
               },
               'Starting event dispatcher'
          );

          while (this.running) {
               try {
                    await this.processBatch();
               } catch (error) {
                    logger.error({ error }, 'Error processing event batch');
               }

               await this.sleep(this.options.pollIntervalMs);
          }
     }

     /**
      * Publishes one batch of pending events, plus failed ones still under the
      * retry cap. Returns how many were published.
      */
     async processBatch(): Promise<number> {
          return withTransaction(async (client) => {
               const { rows: events } = await client.query<PendingEvent>(
                    `
        SELECT id, type, payload, created_at
        FROM domain_event
        WHERE status = 'PENDING'
           OR (status = 'FAILED' AND retry_count < $2)
        ORDER BY created_at, id
        LIMIT $1
        FOR UPDATE SKIP LOCKED
      `,
                    [this.options.batchSize, this.options.maxRetries]
               );

               if (events.length === 0) {
                    return 0;
               }

               logger.debug({ eventCount: events.length }, 'Processing event batch');

               let sent = 0;
               for (const event of events) {
                    try {
                         await publishEvent(routingKeyFor(event.type), event.payload, String(event.id));

                         await client.query(
                              `
            UPDATE domain_event
            SET status = 'SENT', updated_at = NOW()
            WHERE id = $1
          `,
                              [event.id]
                         );
                         sent += 1;

                         logger.debug({ eventId: event.id, type: event.type }, 'Event dispatched');
                    } catch (error) {
                         logger.error({ error, eventId: event.id }, 'Failed to dispatch event');

                         await client.query(
                              `
            UPDATE domain_event
            SET status = 'FAILED',
                updated_at = NOW(),
                retry_count = retry_count + 1,
                error = $2
            WHERE id = $1
          `,
                              [event.id, error instanceof Error ? error.message : 'Unknown error']
                         );
                    }
               }

               logger.info({ dispatched: sent, failed: events.length - sent }, 'Event batch processed');
               return sent;
          });
     }

     stop() {
          logger.info('Stopping event dispatcher');
          this.running = false;
     }

     private sleep(ms: number): Promise<void> {
          return new Promise((resolve) => setTimeout(resolve, ms));
     }
}
