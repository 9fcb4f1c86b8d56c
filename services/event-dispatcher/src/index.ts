import 'dotenv/config';
import { closePool } from '@stockroom/shared/src/db/client';
import { closeConnection } from '@stockroom/shared/src/messaging/client';
import { logger } from '@stockroom/shared/src/utils/logger';
import { EventDispatcher } from './dispatcher';

const BATCH_SIZE = parseInt(process.env.EVENT_BATCH_SIZE || '100', 10);
const POLL_INTERVAL_MS = parseInt(process.env.EVENT_POLL_INTERVAL_MS || '200', 10);
const MAX_RETRIES = parseInt(process.env.EVENT_MAX_RETRIES || '5', 10);

async function main() {
     const dispatcher = new EventDispatcher({
          batchSize: BATCH_SIZE,
          pollIntervalMs: POLL_INTERVAL_MS,
          maxRetries: MAX_RETRIES,
     });

     // Graceful shutdown
     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          dispatcher.stop();
          await new Promise((resolve) => setTimeout(resolve, POLL_INTERVAL_MS + 100));
          await closeConnection();
          await closePool();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);

     await dispatcher.start();
}

main().catch((err) => {
     logger.error({ err }, 'Fatal error in event dispatcher');
     process.exit(1);
});
