import * as amqplib from 'amqplib';
import type { Channel } from 'amqplib';
import { logger } from '../utils/logger';

type AmqpConnection = Awaited<ReturnType<typeof amqplib.connect>>;

let connection: AmqpConnection | null = null;
let channel: Channel | null = null;

export const STOCK_EVENTS_EXCHANGE = 'stock.events';
export const STOCK_DLX = 'dlx.stock';
export const STOCK_ALERTS_QUEUE = 'stock.alerts';
export const STOCK_DOCUMENTS_QUEUE = 'stock.documents';

async function connect(): Promise<AmqpConnection> {
     const url = process.env.AMQP_URL || 'amqp://localhost:5672';
     logger.info({ url: url.replace(/:[^:]*@/, ':****@') }, 'Connecting to RabbitMQ');

     const conn = await amqplib.connect(url);

     conn.on('error', (err) => {
          logger.error({ err }, 'RabbitMQ connection error');
     });

     conn.on('close', () => {
          logger.warn('RabbitMQ connection closed, attempting to reconnect...');
          setTimeout(() => {
               connection = null;
               channel = null;
          }, 5000);
     });

     logger.info('Connected to RabbitMQ');
     return conn;
}

async function setupTopology(ch: Channel): Promise<void> {
     await ch.assertExchange(STOCK_EVENTS_EXCHANGE, 'topic', { durable: true });
     await ch.assertExchange(STOCK_DLX, 'topic', { durable: true });

     await ch.assertQueue(STOCK_ALERTS_QUEUE, {
          durable: true,
          deadLetterExchange: STOCK_DLX,
          deadLetterRoutingKey: `dlq.${STOCK_ALERTS_QUEUE}`,
     });
     await ch.assertQueue(STOCK_DOCUMENTS_QUEUE, {
          durable: true,
          deadLetterExchange: STOCK_DLX,
          deadLetterRoutingKey: `dlq.${STOCK_DOCUMENTS_QUEUE}`,
     });

     await ch.assertQueue(`dlq.${STOCK_ALERTS_QUEUE}`, { durable: true });
     await ch.assertQueue(`dlq.${STOCK_DOCUMENTS_QUEUE}`, { durable: true });

     await ch.bindQueue(STOCK_ALERTS_QUEUE, STOCK_EVENTS_EXCHANGE, 'stock.AmountConstraintViolated');
     await ch.bindQueue(STOCK_DOCUMENTS_QUEUE, STOCK_EVENTS_EXCHANGE, 'stock.DocumentPosted');
     await ch.bindQueue(STOCK_DOCUMENTS_QUEUE, STOCK_EVENTS_EXCHANGE, 'stock.DocumentDeleted');

     await ch.bindQueue(`dlq.${STOCK_ALERTS_QUEUE}`, STOCK_DLX, `dlq.${STOCK_ALERTS_QUEUE}`);
     await ch.bindQueue(`dlq.${STOCK_DOCUMENTS_QUEUE}`, STOCK_DLX, `dlq.${STOCK_DOCUMENTS_QUEUE}`);
}

export async function getChannel(): Promise<Channel> {
     if (channel) return channel;

     if (!connection) {
          connection = await connect();
     }

     const ch = await connection.createChannel();
     await setupTopology(ch);
     channel = ch;

     logger.info('RabbitMQ channel created and configured');

     return ch;
}

export function routingKeyFor(eventType: string): string {
     return `stock.${eventType}`;
}

export async function publishEvent(
     routingKey: string,
     payload: Record<string, unknown>,
     messageId?: string
): Promise<void> {
     const ch = await getChannel();
     const content = Buffer.from(JSON.stringify(payload));

     ch.publish(STOCK_EVENTS_EXCHANGE, routingKey, content, {
          persistent: true,
          contentType: 'application/json',
          timestamp: Date.now(),
          messageId,
     });
}

export async function closeConnection(): Promise<void> {
     if (channel) {
          await channel.close();
          channel = null;
     }
     if (connection) {
          await connection.close();
          connection = null;
     }
     logger.info('RabbitMQ connection closed');
}
