import 'dotenv/config';
import Fastify from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import { registerAdminRoutes } from './routes/admin';
import { checkConnection, closePool } from '@stockroom/shared/src/db/client';
import { API_KEY_HEADER, apiKeyGuard } from '@stockroom/shared/src/utils/http';
import { logger } from '@stockroom/shared/src/utils/logger';
import { healthSchema, readinessSchema } from '@stockroom/shared/src/utils/schemas';

const PORT = parseInt(process.env.ADMIN_API_PORT || '3100', 10);
const HOST = process.env.ADMIN_API_HOST || '0.0.0.0';

async function main() {
     const app = Fastify({
          logger: true,
          requestIdHeader: 'x-correlation-id',
          genReqId: (req) => {
               const header = req.headers['x-correlation-id'];
               return typeof header === 'string' && header ? header : `req-${Date.now()}`;
          },
          ajv: {
               customOptions: {
                    removeAdditional: 'all',
                    coerceTypes: true,
                    useDefaults: true,
                    strict: false,
               },
          },
     });

     await app.register(cors, {
          origin: true,
     });

     await app.register(swagger, {
          openapi: {
               info: {
                    title: 'Stockroom Admin API',
                    description:
                         'Reference data for stock keeping: measure units, material assets, amount constraints, document types, warehouses and contractors',
                    version: '1.0.0',
               },
               tags: [
                    { name: 'measure-units', description: 'Units of measure' },
                    { name: 'material-assets', description: 'Stocked items' },
                    { name: 'amount-constraints', description: 'Min/max on-hand bounds per asset' },
                    { name: 'document-types', description: 'Kinds of stock documents' },
                    { name: 'warehouses', description: 'Warehouse hierarchy' },
                    { name: 'contractor-groups', description: 'Contractor group hierarchy' },
                    { name: 'contractors', description: 'Counterparties of documents' },
                    { name: 'health', description: 'Health and readiness checks' },
               ],
               components: {
                    securitySchemes: {
                         apiKey: {
                              type: 'apiKey',
                              name: API_KEY_HEADER,
                              in: 'header',
                              description: 'Required when ADMIN_API_KEY is set',
                         },
                    },
               },
               security: [{ apiKey: [] }],
          },
     });

     await app.register(swaggerUi, {
          routePrefix: '/docs',
          uiConfig: {
               docExpansion: 'list',
               deepLinking: true,
          },
     });

     app.addHook('onRequest', apiKeyGuard(process.env.ADMIN_API_KEY));

     // Health checks
     app.get('/health', { schema: healthSchema }, async () => {
          return {
               status: 'ok',
               timestamp: new Date().toISOString(),
          };
     });

     app.get('/health/ready', { schema: readinessSchema }, async (_, reply) => {
          try {
               const dbHealthy = await checkConnection();
               if (!dbHealthy) {
                    reply.code(503);
                    return { status: 'not_ready', error: 'Database connection failed' };
               }
               return { status: 'ready', dependencies: { database: 'ok' } };
          } catch (error) {
               reply.code(503);
               return {
                    status: 'not_ready',
                    error: error instanceof Error ? error.message : 'Unknown error',
               };
          }
     });

     await app.register(registerAdminRoutes, { prefix: '/admin' });

     try {
          await app.listen({ port: PORT, host: HOST });
          logger.info(`Admin API listening on ${HOST}:${PORT}`);
          logger.info(`OpenAPI docs available at http://${HOST}:${PORT}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          process.exit(1);
     }

     const shutdown = async () => {
          logger.info('Shutting down gracefully...');
          await app.close();
          await closePool();
          process.exit(0);
     };

     process.on('SIGINT', shutdown);
     process.on('SIGTERM', shutdown);
}

main().catch((err) => {
     logger.fatal({ err }, 'Fatal error');
     process.exit(1);
});
