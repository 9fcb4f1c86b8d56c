import { FastifyInstance } from 'fastify';
import { registerCatalogRoutes } from './catalog';
import { registerStructureRoutes } from './structure';

// Reference data and hierarchies, mounted under /admin
export async function registerAdminRoutes(app: FastifyInstance) {
     await registerCatalogRoutes(app);
     await registerStructureRoutes(app);
}
