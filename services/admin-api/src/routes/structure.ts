import { FastifyInstance } from 'fastify';
import { withConnection, withTransaction } from '@stockroom/shared/src/db/client';
import { ContractorService } from '@stockroom/shared/src/services/contractor-service';
import { WarehouseService } from '@stockroom/shared/src/services/warehouse-service';
import type {
     ContractorFilter,
     CreateContractorGroupRequest,
     CreateContractorRequest,
     CreateWarehouseRequest,
     UpdateContractorGroupRequest,
     UpdateContractorRequest,
     UpdateWarehouseRequest,
} from '@stockroom/shared/src/types/structure.types';
import { sendError } from '@stockroom/shared/src/utils/http';
import {
     presentContractor,
     presentContractorGroup,
     presentWarehouse,
} from '@stockroom/shared/src/utils/presenters';
import {
     createContractorGroupSchema,
     createContractorSchema,
     createWarehouseSchema,
     deleteContractorGroupSchema,
     deleteContractorSchema,
     deleteWarehouseSchema,
     getContractorGroupSchema,
     getContractorSchema,
     getWarehouseAncestorsSchema,
     getWarehouseSchema,
     listContractorGroupsSchema,
     listContractorsSchema,
     listWarehousesSchema,
     updateContractorGroupSchema,
     updateContractorSchema,
     updateWarehouseSchema,
} from '../schemas/structure.schemas';

type IdParams = { Params: { id: number } };

const warehouses = new WarehouseService();
const contractors = new ContractorService();

export async function registerStructureRoutes(app: FastifyInstance) {
     // Warehouses

     app.get('/warehouses', { schema: listWarehousesSchema }, async (request, reply) => {
          try {
               const tree = await withConnection((client) => warehouses.listWarehouses(client));
               return reply.send(tree.map(presentWarehouse));
          } catch (error) {
               return sendError(request, reply, error, 'Failed to list warehouses');
          }
     });

     app.get<IdParams>('/warehouses/:id', { schema: getWarehouseSchema }, async (request, reply) => {
          try {
               const warehouse = await withConnection((client) =>
                    warehouses.getWarehouse(client, request.params.id)
               );
               return reply.send(presentWarehouse(warehouse));
          } catch (error) {
               return sendError(request, reply, error, 'Failed to get warehouse');
          }
     });

     app.get<IdParams>(
          '/warehouses/:id/ancestors',
          { schema: getWarehouseAncestorsSchema },
          async (request, reply) => {
               try {
                    const ancestors = await withConnection((client) =>
                         warehouses.getAncestors(client, request.params.id)
                    );
                    return reply.send(ancestors.map(presentWarehouse));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to list warehouse ancestors');
               }
          }
     );

     app.post<{ Body: CreateWarehouseRequest }>(
          '/warehouses',
          { schema: createWarehouseSchema },
          async (request, reply) => {
               try {
                    const warehouse = await withTransaction((client) =>
                         warehouses.createWarehouse(client, request.body)
                    );
                    return reply.code(201).send(presentWarehouse(warehouse));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to create warehouse');
               }
          }
     );

     app.patch<IdParams & { Body: UpdateWarehouseRequest }>(
          '/warehouses/:id',
          { schema: updateWarehouseSchema },
          async (request, reply) => {
               try {
                    const warehouse = await withTransaction((client) =>
                         warehouses.updateWarehouse(client, request.params.id, request.body)
                    );
                    return reply.send(presentWarehouse(warehouse));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to update warehouse');
               }
          }
     );

     app.delete<IdParams>(
          '/warehouses/:id',
          { schema: deleteWarehouseSchema },
          async (request, reply) => {
               try {
                    await withTransaction((client) =>
                         warehouses.deleteWarehouse(client, request.params.id)
                    );
                    return reply.code(204).send();
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to delete warehouse');
               }
          }
     );

     // Contractor groups

     app.get(
          '/contractor-groups',
          { schema: listContractorGroupsSchema },
          async (request, reply) => {
               try {
                    const tree = await withConnection((client) => contractors.listGroups(client));
                    return reply.send(tree.map(presentContractorGroup));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to list contractor groups');
               }
          }
     );

     app.get<IdParams>(
          '/contractor-groups/:id',
          { schema: getContractorGroupSchema },
          async (request, reply) => {
               try {
                    const group = await withConnection((client) =>
                         contractors.getGroup(client, request.params.id)
                    );
                    return reply.send(presentContractorGroup(group));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to get contractor group');
               }
          }
     );

     app.post<{ Body: CreateContractorGroupRequest }>(
          '/contractor-groups',
          { schema: createContractorGroupSchema },
          async (request, reply) => {
               try {
                    const group = await withTransaction((client) =>
                         contractors.createGroup(client, request.body)
                    );
                    return reply.code(201).send(presentContractorGroup(group));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to create contractor group');
               }
          }
     );

     app.patch<IdParams & { Body: UpdateContractorGroupRequest }>(
          '/contractor-groups/:id',
          { schema: updateContractorGroupSchema },
          async (request, reply) => {
               try {
                    const group = await withTransaction((client) =>
                         contractors.updateGroup(client, request.params.id, request.body)
                    );
                    return reply.send(presentContractorGroup(group));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to update contractor group');
               }
          }
     );

     app.delete<IdParams>(
          '/contractor-groups/:id',
          { schema: deleteContractorGroupSchema },
          async (request, reply) => {
               try {
                    await withTransaction((client) => contractors.deleteGroup(client, request.params.id));
                    return reply.code(204).send();
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to delete contractor group');
               }
          }
     );

     // Contractors

     app.get<{ Querystring: ContractorFilter }>(
          '/contractors',
          { schema: listContractorsSchema },
          async (request, reply) => {
               try {
                    const list = await withConnection((client) =>
                         contractors.listContractors(client, request.query)
                    );
                    return reply.send(list.map(presentContractor));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to list contractors');
               }
          }
     );

     app.get<IdParams>(
          '/contractors/:id',
          { schema: getContractorSchema },
          async (request, reply) => {
               try {
                    const contractor = await withConnection((client) =>
                         contractors.getContractor(client, request.params.id)
                    );
                    return reply.send(presentContractor(contractor));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to get contractor');
               }
          }
     );

     app.post<{ Body: CreateContractorRequest }>(
          '/contractors',
          { schema: createContractorSchema },
          async (request, reply) => {
               try {
                    const contractor = await withTransaction((client) =>
                         contractors.createContractor(client, request.body)
                    );
                    return reply.code(201).send(presentContractor(contractor));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to create contractor');
               }
          }
     );

     app.patch<IdParams & { Body: UpdateContractorRequest }>(
          '/contractors/:id',
          { schema: updateContractorSchema },
          async (request, reply) => {
               try {
                    const contractor = await withTransaction((client) =>
                         contractors.updateContractor(client, request.params.id, request.body)
                    );
                    return reply.send(presentContractor(contractor));
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to update contractor');
               }
          }
     );

     app.delete<IdParams>(
          '/contractors/:id',
          { schema: deleteContractorSchema },
          async (request, reply) => {
               try {
                    await withTransaction((client) =>
                         contractors.deleteContractor(client, request.params.id)
                    );
                    return reply.code(204).send();
               } catch (error) {
                    return sendError(request, reply, error, 'Failed to delete contractor');
               }
          }
     );
}
