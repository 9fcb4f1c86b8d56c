import 'dotenv/config';
import { pool, withTransaction } from './client';
import { CatalogService } from '../services/catalog-service';
import { ContractorService } from '../services/contractor-service';
import { DocumentService } from '../services/document-service';
import { WarehouseService } from '../services/warehouse-service';
import { logger } from '../utils/logger';

async function seedDatabase() {
     const catalog = new CatalogService();
     const warehouses = new WarehouseService();
     const contractors = new ContractorService();
     const documents = new DocumentService();

     try {
          logger.info('Seeding database with development data');

          await withTransaction(async (client) => {
               const pcs = await catalog.createMeasureUnit(client, 'pcs');
               const kg = await catalog.createMeasureUnit(client, 'kg');
               await catalog.createMeasureUnit(client, 'm');

               const bolt = await catalog.createMaterialAsset(client, {
                    partNumber: 'BOLT-M8-40',
                    name: 'Hex bolt M8x40',
                    unitId: pcs.id,
               });
               const cement = await catalog.createMaterialAsset(client, {
                    partNumber: 'CEM-500',
                    name: 'Portland cement M500',
                    unitId: kg.id,
                    description: 'Bagged, 50 kg per bag',
               });

               await catalog.setAmountConstraint(client, {
                    assetId: bolt.id,
                    minAmount: 100,
                    maxAmount: 5000,
               });
               await catalog.setAmountConstraint(client, {
                    assetId: cement.id,
                    minAmount: 500,
                    maxAmount: Infinity,
               });

               const receipt = await catalog.createDocumentType(client, {
                    name: 'Receipt',
                    direction: 1,
               });
               await catalog.createDocumentType(client, { name: 'Issue', direction: -1 });
               await catalog.createDocumentType(client, { name: 'Transfer out', direction: -1 });
               await catalog.createDocumentType(client, { name: 'Transfer in', direction: 1 });
               logger.info('Inserted reference data');

               const main = await warehouses.createWarehouse(client, { name: 'Main' });
               await warehouses.createWarehouse(client, { name: 'Main / Rack A', parentId: main.id });
               await warehouses.createWarehouse(client, { name: 'Main / Rack B', parentId: main.id });
               await warehouses.createWarehouse(client, { name: 'Site 1' });
               await warehouses.createWarehouse(client, { name: 'In transit', kind: 'VIRTUAL' });
               logger.info('Inserted warehouses');

               const suppliers = await contractors.createGroup(client, { name: 'Suppliers' });
               await contractors.createGroup(client, { name: 'Customers' });
               const supplier = await contractors.createContractor(client, {
                    name: 'Fastener Supply Co',
                    groupId: suppliers.id,
               });
               logger.info('Inserted contractors');

               await documents.postDocument(client, {
                    number: 'R-0001',
                    documentTypeId: receipt.id,
                    warehouseId: main.id,
                    contractorId: supplier.id,
                    comment: 'Opening balance',
                    lines: [
                         { assetId: bolt.id, amount: 1200 },
                         { assetId: cement.id, amount: 2000 },
                    ],
               });
               logger.info('Inserted opening balance document');
          });

          logger.info('Database seeding completed successfully');
     } catch (error) {
          logger.error({ error }, 'Seeding failed');
          throw error;
     } finally {
          await pool.end();
     }
}

// Run if executed directly
if (require.main === module) {
     seedDatabase().catch((err) => {
          console.error('Seed error:', err);
          process.exit(1);
     });
}

export { seedDatabase };
