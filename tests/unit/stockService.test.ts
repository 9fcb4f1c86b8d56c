import { StockService } from '@stockroom/shared/src/services/stock-service';
import { EntityNotFoundError } from '@stockroom/shared/src/utils/errors';
import { createMockClient, MockClient, queryAt, queueRows } from '../helpers/testUtils';

describe('StockService (Unit)', () => {
     let stockService: StockService;
     let mockClient: MockClient;

     beforeEach(() => {
          stockService = new StockService();
          mockClient = createMockClient();
     });

     describe('getWarehouseBalances', () => {
          it('should default assets without movements to zero', async () => {
               queueRows(mockClient, [{ asset_id: 10, on_hand: 70 }]);

               const balances = await stockService.getWarehouseBalances(mockClient, 1, [10, 11]);

               expect([...balances]).toEqual([
                    [10, 70],
                    [11, 0],
               ]);
               expect(queryAt(mockClient, 0).values).toEqual([1, [10, 11]]);
          });
     });

     describe('getAssetStock', () => {
          it('should throw for an unknown asset', async () => {
               queueRows(mockClient, []);

               await expect(stockService.getAssetStock(mockClient, 10)).rejects.toThrow(
                    new EntityNotFoundError('MATERIAL_ASSET', 10)
               );
          });

          it('should sum the per-warehouse quantities', async () => {
               queueRows(
                    mockClient,
                    [{ id: 10, part_number: 'BOLT-M8-40' }],
                    [
                         { warehouse_id: 1, warehouse_name: 'Main', on_hand: 70 },
                         { warehouse_id: 4, warehouse_name: 'Site 1', on_hand: 30 },
                    ]
               );

               const stock = await stockService.getAssetStock(mockClient, 10);

               expect(stock).toEqual({
                    assetId: 10,
                    partNumber: 'BOLT-M8-40',
                    total: 100,
                    warehouses: [
                         { warehouseId: 1, warehouseName: 'Main', onHand: 70 },
                         { warehouseId: 4, warehouseName: 'Site 1', onHand: 30 },
                    ],
               });
          });
     });

     describe('getWarehouseStock', () => {
          const stockRow = {
               asset_id: 10,
               part_number: 'BOLT-M8-40',
               asset_name: 'Hex bolt M8x40',
               unit_name: 'pcs',
               on_hand: 70,
          };

          it('should query a single warehouse by default', async () => {
               queueRows(mockClient, [{ id: 1 }], [stockRow]);

               const stock = await stockService.getWarehouseStock(mockClient, 1);

               expect(stock.warehouseIds).toEqual([1]);
               expect(stock.assets).toEqual([
                    {
                         assetId: 10,
                         partNumber: 'BOLT-M8-40',
                         assetName: 'Hex bolt M8x40',
                         unitName: 'pcs',
                         onHand: 70,
                    },
               ]);
               expect(queryAt(mockClient, 1).values).toEqual([[1]]);
          });

          it('should include the whole subtree when asked', async () => {
               queueRows(mockClient, [{ id: 1 }, { id: 2 }, { id: 3 }], [stockRow]);

               const stock = await stockService.getWarehouseStock(mockClient, 1, true);

               expect(stock.warehouseId).toBe(1);
               expect(stock.warehouseIds).toEqual([1, 2, 3]);
               expect(queryAt(mockClient, 1).values).toEqual([[1, 2, 3]]);
          });

          it('should throw for an unknown warehouse', async () => {
               queueRows(mockClient, []);

               await expect(stockService.getWarehouseStock(mockClient, 9)).rejects.toThrow(
                    'Warehouse 9 not found'
               );
          });
     });

     describe('evaluateConstraints', () => {
          it('should report only the violated constraints', async () => {
               queueRows(mockClient, [
                    { asset_id: 10, part_number: 'BOLT-M8-40', min_amount: 100, max_amount: -1, on_hand: 40 },
                    { asset_id: 11, part_number: 'CEM-500', min_amount: -1, max_amount: -1, on_hand: 5 },
                    { asset_id: 12, part_number: 'NUT-M8', min_amount: 0, max_amount: 50, on_hand: 51 },
               ]);

               const violations = await stockService.evaluateConstraints(mockClient);

               expect(violations).toEqual([
                    {
                         assetId: 10,
                         partNumber: 'BOLT-M8-40',
                         onHand: 40,
                         minAmount: 100,
                         maxAmount: Infinity,
                         kind: 'BELOW_MINIMUM',
                    },
                    {
                         assetId: 12,
                         partNumber: 'NUT-M8',
                         onHand: 51,
                         minAmount: 0,
                         maxAmount: 50,
                         kind: 'ABOVE_MAXIMUM',
                    },
               ]);
               expect(queryAt(mockClient, 0).values).toEqual([null]);
          });

          it('should narrow the check to the given assets', async () => {
               queueRows(mockClient, []);

               await stockService.evaluateConstraints(mockClient, [10, 12]);

               expect(queryAt(mockClient, 0).values).toEqual([[10, 12]]);
          });
     });
});
