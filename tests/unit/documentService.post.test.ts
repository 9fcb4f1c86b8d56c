import { DocumentService, validateLines } from '@stockroom/shared/src/services/document-service';
import {
     DuplicateEntityError,
     InsufficientStockError,
     InvalidAmountError,
} from '@stockroom/shared/src/utils/errors';
import {
     createMockClient,
     documentHeaderRow,
     documentLineRow,
     issueTypeRow,
     MockClient,
     postgresError,
     queryAt,
     queueRows,
     receiptTypeRow,
} from '../helpers/testUtils';

describe('DocumentService - Post Document (Unit)', () => {
     let documentService: DocumentService;
     let mockClient: MockClient;

     const receipt = {
          number: 'R-0001',
          documentTypeId: 1,
          warehouseId: 1,
          contractorId: 5,
          documentDate: '2024-03-01',
          lines: [{ assetId: 10, amount: 500 }],
     };

     beforeEach(() => {
          documentService = new DocumentService();
          mockClient = createMockClient();
     });

     describe('validateLines', () => {
          it('should reject a document without lines', () => {
               expect(() => validateLines([])).toThrow('Document must have at least one line');
          });

          it('should reject non-positive amounts', () => {
               expect(() => validateLines([{ assetId: 10, amount: 0 }])).toThrow(
                    'Amount must be a positive integer for asset 10'
               );
               expect(() => validateLines([{ assetId: 10, amount: -4 }])).toThrow(InvalidAmountError);
          });

          it('should reject fractional amounts', () => {
               expect(() => validateLines([{ assetId: 10, amount: 1.5 }])).toThrow(InvalidAmountError);
          });

          it('should reject an asset on two lines', () => {
               expect(() =>
                    validateLines([
                         { assetId: 10, amount: 1 },
                         { assetId: 10, amount: 2 },
                    ])
               ).toThrow('Asset 10 appears on more than one line');
          });
     });

     describe('Reference checks', () => {
          it('should validate lines before querying', async () => {
               await expect(
                    documentService.postDocument(mockClient, { ...receipt, lines: [] })
               ).rejects.toThrow(InvalidAmountError);
               expect(mockClient.query).not.toHaveBeenCalled();
          });

          it('should read the document type under a share lock', async () => {
               queueRows(mockClient, [receiptTypeRow], []);

               await expect(documentService.postDocument(mockClient, receipt)).rejects.toThrow(
                    'Warehouse 1 not found'
               );
               expect(queryAt(mockClient, 0).text).toBe(
                    'SELECT id, name, direction FROM document_type WHERE id = $1 FOR SHARE'
               );
               expect(queryAt(mockClient, 0).values).toEqual([1]);
          });

          it('should throw when the document type does not exist', async () => {
               queueRows(mockClient, []);

               await expect(documentService.postDocument(mockClient, receipt)).rejects.toThrow(
                    'Document type 1 not found'
               );
          });

          it('should throw when the warehouse does not exist', async () => {
               queueRows(mockClient, [receiptTypeRow], []);

               await expect(documentService.postDocument(mockClient, receipt)).rejects.toThrow(
                    'Warehouse 1 not found'
               );
          });

          it('should throw when an asset does not exist', async () => {
               queueRows(mockClient, [receiptTypeRow], [{ id: 1 }], [{ id: 5 }], [{ id: 10 }]);

               await expect(
                    documentService.postDocument(mockClient, {
                         ...receipt,
                         lines: [
                              { assetId: 11, amount: 1 },
                              { assetId: 10, amount: 1 },
                         ],
                    })
               ).rejects.toThrow('Material asset 11 not found');
               expect(queryAt(mockClient, 3).values).toEqual([[10, 11]]);
          });
     });

     describe('Incoming documents', () => {
          it('should record the document, its lines and a DocumentPosted event', async () => {
               queueRows(
                    mockClient,
                    [receiptTypeRow],
                    [{ id: 1 }],
                    [{ id: 5 }],
                    [{ id: 10 }],
                    [{ id: 42 }],
                    [],
                    [],
                    [],
                    [documentHeaderRow()],
                    [documentLineRow()]
               );

               const document = await documentService.postDocument(mockClient, receipt);

               expect(queryAt(mockClient, 4).values).toEqual([
                    'R-0001',
                    1,
                    1,
                    5,
                    '2024-03-01',
                    null,
                    null,
               ]);
               expect(queryAt(mockClient, 5).values).toEqual([42, [10], [500]]);

               const event = queryAt(mockClient, 6);
               expect(event.values[0]).toBe('DocumentPosted');
               expect(JSON.parse(String(event.values[1]))).toEqual(
                    expect.objectContaining({
                         documentId: 42,
                         number: 'R-0001',
                         direction: 1,
                         transferId: null,
                         lines: [{ assetId: 10, amount: 500, delta: 500 }],
                    })
               );

               expect(queryAt(mockClient, 7).values).toEqual([[10]]);
               expect(mockClient.query).toHaveBeenCalledTimes(10);

               expect(document.id).toBe(42);
               expect(document.documentDate).toBe('2024-03-01');
               expect(document.comment).toBeUndefined();
               expect(document.lines).toEqual([
                    {
                         assetId: 10,
                         partNumber: 'BOLT-M8-40',
                         assetName: 'Hex bolt M8x40',
                         unitName: 'pcs',
                         amount: 500,
                         delta: 500,
                    },
               ]);
          });

          it('should not check stock for incoming documents', async () => {
               queueRows(
                    mockClient,
                    [receiptTypeRow],
                    [{ id: 1 }],
                    [{ id: 5 }],
                    [{ id: 10 }],
                    [{ id: 42 }],
                    [],
                    [],
                    [],
                    [documentHeaderRow()],
                    [documentLineRow()]
               );

               await documentService.postDocument(mockClient, receipt);

               const texts = mockClient.query.mock.calls.map((_, i) => queryAt(mockClient, i).text);
               expect(texts.some((text) => text.includes('WHERE d.warehouse_id = $1'))).toBe(false);
          });

          it('should raise an event for each violated constraint', async () => {
               queueRows(
                    mockClient,
                    [receiptTypeRow],
                    [{ id: 1 }],
                    [{ id: 5 }],
                    [{ id: 10 }],
                    [{ id: 42 }],
                    [],
                    [],
                    [
                         {
                              asset_id: 10,
                              part_number: 'BOLT-M8-40',
                              min_amount: -1,
                              max_amount: 400,
                              on_hand: 500,
                         },
                    ],
                    [],
                    [documentHeaderRow()],
                    [documentLineRow()]
               );

               await documentService.postDocument(mockClient, receipt);

               const event = queryAt(mockClient, 8);
               expect(event.values[0]).toBe('AmountConstraintViolated');
               expect(JSON.parse(String(event.values[1]))).toEqual(
                    expect.objectContaining({
                         assetId: 10,
                         partNumber: 'BOLT-M8-40',
                         onHand: 500,
                         minAmount: null,
                         maxAmount: 400,
                         kind: 'ABOVE_MAXIMUM',
                         documentId: 42,
                    })
               );
          });

          it('should report a duplicate number for the same type', async () => {
               queueRows(mockClient, [receiptTypeRow], [{ id: 1 }], [{ id: 5 }], [{ id: 10 }]);
               mockClient.query.mockRejectedValueOnce(
                    postgresError('23505', 'Key (document_type_id, number)=(1, R-0001) already exists.') as never
               );

               await expect(documentService.postDocument(mockClient, receipt)).rejects.toThrow(
                    DuplicateEntityError
               );
          });
     });

     describe('Outgoing documents', () => {
          const issue = { ...receipt, number: 'I-0001', documentTypeId: 2, lines: [{ assetId: 10, amount: 50 }] };

          it('should refuse to take stock below zero', async () => {
               queueRows(
                    mockClient,
                    [issueTypeRow],
                    [{ id: 1 }],
                    [{ id: 5 }],
                    [{ id: 10 }],
                    [{ asset_id: 10, on_hand: 30 }]
               );

               await expect(documentService.postDocument(mockClient, issue)).rejects.toThrow(
                    new InsufficientStockError(
                         'Insufficient stock for asset 10 at warehouse 1: requested 50, available 30',
                         10,
                         1,
                         50,
                         30
                    )
               );
               expect(mockClient.query).toHaveBeenCalledTimes(5);
          });

          it('should treat an asset never received as zero stock', async () => {
               queueRows(mockClient, [issueTypeRow], [{ id: 1 }], [{ id: 5 }], [{ id: 10 }], []);

               await expect(documentService.postDocument(mockClient, issue)).rejects.toThrow(
                    'Insufficient stock for asset 10 at warehouse 1: requested 50, available 0'
               );
          });

          it('should post when enough stock is on hand', async () => {
               queueRows(
                    mockClient,
                    [issueTypeRow],
                    [{ id: 1 }],
                    [{ id: 5 }],
                    [{ id: 10 }],
                    [{ asset_id: 10, on_hand: 50 }],
                    [{ id: 43 }],
                    [],
                    [],
                    [],
                    [
                         documentHeaderRow({
                              id: 43,
                              number: 'I-0001',
                              document_type_id: 2,
                              document_type_name: 'Issue',
                              direction: -1,
                         }),
                    ],
                    [documentLineRow({ amount: 50 })]
               );

               const document = await documentService.postDocument(mockClient, issue);

               expect(document.direction).toBe(-1);
               expect(document.lines[0].delta).toBe(-50);
               const event = JSON.parse(String(queryAt(mockClient, 7).values[1]));
               expect(event.lines).toEqual([{ assetId: 10, amount: 50, delta: -50 }]);
          });
     });
});
