import {
     amountConstraintLabel,
     contractorLabel,
     documentLabel,
     documentTypeLabel,
     materialAssetLabel,
     measureUnitLabel,
     warehouseLabel,
} from '@stockroom/shared/src/domain/labels';

describe('Labels', () => {
     it('should label a measure unit by name', () => {
          expect(measureUnitLabel({ id: 1, name: 'kg' })).toBe('kg');
     });

     it('should label a material asset with part number, name and unit', () => {
          expect(
               materialAssetLabel({
                    id: 10,
                    partNumber: 'CEM-500',
                    name: 'Portland cement M500',
                    unitId: 2,
                    unitName: 'kg',
               })
          ).toBe('CEM-500, Portland cement M500 [kg]');
     });

     it('should label an amount constraint with its bounds', () => {
          expect(
               amountConstraintLabel({
                    id: 3,
                    assetId: 10,
                    partNumber: 'CEM-500',
                    minAmount: 100,
                    maxAmount: 2000,
               })
          ).toBe('CEM-500 [100:2000]');
     });

     it('should print unbounded sides as -inf and inf', () => {
          expect(
               amountConstraintLabel({
                    id: 3,
                    assetId: 10,
                    partNumber: 'CEM-500',
                    minAmount: -Infinity,
                    maxAmount: Infinity,
               })
          ).toBe('CEM-500 [-inf:inf]');
     });

     it('should label a document type with its direction', () => {
          expect(documentTypeLabel({ id: 1, name: 'Receipt', direction: 1 })).toBe('Receipt In');
          expect(documentTypeLabel({ id: 2, name: 'Issue', direction: -1 })).toBe('Issue Out');
     });

     it('should label warehouses and contractors by name', () => {
          expect(warehouseLabel({ id: 1, name: 'Main', kind: 'PHYSICAL' })).toBe('Main');
          expect(contractorLabel({ id: 5, name: 'Fastener Supply Co' })).toBe('Fastener Supply Co');
     });

     it('should label a document with type, number and date', () => {
          expect(
               documentLabel({
                    id: 42,
                    number: 'R-0001',
                    documentTypeId: 1,
                    documentTypeName: 'Receipt',
                    direction: 1,
                    warehouseId: 1,
                    warehouseName: 'Main',
                    contractorId: 5,
                    contractorName: 'Fastener Supply Co',
                    documentDate: '2024-03-01',
                    createdAt: new Date('2024-03-01T09:00:00.000Z'),
                    lineCount: 1,
               })
          ).toBe('Receipt #R-0001 of 2024-03-01');
     });
});
