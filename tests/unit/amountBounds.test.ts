import {
     assertValidBounds,
     boundFromJson,
     boundToJson,
     checkAmount,
     decodeBound,
     encodeBound,
     formatBound,
     UNBOUNDED,
} from '@stockroom/shared/src/domain/amount-bounds';
import { InvalidConstraintError } from '@stockroom/shared/src/utils/errors';

describe('Amount bounds', () => {
     describe('decodeBound', () => {
          it('should read the sentinel as -Infinity for a minimum', () => {
               expect(decodeBound(UNBOUNDED, 'min')).toBe(-Infinity);
          });

          it('should read the sentinel as Infinity for a maximum', () => {
               expect(decodeBound(UNBOUNDED, 'max')).toBe(Infinity);
          });

          it('should treat any negative stored value as unbounded', () => {
               expect(decodeBound(-5, 'max')).toBe(Infinity);
          });

          it('should pass finite values through', () => {
               expect(decodeBound(0, 'min')).toBe(0);
               expect(decodeBound(250, 'max')).toBe(250);
          });
     });

     describe('encodeBound', () => {
          it('should store either infinity as the sentinel', () => {
               expect(encodeBound(Infinity, 'max')).toBe(-1);
               expect(encodeBound(-Infinity, 'min')).toBe(-1);
               expect(encodeBound(Infinity, 'min')).toBe(-1);
          });

          it('should store non-negative integers unchanged', () => {
               expect(encodeBound(0, 'min')).toBe(0);
               expect(encodeBound(100, 'max')).toBe(100);
          });

          it('should reject negative finite values', () => {
               expect(() => encodeBound(-3, 'min')).toThrow(
                    'Minimum amount must be a non-negative integer or unbounded, got -3'
               );
          });

          it('should reject fractions', () => {
               expect(() => encodeBound(2.5, 'max')).toThrow(InvalidConstraintError);
          });
     });

     describe('JSON conversion', () => {
          it('should map null and the sentinel to the unbounded side', () => {
               expect(boundFromJson(null, 'min')).toBe(-Infinity);
               expect(boundFromJson(null, 'max')).toBe(Infinity);
               expect(boundFromJson(-1, 'max')).toBe(Infinity);
          });

          it('should keep finite values', () => {
               expect(boundFromJson(40, 'min')).toBe(40);
               expect(boundToJson(40)).toBe(40);
          });

          it('should write infinities as null', () => {
               expect(boundToJson(Infinity)).toBeNull();
               expect(boundToJson(-Infinity)).toBeNull();
          });
     });

     describe('assertValidBounds', () => {
          it('should accept min below max', () => {
               expect(() => assertValidBounds({ minAmount: 10, maxAmount: 100 })).not.toThrow();
          });

          it('should accept equal bounds', () => {
               expect(() => assertValidBounds({ minAmount: 50, maxAmount: 50 })).not.toThrow();
          });

          it('should accept unbounded sides', () => {
               expect(() =>
                    assertValidBounds({ minAmount: -Infinity, maxAmount: Infinity })
               ).not.toThrow();
               expect(() => assertValidBounds({ minAmount: 500, maxAmount: Infinity })).not.toThrow();
          });

          it('should treat an infinite minimum as unbounded', () => {
               expect(() => assertValidBounds({ minAmount: Infinity, maxAmount: 10 })).not.toThrow();
          });

          it('should reject min above max', () => {
               expect(() => assertValidBounds({ minAmount: 100, maxAmount: 10 })).toThrow(
                    'Minimum amount 100 exceeds maximum amount 10'
               );
          });
     });

     describe('checkAmount', () => {
          const bounds = { minAmount: 100, maxAmount: 1000 };

          it('should report amounts under the minimum', () => {
               expect(checkAmount(bounds, 99)).toBe('BELOW_MINIMUM');
          });

          it('should report amounts over the maximum', () => {
               expect(checkAmount(bounds, 1001)).toBe('ABOVE_MAXIMUM');
          });

          it('should accept amounts on either bound', () => {
               expect(checkAmount(bounds, 100)).toBeNull();
               expect(checkAmount(bounds, 1000)).toBeNull();
          });

          it('should never flag an unbounded constraint', () => {
               expect(checkAmount({ minAmount: -Infinity, maxAmount: Infinity }, -20)).toBeNull();
          });
     });

     describe('formatBound', () => {
          it('should print infinities as -inf and inf', () => {
               expect(formatBound(-Infinity)).toBe('-inf');
               expect(formatBound(Infinity)).toBe('inf');
               expect(formatBound(12)).toBe('12');
          });
     });
});
