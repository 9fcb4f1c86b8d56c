import { InvalidConstraintError } from '../utils/errors';

/** Stored value meaning "no limit on this side". */
export const UNBOUNDED = -1;

export type BoundSide = 'min' | 'max';

export type ViolationKind = 'BELOW_MINIMUM' | 'ABOVE_MAXIMUM';

export interface AmountBounds {
     minAmount: number;
     maxAmount: number;
}

function unbounded(side: BoundSide): number {
     return side === 'min' ? -Infinity : Infinity;
}

/**
 * Column value to accessor value: any negative stored value is unbounded and
 * reads as -Infinity for a minimum, Infinity for a maximum.
 */
export function decodeBound(stored: number, side: BoundSide): number {
     return stored < 0 ? unbounded(side) : stored;
}

/**
 * Accessor value to column value: infinity (either sign) stores the sentinel.
 */
export function encodeBound(value: number, side: BoundSide): number {
     if (value === Infinity || value === -Infinity) {
          return UNBOUNDED;
     }
     if (!Number.isInteger(value) || value < 0) {
          throw new InvalidConstraintError(
               `${side === 'min' ? 'Minimum' : 'Maximum'} amount must be a non-negative integer or unbounded, got ${value}`
          );
     }
     return value;
}

// JSON has no infinity: null (or the sentinel itself) stands for it on the wire.
export function boundFromJson(value: number | null, side: BoundSide): number {
     return value === null || value === UNBOUNDED ? unbounded(side) : value;
}

export function boundToJson(value: number): number | null {
     return Number.isFinite(value) ? value : null;
}

export function assertValidBounds(bounds: AmountBounds): void {
     const minAmount = decodeBound(encodeBound(bounds.minAmount, 'min'), 'min');
     const maxAmount = decodeBound(encodeBound(bounds.maxAmount, 'max'), 'max');
     if (minAmount > maxAmount) {
          throw new InvalidConstraintError(
               `Minimum amount ${minAmount} exceeds maximum amount ${maxAmount}`
          );
     }
}

export function checkAmount(bounds: AmountBounds, onHand: number): ViolationKind | null {
     if (onHand < bounds.minAmount) {
          return 'BELOW_MINIMUM';
     }
     if (onHand > bounds.maxAmount) {
          return 'ABOVE_MAXIMUM';
     }
     return null;
}

export function formatBound(value: number): string {
     if (Number.isFinite(value)) {
          return String(value);
     }
     return value < 0 ? '-inf' : 'inf';
}
