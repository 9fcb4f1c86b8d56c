import { InvalidDirectionError } from '../utils/errors';

export type Direction = 1 | -1;

export const DIRECTION_IN: Direction = 1;
export const DIRECTION_OUT: Direction = -1;

export const DIRECTION_LABELS: Record<Direction, string> = {
     '-1': 'Out',
     '1': 'In',
};

export function isDirection(value: unknown): value is Direction {
     return value === DIRECTION_IN || value === DIRECTION_OUT;
}

export function parseDirection(value: unknown): Direction {
     if (!isDirection(value)) {
          throw new InvalidDirectionError(value);
     }
     return value;
}

/** Inventory delta of a movement: amount multiplied by its type's direction. */
export function signedAmount(direction: Direction, amount: number): number {
     return direction * amount;
}
