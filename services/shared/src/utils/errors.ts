import { ENTITY_LABELS, EntityName } from '../db/entities';

// Custom error classes for domain-specific errors

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export class EntityNotFoundError extends DomainError {
     constructor(
          public readonly entity: EntityName,
          public readonly entityId: number | string
     ) {
          super(`${ENTITY_LABELS[entity]} ${entityId} not found`, `${entity}_NOT_FOUND`, 404);
     }
}

export class DuplicateEntityError extends DomainError {
     constructor(
          public readonly entity: EntityName,
          detail?: string
     ) {
          super(
               detail
                    ? `${ENTITY_LABELS[entity]} already exists: ${detail}`
                    : `${ENTITY_LABELS[entity]} already exists`,
               'DUPLICATE_ENTITY',
               409
          );
     }
}

export class EntityInUseError extends DomainError {
     constructor(
          public readonly entity: EntityName,
          public readonly entityId: number | string,
          message: string = `${ENTITY_LABELS[entity]} ${entityId} is referenced by other records`
     ) {
          super(message, 'ENTITY_IN_USE', 409);
     }
}

export class TreeCycleError extends DomainError {
     constructor(
          public readonly entity: EntityName,
          public readonly nodeId: number,
          public readonly parentId: number
     ) {
          super(
               `${ENTITY_LABELS[entity]} ${nodeId} cannot be moved under ${parentId}: it would create a cycle`,
               'TREE_CYCLE',
               409
          );
     }
}

export class InsufficientStockError extends DomainError {
     constructor(
          message: string,
          public readonly assetId: number,
          public readonly warehouseId: number,
          public readonly requested: number,
          public readonly available: number
     ) {
          super(message, 'INSUFFICIENT_STOCK', 409);
     }
}

export class InvalidAmountError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_AMOUNT', 400);
     }
}

export class InvalidConstraintError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_CONSTRAINT', 400);
     }
}

export class InvalidDirectionError extends DomainError {
     constructor(public readonly direction: unknown) {
          super(`Direction must be 1 (In) or -1 (Out), got ${String(direction)}`, 'INVALID_DIRECTION', 400);
     }
}

export class InvalidTransferError extends DomainError {
     constructor(message: string) {
          super(message, 'INVALID_TRANSFER', 400);
     }
}

export class UnauthorizedError extends DomainError {
     constructor(message: string = 'Missing or invalid API key') {
          super(message, 'UNAUTHORIZED', 401);
     }
}

interface PostgresErrorFields {
     code: string;
     detail?: string;
     constraint?: string;
}

export function isPostgresError(error: unknown): error is Error & PostgresErrorFields {
     return (
          error instanceof Error &&
          'code' in error &&
          typeof error.code === 'string' &&
          /^[0-9A-Z]{5}$/.test(error.code)
     );
}

export const PG_UNIQUE_VIOLATION = '23505';
export const PG_FOREIGN_KEY_VIOLATION = '23503';

/**
 * Translate constraint violations raised by PostgreSQL into domain errors.
 * Anything that is not a recognised violation is returned unchanged.
 */
export function mapDatabaseError(
     error: unknown,
     entity: EntityName,
     entityId?: number | string
): unknown {
     if (!isPostgresError(error)) {
          return error;
     }

     if (error.code === PG_UNIQUE_VIOLATION) {
          return new DuplicateEntityError(entity, error.detail);
     }

     if (error.code === PG_FOREIGN_KEY_VIOLATION && entityId !== undefined) {
          return new EntityInUseError(entity, entityId);
     }

     return error;
}
