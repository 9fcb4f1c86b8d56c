import {
     DomainError,
     DuplicateEntityError,
     EntityInUseError,
     EntityNotFoundError,
     InsufficientStockError,
     InvalidTransferError,
     isPostgresError,
     mapDatabaseError,
     TreeCycleError,
     UnauthorizedError,
} from '@stockroom/shared/src/utils/errors';
import { postgresError } from '../helpers/testUtils';

describe('Error Classes', () => {
     describe('DomainError', () => {
          it('should create a domain error with message and code', () => {
               const error = new DomainError('Test error', 'TEST_CODE');
               expect(error.message).toBe('Test error');
               expect(error.code).toBe('TEST_CODE');
               expect(error.statusCode).toBe(400);
               expect(error.name).toBe('DomainError');
               expect(error instanceof Error).toBe(true);
          });

          it('should accept custom status code', () => {
               const error = new DomainError('Test error', 'TEST_CODE', 500);
               expect(error.statusCode).toBe(500);
          });
     });

     describe('EntityNotFoundError', () => {
          it('should derive code and message from the entity', () => {
               const error = new EntityNotFoundError('CONTRACTOR_GROUP', 7);
               expect(error.code).toBe('CONTRACTOR_GROUP_NOT_FOUND');
               expect(error.message).toBe('Contractor group 7 not found');
               expect(error.statusCode).toBe(404);
               expect(error.name).toBe('EntityNotFoundError');
               expect(error instanceof DomainError).toBe(true);
          });
     });

     describe('DuplicateEntityError', () => {
          it('should include the detail when given', () => {
               const error = new DuplicateEntityError(
                    'MEASURE_UNIT',
                    'Key (name)=(kg) already exists.'
               );
               expect(error.message).toBe('Measure unit already exists: Key (name)=(kg) already exists.');
               expect(error.code).toBe('DUPLICATE_ENTITY');
               expect(error.statusCode).toBe(409);
          });

          it('should work without detail', () => {
               expect(new DuplicateEntityError('DOCUMENT').message).toBe('Document already exists');
          });
     });

     describe('EntityInUseError', () => {
          it('should default the message', () => {
               const error = new EntityInUseError('WAREHOUSE', 3);
               expect(error.message).toBe('Warehouse 3 is referenced by other records');
               expect(error.code).toBe('ENTITY_IN_USE');
               expect(error.statusCode).toBe(409);
          });
     });

     describe('TreeCycleError', () => {
          it('should name the node and the rejected parent', () => {
               const error = new TreeCycleError('WAREHOUSE', 1, 4);
               expect(error.message).toBe('Warehouse 1 cannot be moved under 4: it would create a cycle');
               expect(error.code).toBe('TREE_CYCLE');
          });
     });

     describe('InsufficientStockError', () => {
          it('should carry the stock details', () => {
               const error = new InsufficientStockError('Not enough', 10, 2, 30, 12);
               expect(error.code).toBe('INSUFFICIENT_STOCK');
               expect(error.statusCode).toBe(409);
               expect(error.assetId).toBe(10);
               expect(error.warehouseId).toBe(2);
               expect(error.requested).toBe(30);
               expect(error.available).toBe(12);
          });
     });

     describe('Request errors', () => {
          it('should use 400 for invalid transfers', () => {
               const error = new InvalidTransferError('Source and destination warehouses must differ');
               expect(error.code).toBe('INVALID_TRANSFER');
               expect(error.statusCode).toBe(400);
          });

          it('should use 401 for a missing API key', () => {
               const error = new UnauthorizedError();
               expect(error.code).toBe('UNAUTHORIZED');
               expect(error.statusCode).toBe(401);
               expect(error.message).toBe('Missing or invalid API key');
          });
     });

     describe('mapDatabaseError', () => {
          it('should recognise PostgreSQL errors by their SQLSTATE code', () => {
               expect(isPostgresError(postgresError('23505'))).toBe(true);
               expect(isPostgresError(new Error('plain'))).toBe(false);
               expect(isPostgresError({ code: '23505' })).toBe(false);
          });

          it('should map unique violations to DuplicateEntityError', () => {
               const mapped = mapDatabaseError(
                    postgresError('23505', 'Key (part_number)=(X-1) already exists.'),
                    'MATERIAL_ASSET'
               );
               expect(mapped).toBeInstanceOf(DuplicateEntityError);
               expect(mapped).toHaveProperty(
                    'message',
                    'Material asset already exists: Key (part_number)=(X-1) already exists.'
               );
          });

          it('should map foreign key violations on a known entity to EntityInUseError', () => {
               const mapped = mapDatabaseError(postgresError('23503'), 'MEASURE_UNIT', 1);
               expect(mapped).toBeInstanceOf(EntityInUseError);
               expect(mapped).toHaveProperty('message', 'Measure unit 1 is referenced by other records');
          });

          it('should leave foreign key violations without an entity id untouched', () => {
               const original = postgresError('23503');
               expect(mapDatabaseError(original, 'DOCUMENT')).toBe(original);
          });

          it('should leave other errors untouched', () => {
               const original = new Error('connection reset');
               expect(mapDatabaseError(original, 'DOCUMENT')).toBe(original);
               const checkViolation = postgresError('23514');
               expect(mapDatabaseError(checkViolation, 'DOCUMENT')).toBe(checkViolation);
          });
     });
});
