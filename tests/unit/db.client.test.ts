import { checkConnection, pool, withConnection, withTransaction } from '@stockroom/shared/src/db/client';
import { createMockClient, MockClient, queryAt } from '../helpers/testUtils';

describe('Database Client', () => {
     let client: MockClient;
     let connect: jest.SpyInstance;

     beforeEach(() => {
          client = createMockClient();
          client.query.mockResolvedValue({ rows: [] } as never);
          connect = jest.spyOn(pool, 'connect').mockResolvedValue(client as never);
     });

     afterEach(() => {
          connect.mockRestore();
     });

     afterAll(async () => {
          await pool.end();
     });

     describe('checkConnection', () => {
          it('should return true when the database answers', async () => {
               expect(await checkConnection()).toBe(true);
               expect(queryAt(client, 0).text).toBe('SELECT 1');
               expect(client.release).toHaveBeenCalledTimes(1);
          });

          it('should return false when connecting fails', async () => {
               connect.mockRejectedValueOnce(new Error('Connection failed'));

               expect(await checkConnection()).toBe(false);
          });

          it('should release the client when the query fails', async () => {
               client.query.mockRejectedValueOnce(new Error('terminated') as never);

               expect(await checkConnection()).toBe(false);
               expect(client.release).toHaveBeenCalledTimes(1);
          });
     });

     describe('withTransaction', () => {
          it('should execute function within a transaction and commit', async () => {
               const mockFn = jest.fn().mockResolvedValue('success');

               const result = await withTransaction(mockFn);

               expect(result).toBe('success');
               expect(mockFn).toHaveBeenCalledWith(client);
               expect(queryAt(client, 0).text).toBe('BEGIN');
               expect(queryAt(client, 1).text).toBe('COMMIT');
               expect(client.release).toHaveBeenCalledTimes(1);
          });

          it('should rollback transaction on error', async () => {
               const mockFn = jest.fn().mockRejectedValue(new Error('Transaction failed'));

               await expect(withTransaction(mockFn)).rejects.toThrow('Transaction failed');

               expect(queryAt(client, 0).text).toBe('BEGIN');
               expect(queryAt(client, 1).text).toBe('ROLLBACK');
               expect(client.query).toHaveBeenCalledTimes(2);
               expect(client.release).toHaveBeenCalledTimes(1);
          });
     });

     describe('withConnection', () => {
          it('should hand out a client and release it afterwards', async () => {
               const result = await withConnection(async (c) => {
                    expect(c).toBe(client);
                    return 7;
               });

               expect(result).toBe(7);
               expect(client.query).not.toHaveBeenCalled();
               expect(client.release).toHaveBeenCalledTimes(1);
          });

          it('should release the client when the callback throws', async () => {
               await expect(
                    withConnection(async () => {
                         throw new Error('boom');
                    })
               ).rejects.toThrow('boom');
               expect(client.release).toHaveBeenCalledTimes(1);
          });
     });
});
