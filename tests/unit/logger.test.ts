import { createChildLogger, logger } from '@stockroom/shared/src/utils/logger';

describe('Logger', () => {
     it('should be defined', () => {
          expect(logger).toBeDefined();
     });

     it('should honour LOG_LEVEL', () => {
          expect(logger.level).toBe('silent');
     });

     it('should have standard logging methods', () => {
          expect(logger.info).toBeDefined();
          expect(logger.error).toBeDefined();
          expect(logger.warn).toBeDefined();
          expect(logger.debug).toBeDefined();
     });

     it('should log info messages', () => {
          const spy = jest.spyOn(logger, 'info');
          logger.info('Test info message');
          expect(spy).toHaveBeenCalledWith('Test info message');
          spy.mockRestore();
     });

     it('should handle structured logging with objects', () => {
          const spy = jest.spyOn(logger, 'info');
          logger.info({ documentId: 42, action: 'test' }, 'Document action');
          expect(spy).toHaveBeenCalledWith({ documentId: 42, action: 'test' }, 'Document action');
          spy.mockRestore();
     });

     it('should handle error objects', () => {
          const spy = jest.spyOn(logger, 'error');
          const error = new Error('Test error');
          logger.error({ err: error }, 'An error occurred');
          expect(spy).toHaveBeenCalledWith({ err: error }, 'An error occurred');
          spy.mockRestore();
     });

     it('should create child loggers with bound context', () => {
          const child = createChildLogger({ component: 'dispatcher' });
          expect(child.bindings()).toEqual(
               expect.objectContaining({ component: 'dispatcher' })
          );
          expect(child.level).toBe('silent');
     });
});
