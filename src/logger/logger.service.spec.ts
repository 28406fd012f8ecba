import { LoggerService } from './logger.service';

describe('LoggerService', () => {
  it('should not add process listeners for each instance', () => {
    new LoggerService();
    const exceptionListeners = process.listenerCount('uncaughtException');
    const rejectionListeners = process.listenerCount('unhandledRejection');

    for (let i = 0; i < 5; i++) {
      new LoggerService();
    }

    expect(process.listenerCount('uncaughtException')).toBe(exceptionListeners);
    expect(process.listenerCount('unhandledRejection')).toBe(rejectionListeners);
  });
});
