import { ConsoleLogger } from './ConsoleLogger';

describe('ConsoleLogger', () => {
  let spy: jest.SpyInstance;
  beforeEach(() => {
    spy = jest.spyOn(console, 'error').mockImplementation(() => { });
  });
  afterEach(() => {
    spy.mockRestore();
  });

  test('quiet by default', () => {
    const logger = new ConsoleLogger(false);
    logger.debug('Generated hash');
    logger.error('NotFound');
    expect(spy).not.toHaveBeenCalled();
  });

  test('verbose', () => {
    const logger = new ConsoleLogger(true);
    logger.debug('Generated hash');
    logger.error('NotFound');
    expect(spy).toHaveBeenCalledTimes(2);
    expect(spy).toHaveBeenNthCalledWith(1, expect.stringContaining('Generated hash'));
    expect(spy).toHaveBeenNthCalledWith(2, expect.stringContaining('NotFound'));
  });
});
