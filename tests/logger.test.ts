import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { createLogger, describeError, resolveLogLevel } from '../src/utils/logger';

describe('resolveLogLevel', () => {
  it('normalizes known levels', () => {
    expect(resolveLogLevel(' WARN ')).toBe('warn');
    expect(resolveLogLevel('silent')).toBe('silent');
  });

  it('falls back to info for unknown or inherited names', () => {
    expect(resolveLogLevel('verbose')).toBe('info');
    expect(resolveLogLevel('toString')).toBe('info');
    expect(resolveLogLevel('constructor')).toBe('info');
    expect(resolveLogLevel('')).toBe('info');
  });
});

describe('createLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('prefixes the scope and drops messages below the level', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = createLogger('Batch', 'info');

    logger.info('Started', { documents: 3 });
    logger.info('Plain');
    logger.debug('Hidden');

    expect(info.mock.calls).toEqual([['[Batch] Started', { documents: 3 }], ['[Batch] Plain']]);
    expect(debug).not.toHaveBeenCalled();
  });
});

describe('describeError', () => {
  it('uses the message of an Error and stringifies anything else', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain failure')).toBe('plain failure');
  });
});
