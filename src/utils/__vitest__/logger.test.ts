import { describe, it, expect, vi, afterEach } from 'vitest';
import { isLogLevel, logger, setLogLevel } from '../logger.js';

function captureStderr() {
  return vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
}

describe('logger', () => {
  afterEach(() => {
    setLogLevel(undefined);
    vi.restoreAllMocks();
  });

  it('should prefix messages with their level', () => {
    const write = captureStderr();
    setLogLevel('debug');
    logger.warn('Region filter skipped');

    expect(write).toHaveBeenCalledWith('[WARN] Region filter skipped\n');
  });

  it('should drop messages below the threshold', () => {
    const write = captureStderr();
    setLogLevel('warn');
    logger.info('Confidence filter: 3 -> 2');
    logger.debug('Dropping low-confidence result');
    logger.error('Recognition failed');

    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith('[ERROR] Recognition failed\n');
  });

  it('should print extra arguments as JSON', () => {
    const write = captureStderr();
    setLogLevel('info');
    logger.info('API Request', { method: 'POST' });

    expect(write).toHaveBeenNthCalledWith(2, `${JSON.stringify([{ method: 'POST' }], null, 2)}\n`);
  });

  it('should recognize level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
