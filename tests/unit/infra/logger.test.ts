import { describe, it, expect, vi } from 'vitest';
import { createLogger, shouldLog } from '../../../src/infra/logger/logger.js';

describe('createLogger', () => {
  it('should drop messages below the configured level', () => {
    const write = vi.fn();
    const logger = createLogger({ logging: { level: 'warn', color: false } }, write);

    logger.debug('dispatcher', 'noise');
    logger.info('dispatcher', 'still noise');
    logger.warn('dispatcher', 'careful');

    expect(write).toHaveBeenCalledTimes(1);
    const [level, line] = write.mock.calls[0];
    expect(level).toBe('warn');
    expect(line).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{2} WARN \[dispatcher\] careful$/);
  });

  it('should order levels from debug to error', () => {
    expect(shouldLog('error', 'debug')).toBe(true);
    expect(shouldLog('info', 'info')).toBe(true);
    expect(shouldLog('debug', 'info')).toBe(false);
  });
});
