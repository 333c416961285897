import { describe, it, expect, vi } from 'vitest';
import { createLogger } from '../logger.js';

describe('createLogger', () => {
  it('prefixes lines with the level', () => {
    const sink = vi.fn();
    createLogger('info', sink).info('ready');
    expect(sink).toHaveBeenCalledWith('[INFO] ready');
  });

  it('drops messages below the configured level', () => {
    const sink = vi.fn();
    const logger = createLogger('warn', sink);

    logger.debug('noise');
    logger.info('noise');
    logger.warn('careful');
    logger.error('broken');

    expect(sink.mock.calls).toEqual([['[WARN] careful'], ['[ERROR] broken']]);
  });

  it('passes everything at debug', () => {
    const sink = vi.fn();
    createLogger('debug', sink).debug('detail');
    expect(sink).toHaveBeenCalledWith('[DEBUG] detail');
  });
});
