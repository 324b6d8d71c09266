import { describe, it, expect, vi } from 'vitest';

import { createLevelLogger } from '../logger';

import type { Logger } from '@batchline/core';

describe('createLevelLogger', () => {
  const target = (): Logger => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

  it('should drop messages below the level', () => {
    const sink = target();
    const logger = createLevelLogger('warn', sink);

    logger.debug('a');
    logger.info('b');
    logger.warn('c', { id: 1 });
    logger.error('d');

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith('c', { id: 1 });
    expect(sink.error).toHaveBeenCalledWith('d');
  });

  it('should pass everything at debug', () => {
    const sink = target();
    const logger = createLevelLogger('debug', sink);

    logger.debug('a');
    logger.info('b');

    expect(sink.debug).toHaveBeenCalledWith('a');
    expect(sink.info).toHaveBeenCalledWith('b');
  });
});
