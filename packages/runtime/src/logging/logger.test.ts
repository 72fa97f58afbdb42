// Tests for logger helpers

import { describe, it, expect } from 'vitest';
import { createCapturingLogger, withMinimumLevel } from './logger.js';

describe('createCapturingLogger', () => {
  it('records level, message and data', () => {
    const logger = createCapturingLogger();
    logger.info('Revision appended', { revisionId: 1 });

    expect(logger.entries).toHaveLength(1);
    expect(logger.entries[0]).toMatchObject({
      level: 'info',
      message: 'Revision appended',
      data: { revisionId: 1 },
    });
  });
});

describe('withMinimumLevel', () => {
  it('drops messages below the threshold', () => {
    const inner = createCapturingLogger();
    const logger = withMinimumLevel(inner, 'warn');

    logger.debug('debug message');
    logger.info('info message');
    logger.warn('warn message');
    logger.error('error message');

    expect(inner.entries.map((e) => e.message)).toEqual(['warn message', 'error message']);
  });

  it('passes everything at debug', () => {
    const inner = createCapturingLogger();
    const logger = withMinimumLevel(inner, 'debug');

    logger.debug('one');
    logger.info('two');

    expect(inner.entries.map((e) => e.level)).toEqual(['debug', 'info']);
  });
});
