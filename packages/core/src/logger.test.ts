import { describe, expect, it } from 'vitest';
import { createMemoryLogger, scopeLogger, withFrame } from './logger.js';

describe('logger', () => {
  it('logs scoped messages at the bound depth', () => {
    const logger = createMemoryLogger();

    scopeLogger(logger, 2).warn('careful');

    expect(logger.entries).toEqual([{ level: 'warn', message: 'careful', depth: 2 }]);
  });

  it('nests frame bodies one level deeper and closes the frame', () => {
    const logger = createMemoryLogger();

    const result = withFrame(logger, 'Round #1', 0, (frame) => {
      frame.info('inside');
      return 3;
    });

    expect(result).toBe(3);
    expect(logger.entries.map(({ message, depth, frame }) => [message, depth, frame?.kind])).toEqual([
      ['Round #1', 0, 'open'],
      ['inside', 1, undefined],
      ['Round #1', 0, 'close'],
    ]);
    expect(logger.messages()).toEqual(['inside']);
  });

  it('closes the frame when the body throws', () => {
    const logger = createMemoryLogger();

    expect(() =>
      withFrame(logger, 'Round #1', 1, () => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(logger.entries.map((entry) => entry.frame?.kind)).toEqual(['open', 'close']);
  });
});
