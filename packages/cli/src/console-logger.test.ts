import { Chalk } from 'chalk';
import { describe, expect, it } from 'vitest';
import { withFrame } from '@restidy/core';
import { createConsoleLogger, formatEntry } from './console-logger.js';

const plain = new Chalk({ level: 0 });

describe('formatEntry', () => {
  it('indents messages by depth', () => {
    expect(formatEntry({ level: 'success', message: 'app: Moved 2 matching resource(s).', depth: 1 }, plain)).toBe(
      '┃ app: Moved 2 matching resource(s).'
    );
  });

  it('draws frame borders to a fixed width', () => {
    const header = formatEntry({ level: 'info', message: 'Round #1', depth: 0, frame: { kind: 'open' } }, plain);
    const footer = formatEntry(
      { level: 'info', message: 'Round #1', depth: 0, frame: { kind: 'close', elapsedMs: 1250 } },
      plain
    );

    expect(header).toBe('┏━(Round #1)' + '━'.repeat(108));
    expect(footer).toBe('┗━(1.25s)' + '━'.repeat(111));
  });

  it('colors levels', () => {
    const colored = new Chalk({ level: 1 });
    expect(formatEntry({ level: 'error', message: 'boom', depth: 0 }, colored)).toBe('\u001B[31mboom\u001B[39m');
    expect(formatEntry({ level: 'info', message: 'calm', depth: 0 }, colored)).toBe('calm');
  });
});

describe('createConsoleLogger', () => {
  it('writes framed sections', () => {
    const lines: string[] = [];
    const logger = createConsoleLogger({ write: (line) => lines.push(line), palette: plain });

    withFrame(logger, 'Summary', 0, (frame) => frame.info('3 resource(s) moved over 2 round(s).'));

    expect(lines).toHaveLength(3);
    expect(lines[0]?.startsWith('┏━(Summary)━')).toBe(true);
    expect(lines[1]).toBe('┃ 3 resource(s) moved over 2 round(s).');
    expect(lines[2]?.startsWith('┗━(')).toBe(true);
  });
});
