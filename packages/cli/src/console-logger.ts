import chalk, { type ChalkInstance } from 'chalk';
import type { LogEntry, LogLevel, Logger } from '@restidy/core';

const FRAME_WIDTH = 120;

/**
 * Console logger options
 */
export interface ConsoleLoggerOptions {
  write?: (line: string) => void;
  palette?: ChalkInstance;
}

function colorize(palette: ChalkInstance, level: LogLevel, message: string): string {
  switch (level) {
    case 'success':
      return palette.green(message);
    case 'warn':
      return palette.yellow(message);
    case 'error':
      return palette.red(message);
    case 'info':
      return message;
  }
}

function rule(start: string): string {
  return `${start}${'━'.repeat(Math.max(0, FRAME_WIDTH - start.length))}`;
}

/**
 * Render one entry as a console line:
 *
 *   ┏━(Round #1)━━━━━━━━
 *   ┃ app: Moved 2 matching resource(s).
 *   ┗━(0.12s)━━━━━━━━━━━
 */
export function formatEntry(entry: LogEntry, palette: ChalkInstance = chalk): string {
  const gutter = '┃ '.repeat(entry.depth);

  if (entry.frame?.kind === 'open') {
    return gutter + rule(`┏━(${entry.message})`);
  }
  if (entry.frame?.kind === 'close') {
    return gutter + rule(`┗━(${(entry.frame.elapsedMs / 1000).toFixed(2)}s)`);
  }
  return gutter + colorize(palette, entry.level, entry.message);
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { write = (line: string) => console.log(line), palette = chalk } = options;
  return {
    log(entry) {
      write(formatEntry(entry, palette));
    },
  };
}
