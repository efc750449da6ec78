import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import pino, { type Logger } from 'pino';
import { prettyFactory } from 'pino-pretty';

export type { Logger };

// [2025-01-31 14:02:11] INFO: message
const formatLine = prettyFactory({
  colorize: false,
  translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
  ignore: 'pid,hostname',
});

/**
 * Destination that appends each record to `path` as a plain-text line.
 * The first failed write turns the sink off: logging never interrupts a package operation.
 */
export function createFileSink(path: string): { write(msg: string): void } {
  let enabled = true;
  return {
    write(msg: string): void {
      if (!enabled) return;
      try {
        mkdirSync(dirname(path), { recursive: true });
        appendFileSync(path, formatLine(msg), 'utf-8');
      } catch {
        enabled = false;
      }
    },
  };
}

export function createFileLogger(path: string): Logger {
  return pino({ level: 'info', base: null }, createFileSink(path));
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
