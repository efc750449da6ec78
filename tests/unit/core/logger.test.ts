import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createFileLogger } from '../../../src/core/logger.js';

const LINE = /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] (INFO|WARN|ERROR): (.*)$/;

describe('logger', () => {
  let dir: string;

  beforeEach(() => {
    dir = join(tmpdir(), `pacmate-logger-test-${Date.now()}`);
    mkdirSync(dir, { recursive: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('appends timestamped plain-text lines', () => {
    const logFile = join(dir, 'nested', 'pacmate.log');
    const logger = createFileLogger(logFile);

    logger.info('Successfully installed package: vim');
    logger.warn('careful');
    logger.error('Failed to remove package: vim');

    const lines = readFileSync(logFile, 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines.map((line) => LINE.exec(line)?.slice(1))).toEqual([
      ['INFO', 'Successfully installed package: vim'],
      ['WARN', 'careful'],
      ['ERROR', 'Failed to remove package: vim'],
    ]);
  });

  it('keeps earlier content', () => {
    const logFile = join(dir, 'pacmate.log');
    writeFileSync(logFile, 'previous line\n');

    createFileLogger(logFile).info('next');

    const lines = readFileSync(logFile, 'utf-8').trimEnd().split('\n');
    expect(lines[0]).toBe('previous line');
    expect(LINE.exec(lines[1])?.[2]).toBe('next');
  });

  it('never throws when the log file cannot be written', () => {
    // A directory where the file should be makes every append fail.
    const logFile = join(dir, 'is-a-directory');
    mkdirSync(logFile);
    const logger = createFileLogger(logFile);

    expect(() => {
      logger.info('first');
      logger.error('second');
    }).not.toThrow();
  });
});
