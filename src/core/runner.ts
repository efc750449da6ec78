import { spawn } from 'node:child_process';
import type { Logger } from './logger.js';
import type { Command, CommandResult, RunOptions } from '../types/packages.js';

export const DEFAULT_TIMEOUT_MS = 300_000;
export const TIMEOUT_MESSAGE = 'Command timed out';

export interface CommandRunner {
  run(command: Command, options?: RunOptions): Promise<CommandResult>;
  which(tool: string): Promise<boolean>;
}

export function formatCommand(command: Command): string {
  return [command.file, ...command.args].join(' ');
}

export interface ProcessRunnerOptions {
  logger: Logger;
  timeoutMs?: number;
}

/** Runs commands one at a time as child processes, without a shell. */
export class ProcessRunner implements CommandRunner {
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(options: ProcessRunnerOptions) {
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async run(command: Command, options: RunOptions = {}): Promise<CommandResult> {
    const captureOutput = options.captureOutput ?? true;
    const display = formatCommand(command);
    this.logger.info(`Executing command: ${display}`);

    const outcome = await this.spawnAndWait(command, captureOutput);

    switch (outcome.kind) {
      case 'timeout':
        this.logger.error(`Command timed out: ${display}`);
        return { success: false, output: TIMEOUT_MESSAGE };
      case 'error':
        this.logger.error(`Command execution failed: ${display} - ${outcome.message}`);
        return { success: false, output: outcome.message };
      case 'exit': {
        const success = outcome.code === 0;
        if (!success) {
          this.logger.error(`Command failed: ${display} (exit code: ${outcome.code ?? 'none'})`);
          if (captureOutput) {
            this.logger.error(`Output: ${outcome.output}`);
          }
        }
        return { success, output: outcome.output };
      }
    }
  }

  async which(tool: string): Promise<boolean> {
    return new Promise((resolve) => {
      const child = spawn('which', [tool], { stdio: 'ignore' });
      child.on('error', () => resolve(false));
      child.on('close', (code) => resolve(code === 0));
    });
  }

  private spawnAndWait(command: Command, captureOutput: boolean): Promise<SpawnOutcome> {
    return new Promise((resolve) => {
      let output = '';
      let settled = false;
      const settle = (result: SpawnOutcome) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      const child = spawn(command.file, command.args, {
        cwd: command.cwd,
        stdio: captureOutput ? ['ignore', 'pipe', 'pipe'] : 'inherit',
      });

      const timer = setTimeout(() => {
        child.kill('SIGKILL');
        settle({ kind: 'timeout' });
      }, this.timeoutMs);

      const collect = (data: Buffer) => {
        output += data.toString();
      };
      child.stdout?.on('data', collect);
      child.stderr?.on('data', collect);

      child.on('error', (err) => settle({ kind: 'error', message: err.message }));
      child.on('close', (code) => settle({ kind: 'exit', code, output: output.trim() }));
    });
  }
}

type SpawnOutcome =
  | { kind: 'exit'; code: number | null; output: string }
  | { kind: 'timeout' }
  | { kind: 'error'; message: string };
