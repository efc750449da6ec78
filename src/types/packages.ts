import type { ManagerId } from './config.js';

export interface PackageRecord {
  name: string;
  repository: string;
  version: string;
  description: string;
}

export interface ManagerDescriptor {
  id: ManagerId;
  displayName: string;
  requiresElevation: boolean;
  supportsAUR: boolean;
}

/** An external command as an argument vector; never passed through a shell. */
export interface Command {
  file: string;
  args: string[];
  cwd?: string;
}

export interface CommandResult {
  success: boolean;
  output: string;
}

export interface RunOptions {
  captureOutput?: boolean;
}

export interface ScoredCandidate {
  name: string;
  score: number;
}
