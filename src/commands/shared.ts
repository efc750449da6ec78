import { Option } from 'commander';
import { MANAGER_IDS, ManagerIdSchema } from '../config/schema.js';
import { createSession, type Session } from '../core/session.js';
import type { OperationOutcome } from '../types/operations.js';

export interface SessionFlags {
  manager?: string;
  yes?: boolean;
}

export const managerOption = () =>
  new Option('-m, --manager <manager>', 'Package manager to use').choices(MANAGER_IDS);

export const yesOption = () => new Option('-y, --yes', 'Auto-confirm prompts for this run');

export function sessionFromFlags(flags: SessionFlags): Session {
  return createSession({
    manager: flags.manager === undefined ? undefined : ManagerIdSchema.parse(flags.manager),
    overrides: flags.yes ? { auto_confirm: true } : undefined,
  });
}

export function exitWith(outcome: OperationOutcome): void {
  if (outcome.status !== 'succeeded') process.exitCode = 1;
}
