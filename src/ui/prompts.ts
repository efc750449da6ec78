import { confirm, select, input } from '@inquirer/prompts';

export interface Choice<T extends string> {
  name: string;
  value: T;
}

export interface InputOptions {
  default?: string;
  validate?: (value: string) => boolean | string;
}

/** Everything the shell and the operations ask the user. */
export interface Prompter {
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
  select<T extends string>(message: string, choices: Choice<T>[], defaultValue?: T): Promise<T>;
  input(message: string, options?: InputOptions): Promise<string>;
}

export async function askConfirm(message: string, defaultValue = true): Promise<boolean> {
  return confirm({ message, default: defaultValue });
}

export async function askSelect<T extends string>(
  message: string,
  choices: Choice<T>[],
  defaultValue?: T,
): Promise<T> {
  return select({ message, choices, default: defaultValue, loop: false });
}

export async function askInput(message: string, options: InputOptions = {}): Promise<string> {
  return input({ message, default: options.default, validate: options.validate });
}

export const inquirerPrompter: Prompter = {
  confirm: askConfirm,
  select: askSelect,
  input: askInput,
};

/** Ctrl-C at any prompt rejects with this error name. */
export function isPromptExit(err: unknown): boolean {
  return err instanceof Error && err.name === 'ExitPromptError';
}
