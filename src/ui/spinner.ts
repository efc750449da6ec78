import ora from 'ora';

/** Runs `fn` under a spinner; with `enabled` false the text is not shown at all. */
export async function withSpinner<T>(
  text: string,
  fn: () => Promise<T>,
  enabled = true,
  succeeded: (result: T) => boolean = () => true,
): Promise<T> {
  if (!enabled) return fn();
  const spinner = ora(text).start();
  try {
    const result = await fn();
    if (succeeded(result)) spinner.succeed();
    else spinner.fail();
    return result;
  } catch (err) {
    spinner.fail();
    throw err;
  }
}
