import * as p from "@clack/prompts";

/**
 * Returns true if the CLI is running in an interactive terminal.
 * False when piped or in CI.
 */
export function isInteractive(): boolean {
  return Boolean(process.stdout.isTTY) && !process.env.CI;
}

/**
 * Wraps an async operation with a clack spinner.
 * Only shows spinner when interactive.
 */
export async function withSpinner<T>(
  message: string,
  fn: () => Promise<T>,
  successMessage?: (result: T) => string,
): Promise<T> {
  if (!isInteractive()) {
    return fn();
  }

  const s = p.spinner();
  s.start(message);
  try {
    const result = await fn();
    s.stop(successMessage ? successMessage(result) : message);
    return result;
  } catch (err) {
    s.stop(`Failed: ${message}`, 2);
    throw err;
  }
}
