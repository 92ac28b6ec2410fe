import * as clack from "@clack/prompts";

/**
 * Run a task behind a spinner. The task receives a callback that replaces
 * the spinner's message, for progress updates.
 */
export async function withSpinner<T>(
  message: string,
  task: (update: (message: string) => void) => Promise<T>,
  successMessage?: string
): Promise<T> {
  const spinner = clack.spinner();
  spinner.start(message);

  try {
    const result = await task((next) => spinner.message(next));
    spinner.stop(successMessage ?? message);
    return result;
  } catch (err) {
    spinner.stop(`${message} failed`, 2);
    throw err;
  }
}
