/**
 * Spinner around a long-running step (ora)
 */

import ora from 'ora'

export async function withSpinner<T>(
  text: string,
  task: () => Promise<T>,
  options?: {
    successText?: string | ((result: T) => string)
    failText?: string | ((error: Error) => string)
  }
): Promise<T> {
  const spinner = ora({ text, spinner: 'dots' }).start()

  try {
    const result = await task()
    const successText =
      typeof options?.successText === 'function'
        ? options.successText(result)
        : options?.successText
    spinner.succeed(successText)
    return result
  } catch (e) {
    const error = e instanceof Error ? e : new Error(String(e))
    const failText =
      typeof options?.failText === 'function' ? options.failText(error) : options?.failText
    spinner.fail(failText ?? error.message)
    throw e
  }
}
