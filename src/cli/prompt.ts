/**
 * Interactive prompts on top of inquirer
 */

import inquirer from 'inquirer'

export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY)
}

export async function select<T extends string>(
  message: string,
  choices: Array<{ name: string; value: T }>
): Promise<T> {
  const { result } = await inquirer.prompt<{ result: T }>([
    {
      type: 'select',
      name: 'result',
      message,
      choices,
    },
  ])
  return result
}

// Long text in $EDITOR
export async function editor(message: string, defaultValue?: string): Promise<string> {
  const { result } = await inquirer.prompt<{ result: string }>([
    {
      type: 'editor',
      name: 'result',
      message,
      default: defaultValue,
    },
  ])
  return result
}
