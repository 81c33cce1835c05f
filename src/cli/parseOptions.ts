/**
 * Numeric command-line options, checked against the config schemas
 */

import { z } from 'zod'
import { AppError } from '../shared/error.js'

export const listLimitSchema = z.number().int().positive()

/**
 * @returns undefined when the option was not given
 * @throws AppError ERR_VALIDATION when the value fails the schema
 */
export function parseNumberOption(
  value: string | undefined,
  flag: string,
  schema: z.ZodType<number>
): number | undefined {
  if (value === undefined) return undefined
  // Number('') is 0, which must not pass as a given value
  const parsed = schema.safeParse(value.trim() === '' ? Number.NaN : Number(value))
  if (!parsed.success) {
    const reason = parsed.error.issues[0]?.message ?? 'invalid value'
    throw new AppError('ERR_VALIDATION', `Invalid ${flag} "${value}": ${reason}`, 'VALIDATION')
  }
  return parsed.data
}
