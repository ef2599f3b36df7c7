import type { z } from 'zod'
import { ParseError } from './errors.js'

/** Validate a decoded response body, naming the first offending path on failure. */
export function parseResponse<S extends z.ZodTypeAny>(schema: S, raw: unknown, source: string): z.infer<S> {
  const result = schema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid'
    throw new ParseError(source, where, { cause: result.error })
  }
  return result.data
}
