import { z } from 'zod'

export const ResponseFormatSchema = z
  .enum(['json', 'markdown'])
  .default('json')
  .describe('json: programmatic. markdown: display')

/**
 * Parse stringified JSON values some clients send for array parameters.
 */
export function parseJsonString(val: unknown): unknown {
  if (typeof val === 'string') {
    try {
      return JSON.parse(val)
    } catch {
      return val
    }
  }
  return val
}
