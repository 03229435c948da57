/**
 * Field reference substitution for QGIS expressions.
 *
 * A reference to field `F` is either the quoted identifier `"F"` or a bare
 * `F` delimited by word boundaries (letters, digits and `_` in any script
 * count as word characters, so `F2` or `gF` do not match `F`). A bare name
 * directly after `@` is an expression variable such as `@id`, not a field.
 *
 * Callers are expected to mask string literals first (see literal-mask.ts).
 */

import { ID_EXPRESSION } from '../../constants.js'

const WORD_CLASS = '[\\p{L}\\p{N}_]'
const WORD_CHAR = /^[\p{L}\p{N}_]$/u

export interface SubstitutionResult {
  readonly expression: string
  /** Number of references replaced */
  readonly count: number
  readonly changed: boolean
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function isWordChar(char: string | undefined): boolean {
  return char !== undefined && WORD_CHAR.test(char)
}

/**
 * Bare-name pattern with `\b` semantics on both ends, whatever the first
 * and last characters of the name are.
 */
function bareNamePattern(fieldName: string): string {
  const chars = Array.from(fieldName)
  const leading = isWordChar(chars[0]) ? `(?<!${WORD_CLASS}|@)` : `(?<=${WORD_CLASS})`
  const trailing = isWordChar(chars[chars.length - 1])
    ? `(?!${WORD_CLASS})`
    : `(?=${WORD_CLASS})`
  return `${leading}${escapeRegExp(fieldName)}${trailing}`
}

function quotedNamePattern(fieldName: string): string {
  return `"${escapeRegExp(fieldName)}"`
}

/**
 * Integer-valued replacement for a boolean field reference.
 */
export function booleanFieldExpression(fieldName: string): string {
  return `if("${fieldName}", true, false)`
}

const primaryKeyPatterns = new Map<string, RegExp>()
const booleanPatterns = new Map<string, RegExp>()

function primaryKeyPattern(fieldName: string): RegExp {
  let pattern = primaryKeyPatterns.get(fieldName)
  if (!pattern) {
    pattern = new RegExp(`${quotedNamePattern(fieldName)}|${bareNamePattern(fieldName)}`, 'gu')
    primaryKeyPatterns.set(fieldName, pattern)
  }
  return pattern
}

// Any boolean wrapper, whichever field it holds, is kept as is. A field named
// `true` or `false` would otherwise match inside another field's wrapper.
const WRAPPED_BOOLEAN = '(if\\(\\s*"[^"]*"\\s*,\\s*true\\s*,\\s*false\\s*\\))'

function booleanPattern(fieldName: string): RegExp {
  let pattern = booleanPatterns.get(fieldName)
  if (!pattern) {
    const quoted = quotedNamePattern(fieldName)
    pattern = new RegExp(
      `${WRAPPED_BOOLEAN}|${quoted}|${bareNamePattern(fieldName)}`,
      'gu'
    )
    booleanPatterns.set(fieldName, pattern)
  }
  return pattern
}

/**
 * Replaces every reference to the primary key field with `@id`.
 */
export function substitutePrimaryKey(expression: string, fieldName: string): SubstitutionResult {
  let count = 0
  const result = expression.replace(primaryKeyPattern(fieldName), () => {
    count++
    return ID_EXPRESSION
  })
  return { expression: result, count, changed: count > 0 }
}

/**
 * Replaces every reference to a boolean field with `if("F", true, false)`.
 * Existing `if("...", true, false)` wrappers are left alone.
 */
export function substituteBooleanField(expression: string, fieldName: string): SubstitutionResult {
  let count = 0
  const replacement = booleanFieldExpression(fieldName)
  const result = expression.replace(
    booleanPattern(fieldName),
    (match: string, wrapped: string | undefined) => {
      if (wrapped !== undefined) {
        return match
      }
      count++
      return replacement
    }
  )
  return { expression: result, count, changed: count > 0 }
}
