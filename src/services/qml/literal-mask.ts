/**
 * Masking of single-quoted string literals inside QGIS expressions.
 *
 * Literals have no escape syntax here: a literal runs from one `'` to the
 * next. Each literal is swapped for `$$<index>$$` so field substitution can
 * never reach into it.
 */

const LITERAL_PATTERN = /'[^']*'/g

export interface MaskedExpression {
  /** Expression with every literal replaced by its placeholder */
  readonly expression: string
  /** Original literal text, indexed by placeholder number */
  readonly literals: readonly string[]
}

export function literalPlaceholder(index: number): string {
  return `$$${index}$$`
}

export function maskLiterals(expression: string): MaskedExpression {
  const literals: string[] = []
  const masked = expression.replace(LITERAL_PATTERN, (literal) => {
    literals.push(literal)
    return literalPlaceholder(literals.length - 1)
  })
  return { expression: masked, literals }
}

/**
 * Puts literals back in ascending index order, first occurrence only, so a
 * literal whose content looks like a placeholder is not expanded again.
 */
export function restoreLiterals(expression: string, literals: readonly string[]): string {
  let restored = expression
  literals.forEach((literal, index) => {
    // Replacer function keeps `$` sequences in the literal verbatim
    restored = restored.replace(literalPlaceholder(index), () => literal)
  })
  return restored
}
