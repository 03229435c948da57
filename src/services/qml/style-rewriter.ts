/**
 * Rewrites field references in a QML style so the map server can render it.
 *
 * The server has no boolean field type and identifies features by `@id`
 * rather than by the source primary key. The rewriter therefore:
 * - turns boolean categories into integer categories (`true` → `1`, `false` → `0`)
 * - replaces primary key references in rule filters, label expressions and
 *   data-defined property expressions with `@id`
 * - wraps boolean field references in label expressions as `if("F", true, false)`
 *
 * String literals are masked during substitution. The original text is
 * returned untouched unless at least one attribute actually changed.
 */

import { ID_EXPRESSION, QML, RENDERER_TYPES } from '../../constants.js'
import { ValidationError } from '../../errors/index.js'
import type { LayerMetadata } from '../../schemas/field-metadata.js'
import type { Logger } from '../../utils/logger.js'
import { sharedLogger } from '../../utils/shared-logger.js'
import { substituteBooleanField, substitutePrimaryKey } from './field-references.js'
import { maskLiterals, restoreLiterals } from './literal-mask.js'
import { attributeOf, elementsByTagName, parseQmlLogged, serializeQml } from './qml-document.js'
import { type RewriteContext, resolveRewriteContext } from './rewrite-context.js'

export type StyleChangeTarget = 'category' | 'rule' | 'label' | 'property'

export interface StyleChange {
  readonly target: StyleChangeTarget
  readonly attribute: string
  readonly before: string
  readonly after: string
}

export interface RewriteResult {
  /** Rewritten style, or the input text byte-for-byte when nothing changed */
  readonly style: string
  readonly changed: boolean
  readonly changes: readonly StyleChange[]
}

export interface StyleExpressionRewriterOptions {
  logger?: Logger
}

const BOOLEAN_CATEGORY_VALUES: Readonly<Record<string, string>> = {
  true: '1',
  false: '0'
}

export class StyleExpressionRewriter {
  private readonly logger: Logger

  constructor(
    private readonly styleText: string,
    private readonly context: RewriteContext,
    options: StyleExpressionRewriterOptions = {}
  ) {
    if (typeof styleText !== 'string') {
      throw new ValidationError('style', styleText, 'Style document must be a string')
    }
    this.logger = options.logger ?? sharedLogger.child('style-rewriter')
  }

  /**
   * Builds a rewriter from layer metadata. Primary key rewriting is switched
   * off when the provider, the key index or the key type do not qualify.
   */
  static fromLayer(
    styleText: string,
    metadata: LayerMetadata,
    options: StyleExpressionRewriterOptions = {}
  ): StyleExpressionRewriter {
    const { context, primaryKeySkipReason } = resolveRewriteContext(metadata)
    const rewriter = new StyleExpressionRewriter(styleText, context, options)
    if (primaryKeySkipReason) {
      rewriter.logger.debug('Primary key rewriting disabled', {
        reason: primaryKeySkipReason,
        providerKind: metadata.providerKind,
        primaryKeyFieldIndex: metadata.primaryKeyFieldIndex
      })
    }
    return rewriter
  }

  get rewriteContext(): RewriteContext {
    return this.context
  }

  process(): string {
    return this.processWithReport().style
  }

  processWithReport(): RewriteResult {
    const document = parseQmlLogged(this.styleText, this.logger)
    if (!document) {
      return { style: this.styleText, changed: false, changes: [] }
    }

    const changes: StyleChange[] = []
    const renderers = elementsByTagName(document, QML.RENDERER)

    for (const renderer of renderers) {
      switch (attributeOf(renderer, 'type')) {
        case RENDERER_TYPES.CATEGORIZED:
          this.processCategories(renderer, changes)
          break
        case RENDERER_TYPES.RULE_BASED:
          this.processRules(renderer, changes)
          break
      }

      this.processLabels(document, changes)
      this.processDataDefinedProperties(document, changes)
    }

    if (changes.length === 0) {
      return { style: this.styleText, changed: false, changes }
    }

    this.logger.debug('Style rewritten', {
      renderers: renderers.length,
      changes: changes.length
    })
    return { style: serializeQml(document), changed: true, changes }
  }

  private processCategories(renderer: Element, changes: StyleChange[]): void {
    for (const category of elementsByTagName(renderer, QML.CATEGORY)) {
      if (attributeOf(category, 'type') !== 'bool') {
        continue
      }

      setAttribute(category, 'category', 'type', 'integer', changes)

      const value = attributeOf(category, 'value')
      const mapped = BOOLEAN_CATEGORY_VALUES[value.toLowerCase()]
      if (mapped !== undefined) {
        setAttribute(category, 'category', 'value', mapped, changes)
      }
    }
  }

  private processRules(renderer: Element, changes: StyleChange[]): void {
    const primaryKey = this.context.primaryKeyFieldName
    const [rules] = elementsByTagName(renderer, QML.RULES)
    if (!rules || primaryKey === undefined) {
      return
    }

    for (const rule of elementsByTagName(rules, QML.RULE)) {
      const filter = attributeOf(rule, 'filter')
      if (!filter) {
        continue
      }

      const masked = maskLiterals(filter)
      const substituted = substitutePrimaryKey(masked.expression, primaryKey)
      if (substituted.changed) {
        setAttribute(
          rule,
          'rule',
          'filter',
          restoreLiterals(substituted.expression, masked.literals),
          changes
        )
      }
    }
  }

  private processLabels(document: Document, changes: StyleChange[]): void {
    const primaryKey = this.context.primaryKeyFieldName

    for (const textStyle of elementsByTagName(document, QML.TEXT_STYLE)) {
      if (!textStyle.hasAttribute('fieldName')) {
        continue
      }

      const labelExpression = attributeOf(textStyle, 'fieldName')
      if (labelExpression === ID_EXPRESSION) {
        continue
      }

      const masked = maskLiterals(labelExpression)
      let expression = masked.expression
      let changed = false

      // Primary key first, then boolean fields in layer order
      if (primaryKey !== undefined) {
        const substituted = substitutePrimaryKey(expression, primaryKey)
        expression = substituted.expression
        changed = substituted.changed
      }

      for (const fieldName of this.context.boolFieldNames) {
        const substituted = substituteBooleanField(expression, fieldName)
        expression = substituted.expression
        changed = changed || substituted.changed
      }

      if (changed) {
        setAttribute(textStyle, 'label', 'isExpression', '1', changes)
        setAttribute(
          textStyle,
          'label',
          'fieldName',
          restoreLiterals(expression, masked.literals),
          changes
        )
      }
    }
  }

  private processDataDefinedProperties(document: Document, changes: StyleChange[]): void {
    const primaryKey = this.context.primaryKeyFieldName
    if (primaryKey === undefined) {
      return
    }

    for (const properties of elementsByTagName(document, QML.DATA_DEFINED_PROPERTIES)) {
      for (const option of elementsByTagName(properties, QML.OPTION)) {
        if (attributeOf(option, 'name') !== 'expression') {
          continue
        }

        const masked = maskLiterals(attributeOf(option, 'value'))
        const substituted = substitutePrimaryKey(masked.expression, primaryKey)
        if (substituted.changed) {
          setAttribute(
            option,
            'property',
            'value',
            restoreLiterals(substituted.expression, masked.literals),
            changes
          )
        }
      }
    }
  }
}

function setAttribute(
  element: Element,
  target: StyleChangeTarget,
  attribute: string,
  value: string,
  changes: StyleChange[]
): void {
  const before = attributeOf(element, attribute)
  if (before === value && element.hasAttribute(attribute)) {
    return
  }
  element.setAttribute(attribute, value)
  changes.push({ target, attribute, before, after: value })
}

/**
 * One-shot helper: rewrite `styleText` for a layer and return the new text.
 */
export function rewriteStyle(
  styleText: string,
  metadata: LayerMetadata,
  options?: StyleExpressionRewriterOptions
): string {
  return StyleExpressionRewriter.fromLayer(styleText, metadata, options).process()
}
