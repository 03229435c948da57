export {
  booleanFieldExpression,
  type SubstitutionResult,
  substituteBooleanField,
  substitutePrimaryKey
} from './field-references.js'
export { literalPlaceholder, type MaskedExpression, maskLiterals, restoreLiterals } from './literal-mask.js'
export {
  attributeOf,
  elementsByTagName,
  parseQml,
  type QmlParseIssue,
  type QmlParseResult,
  serializeQml
} from './qml-document.js'
export {
  createRewriteContext,
  type PrimaryKeySkipReason,
  type RewriteContext,
  type RewriteContextResolution,
  resolveRewriteContext
} from './rewrite-context.js'
export {
  type RewriteResult,
  rewriteStyle,
  type StyleChange,
  type StyleChangeTarget,
  StyleExpressionRewriter,
  type StyleExpressionRewriterOptions
} from './style-rewriter.js'
