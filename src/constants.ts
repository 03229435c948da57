/**
 * Constants for the QML style MCP server
 */

// ============================================================================
// Response Size Limits
// ============================================================================

/**
 * Maximum text response size (~6,000 tokens at 4 chars/token)
 */
export const CHARACTER_LIMIT = 25000 satisfies number

export const MAX_ERROR_LENGTH = 2000 satisfies number

// ============================================================================
// Input Limits
// ============================================================================

export const MAX_STYLE_LENGTH = 5_000_000 satisfies number
export const MAX_FIELDS = 10_000 satisfies number

// ============================================================================
// Rewrite Rules
// ============================================================================

/**
 * Providers whose primary key is a real table column (files and databases).
 * Only these have their primary key references rewritten to `@id`.
 */
export const PRIMARY_KEY_PROVIDERS: ReadonlyArray<string> = ['ogr']

/** Feature id reference understood by the map server */
export const ID_EXPRESSION = '@id' satisfies string

/** QML element and attribute names touched by the rewriter */
export const QML = {
  RENDERER: 'renderer-v2',
  CATEGORY: 'category',
  RULES: 'rules',
  RULE: 'rule',
  TEXT_STYLE: 'text-style',
  DATA_DEFINED_PROPERTIES: 'data_defined_properties',
  OPTION: 'Option'
} as const

export const RENDERER_TYPES = {
  CATEGORIZED: 'categorizedSymbol',
  RULE_BASED: 'RuleRenderer'
} as const
