import { READ_ONLY_ANNOTATIONS, type ToolContext, type ToolDefinition } from '../registry/types.js'
import {
  type RewriteStyleInput,
  type RewriteStyleOutput,
  RewriteStyleOutputSchema,
  RewriteStyleSchema
} from '../schemas/rewrite-style.js'
import { StyleExpressionRewriter } from '../services/qml/index.js'
import { defineStandardTool } from './factory/index.js'

const SAMPLE_STYLE =
  '<qgis><renderer-v2 type="RuleRenderer"><rules key="r"><rule filter="fid &gt; 10" key="r1"/></rules></renderer-v2></qgis>'

export async function rewriteStyle(
  ctx: ToolContext,
  params: RewriteStyleInput
): Promise<RewriteStyleOutput> {
  const rewriter = StyleExpressionRewriter.fromLayer(
    params.style,
    {
      fields: params.fields,
      providerKind: params.provider_kind,
      primaryKeyFieldIndex: params.primary_key_field_index
    },
    { logger: ctx.logger.child('style-rewriter') }
  )
  const { style, changed, changes } = rewriter.processWithReport()
  const { primaryKeyFieldName, boolFieldNames } = rewriter.rewriteContext

  return {
    changed,
    change_count: changes.length,
    changes: [...changes],
    primary_key_field: primaryKeyFieldName,
    boolean_fields: [...boolFieldNames],
    ...(params.include_style && { style })
  }
}

export function formatRewriteMarkdown(result: RewriteStyleOutput): string {
  const lines: string[] = []

  if (!result.changed) {
    lines.push('No changes: the style is already compatible.')
  } else {
    lines.push(`${result.change_count} attribute(s) rewritten:`)
    for (const change of result.changes) {
      lines.push(`- ${change.target}.${change.attribute}: \`${change.before}\` → \`${change.after}\``)
    }
  }

  lines.push('')
  lines.push(`Primary key: ${result.primary_key_field ?? 'not rewritten'}`)
  lines.push(
    `Boolean fields: ${result.boolean_fields.length > 0 ? result.boolean_fields.join(', ') : 'none'}`
  )

  if (result.style !== undefined) {
    lines.push('', '```xml', result.style, '```')
  }

  return lines.join('\n')
}

export const REWRITE_STYLE_TOOL = defineStandardTool({
  name: 'qml_rewrite_style',
  title: 'Rewrite QML Style',
  description:
    'Make a QGIS QML style renderable by the map server.\n' +
    'Boolean categories become integer, boolean label fields become if("F", true, false), ' +
    'primary key references become @id.\n' +
    'Params: style, fields, provider_kind, primary_key_field_index?, include_style?',
  category: 'styles',
  inputSchema: RewriteStyleSchema,
  outputSchema: RewriteStyleOutputSchema,
  annotations: READ_ONLY_ANNOTATIONS,
  execute: rewriteStyle,
  toMarkdown: formatRewriteMarkdown,
  docs: {
    overview:
      'Rewrites field references in a QML style for a map server that has no boolean type and ' +
      'identifies features by @id. Touches categorized renderer categories, rule filters, label ' +
      'expressions and data-defined property expressions. Quoted string literals are never ' +
      'changed. Returns the input unchanged when nothing needs rewriting.',
    examples: [
      {
        desc: 'Rewrite a rule filter on an integer64 primary key',
        input: {
          style: SAMPLE_STYLE,
          fields: [
            { name: 'fid', type: 'integer64' },
            { name: 'name', type: 'other' }
          ],
          provider_kind: 'ogr',
          primary_key_field_index: 0
        }
      },
      {
        desc: 'Report changes only',
        input: {
          style: SAMPLE_STYLE,
          fields: [{ name: 'is_open', type: 'boolean' }],
          provider_kind: 'postgres',
          include_style: false
        }
      }
    ],
    errors: [
      {
        error: 'changed is false although the style references the primary key',
        solution:
          'Primary key rewriting needs provider_kind "ogr" and a primary_key_field_index ' +
          'pointing at an integer64 field'
      },
      {
        error: 'changed is false for a style that should change',
        solution: 'Check that the style is well-formed XML; malformed documents are returned as is'
      },
      {
        error: 'Invalid value for parameter fields.N.type',
        solution: 'Use one of boolean, integer64, other'
      }
    ]
  }
}) satisfies ToolDefinition

export const STYLE_TOOLS: ReadonlyArray<ToolDefinition> = [REWRITE_STYLE_TOOL] as const
