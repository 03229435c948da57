import { describe, expect, it } from 'vitest'
import { ValidationError } from '../../../../src/errors/index.js'
import type { LayerMetadata } from '../../../../src/schemas/field-metadata.js'
import {
  type RewriteContext,
  rewriteStyle,
  StyleExpressionRewriter
} from '../../../../src/services/qml/index.js'
import { Logger, LogLevel } from '../../../../src/utils/logger.js'
import { StyleBuilder } from '../../../builders/style-builder.js'
import { attributeValues, optionValues } from '../../../helpers/qml.js'

const PK_ONLY: RewriteContext = { boolFieldNames: [], primaryKeyFieldName: 'gid' }
const NOTHING: RewriteContext = { boolFieldNames: [] }

function rewrite(style: string, context: RewriteContext) {
  return new StyleExpressionRewriter(style, context).processWithReport()
}

describe('StyleExpressionRewriter', () => {
  describe('unchanged documents', () => {
    it('returns the input when no field needs rewriting', () => {
      const style = new StyleBuilder()
        .ruleRenderer([{ filter: "name = 'x'" }])
        .label('name')
        .dataDefinedExpression('Size', 'size * 2')
        .build()

      const result = rewrite(style, NOTHING)

      expect(result.style).toBe(style)
      expect(result.changed).toBe(false)
      expect(result.changes).toEqual([])
    })

    it('does not reformat a document when nothing matched', () => {
      const style =
        "<qgis><renderer-v2 type='RuleRenderer'><rules key='r'>" +
        "<rule   filter='name = 1' key='a'/></rules></renderer-v2></qgis>"

      expect(new StyleExpressionRewriter(style, PK_ONLY).process()).toBe(style)
    })

    it.each([
      ['mismatched end tag', '<qgis><renderer-v2 type="categorizedSymbol"></renderer></qgis>'],
      ['empty text', ''],
      ['plain text', 'not a style']
    ])('returns malformed input unchanged (%s)', (_case, style) => {
      const result = rewrite(style, PK_ONLY)

      expect(result.style).toBe(style)
      expect(result.changed).toBe(false)
    })

    it('returns a malformed boolean category document unchanged', () => {
      const style =
        '<qgis><renderer-v2 type="categorizedSymbol"><categories>' +
        '<category type="bool" value="true"/></categories></renderer><qgis>'

      expect(new StyleExpressionRewriter(style, NOTHING).process()).toBe(style)
    })

    it('rejects a document that is not a string', () => {
      expect(() => new StyleExpressionRewriter(null as unknown as string, NOTHING)).toThrow(
        ValidationError
      )
    })
  })

  describe('categorized renderer', () => {
    it('turns boolean categories into integer categories', () => {
      const style = new StyleBuilder()
        .categorized('is_active', [
          { value: 'True' },
          { value: 'false' },
          { value: 'anything_else' },
          { value: 'x', type: 'string' }
        ])
        .build()

      const result = rewrite(style, NOTHING)

      expect(result.changed).toBe(true)
      expect(attributeValues(result.style, 'category', 'type')).toEqual([
        'integer',
        'integer',
        'integer',
        'string'
      ])
      expect(attributeValues(result.style, 'category', 'value')).toEqual([
        '1',
        '0',
        'anything_else',
        'x'
      ])
      expect(result.changes).toEqual([
        { target: 'category', attribute: 'type', before: 'bool', after: 'integer' },
        { target: 'category', attribute: 'value', before: 'True', after: '1' },
        { target: 'category', attribute: 'type', before: 'bool', after: 'integer' },
        { target: 'category', attribute: 'value', before: 'false', after: '0' },
        { target: 'category', attribute: 'type', before: 'bool', after: 'integer' }
      ])
    })

    it('keeps the rest of the document', () => {
      const style = new StyleBuilder().categorized('is_active', [{ value: 'true' }]).build()

      const result = rewrite(style, NOTHING)

      expect(attributeValues(result.style, 'qgis', 'version')).toEqual(['3.34.0'])
      expect(attributeValues(result.style, 'renderer-v2', 'attr')).toEqual(['is_active'])
      expect(attributeValues(result.style, 'category', 'label')).toEqual(['true'])
    })
  })

  describe('rule-based renderer', () => {
    it('rewrites primary key references in rule filters', () => {
      const style = new StyleBuilder()
        .ruleRenderer([
          { filter: 'gid = 5' },
          { filter: '' },
          {},
          { filter: `"name" = 'gid'` },
          { filter: '"gid" IN (1, 2)' }
        ])
        .build()

      const result = rewrite(style, PK_ONLY)

      expect(attributeValues(result.style, 'rule', 'filter')).toEqual([
        '@id = 5',
        '',
        '',
        `"name" = 'gid'`,
        '@id IN (1, 2)'
      ])
      expect(result.changes).toEqual([
        { target: 'rule', attribute: 'filter', before: 'gid = 5', after: '@id = 5' },
        { target: 'rule', attribute: 'filter', before: '"gid" IN (1, 2)', after: '@id IN (1, 2)' }
      ])
    })

    it('rewrites nested rules', () => {
      const style =
        '<qgis><renderer-v2 type="RuleRenderer"><rules key="r">' +
        '<rule key="a" filter="gid &lt; 10"><rule key="b" filter="gid = 3"/></rule>' +
        '</rules></renderer-v2></qgis>'

      const result = rewrite(style, PK_ONLY)

      expect(attributeValues(result.style, 'rule', 'filter')).toEqual(['@id < 10', '@id = 3'])
    })

    it('leaves filters alone without a primary key', () => {
      const style = new StyleBuilder().ruleRenderer([{ filter: 'is_open' }]).build()

      const result = rewrite(style, { boolFieldNames: ['is_open'] })

      expect(result.style).toBe(style)
    })
  })

  describe('labels', () => {
    function labelled(fieldName: string, isExpression = false): string {
      return new StyleBuilder().singleSymbol().label(fieldName, isExpression).build()
    }

    it('replaces the primary key field and marks the label as an expression', () => {
      const result = rewrite(labelled('gid'), PK_ONLY)

      expect(attributeValues(result.style, 'text-style', 'fieldName')).toEqual(['@id'])
      expect(attributeValues(result.style, 'text-style', 'isExpression')).toEqual(['1'])
      expect(result.changes).toEqual([
        { target: 'label', attribute: 'isExpression', before: '0', after: '1' },
        { target: 'label', attribute: 'fieldName', before: 'gid', after: '@id' }
      ])
    })

    it('wraps boolean fields', () => {
      const result = rewrite(labelled('is_active = true'), { boolFieldNames: ['is_active'] })

      expect(attributeValues(result.style, 'text-style', 'fieldName')).toEqual([
        'if("is_active", true, false) = true'
      ])
      expect(attributeValues(result.style, 'text-style', 'isExpression')).toEqual(['1'])
    })

    it('does not rewrite field names inside literals', () => {
      const result = rewrite(labelled(`"status" = 'F'`), { boolFieldNames: ['status', 'F'] })

      expect(attributeValues(result.style, 'text-style', 'fieldName')).toEqual([
        `if("status", true, false) = 'F'`
      ])
    })

    it('wraps several boolean fields in one expression', () => {
      const result = rewrite(labelled(`concat(is_open, ' / ', "has_wifi")`), {
        boolFieldNames: ['is_open', 'has_wifi']
      })

      expect(attributeValues(result.style, 'text-style', 'fieldName')).toEqual([
        `concat(if("is_open", true, false), ' / ', if("has_wifi", true, false))`
      ])
    })

    it('writes restored literals back', () => {
      const result = rewrite(labelled(`gid || ' (gid)'`), PK_ONLY)

      expect(attributeValues(result.style, 'text-style', 'fieldName')).toEqual([
        `@id || ' (gid)'`
      ])
    })

    it('applies primary key and boolean rewrites together', () => {
      const result = rewrite(labelled(`gid || ' ' || is_open`), {
        boolFieldNames: ['is_open'],
        primaryKeyFieldName: 'gid'
      })

      expect(attributeValues(result.style, 'text-style', 'fieldName')).toEqual([
        `@id || ' ' || if("is_open", true, false)`
      ])
    })

    it('only records the field name when the label is already an expression', () => {
      const result = rewrite(labelled('"gid" + 1', true), PK_ONLY)

      expect(result.changes).toEqual([
        { target: 'label', attribute: 'fieldName', before: '"gid" + 1', after: '@id + 1' }
      ])
    })

    it('stays idempotent with boolean fields named true and false', () => {
      const context: RewriteContext = { boolFieldNames: ['flag', 'true', 'false'] }

      const first = rewrite(labelled('flag = true'), context)
      const second = rewrite(first.style, context)

      expect(attributeValues(first.style, 'text-style', 'fieldName')).toEqual([
        'if("flag", true, false) = if("true", true, false)'
      ])
      expect(second.changed).toBe(false)
      expect(second.style).toBe(first.style)
    })

    it('skips labels that already use @id', () => {
      const style = labelled('@id')

      expect(rewrite(style, { boolFieldNames: [], primaryKeyFieldName: 'id' }).style).toBe(style)
    })

    it('leaves labels alone in a document without a renderer', () => {
      const style = new StyleBuilder().label('is_open').build()

      expect(rewrite(style, { boolFieldNames: ['is_open'] }).style).toBe(style)
    })
  })

  describe('data-defined properties', () => {
    it('rewrites primary key references in expression options only', () => {
      const style = new StyleBuilder()
        .singleSymbol()
        .dataDefinedExpression('Size', 'gid * 2')
        .dataDefinedExpression('Color', `"gid" = 'gid'`)
        .build()

      const result = rewrite(style, PK_ONLY)

      expect(optionValues(result.style, 'expression')).toEqual(['@id * 2', `@id = 'gid'`])
      expect(optionValues(result.style, 'field')).toEqual(['gid * 2', `"gid" = 'gid'`])
      expect(result.changes.map((change) => change.target)).toEqual(['property', 'property'])
    })

    it('leaves expressions alone without a primary key', () => {
      const style = new StyleBuilder()
        .singleSymbol()
        .dataDefinedExpression('Size', 'is_open')
        .build()

      expect(rewrite(style, { boolFieldNames: ['is_open'] }).style).toBe(style)
    })
  })

  describe('whole documents', () => {
    const context: RewriteContext = { boolFieldNames: ['is_open'], primaryKeyFieldName: 'gid' }

    function fullStyle(): string {
      return new StyleBuilder()
        .categorized('is_open', [{ value: 'true' }])
        .ruleRenderer([{ filter: 'gid = 1' }])
        .label('is_open')
        .dataDefinedExpression('Size', 'gid + 1')
        .build()
    }

    it('processes every renderer and rewrites labels once', () => {
      const result = rewrite(fullStyle(), context)

      expect(attributeValues(result.style, 'category', 'type')).toEqual(['integer'])
      expect(attributeValues(result.style, 'rule', 'filter')).toEqual(['@id = 1'])
      expect(attributeValues(result.style, 'text-style', 'fieldName')).toEqual([
        'if("is_open", true, false)'
      ])
      expect(optionValues(result.style, 'expression')).toEqual(['@id + 1'])
      expect(result.changes.map((change) => `${change.target}.${change.attribute}`)).toEqual([
        'category.type',
        'category.value',
        'label.isExpression',
        'label.fieldName',
        'property.value',
        'rule.filter'
      ])
    })

    it('is idempotent', () => {
      const first = new StyleExpressionRewriter(fullStyle(), context).process()
      const second = new StyleExpressionRewriter(first, context).processWithReport()

      expect(second.style).toBe(first)
      expect(second.changed).toBe(false)
    })

    it('gives the same result on repeated process calls', () => {
      const rewriter = new StyleExpressionRewriter(fullStyle(), context)

      expect(rewriter.process()).toBe(rewriter.process())
    })
  })

  describe('fromLayer', () => {
    const metadata: LayerMetadata = {
      fields: [
        { name: 'gid', type: 'integer64' },
        { name: 'is_open', type: 'boolean' }
      ],
      providerKind: 'ogr',
      primaryKeyFieldIndex: 0
    }

    it('derives the rewrite context from layer metadata', () => {
      const rewriter = StyleExpressionRewriter.fromLayer('<qgis/>', metadata)

      expect(rewriter.rewriteContext).toEqual({
        boolFieldNames: ['is_open'],
        primaryKeyFieldName: 'gid'
      })
    })

    it('logs why primary key rewriting is disabled', () => {
      const lines: string[] = []
      const logger = new Logger({ minLevel: LogLevel.DEBUG, sink: (line) => lines.push(line) })

      StyleExpressionRewriter.fromLayer('<qgis/>', { ...metadata, providerKind: 'wfs' }, { logger })

      expect(lines).toHaveLength(1)
      const entry = JSON.parse(lines[0] ?? '{}')
      expect(entry.message).toBe('Primary key rewriting disabled')
      expect(entry.context.reason).toBe('provider_not_supported')
    })

    it('logs malformed documents at debug level', () => {
      const lines: string[] = []
      const logger = new Logger({ minLevel: LogLevel.DEBUG, sink: (line) => lines.push(line) })

      new StyleExpressionRewriter('', NOTHING, { logger }).process()

      expect(JSON.parse(lines[0] ?? '{}').message).toBe(
        'Style is not well-formed XML, leaving it unchanged'
      )
    })

    it('rewrites through the one-shot helper', () => {
      const style = new StyleBuilder().ruleRenderer([{ filter: 'gid > 3' }]).build()

      expect(attributeValues(rewriteStyle(style, metadata), 'rule', 'filter')).toEqual(['@id > 3'])
    })
  })
})
