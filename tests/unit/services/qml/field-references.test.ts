import { describe, expect, it } from 'vitest'
import {
  booleanFieldExpression,
  substituteBooleanField,
  substitutePrimaryKey
} from '../../../../src/services/qml/field-references.js'

describe('substitutePrimaryKey', () => {
  it('replaces bare and quoted references', () => {
    const result = substitutePrimaryKey('gid > 10 AND "gid" < 100', 'gid')

    expect(result.expression).toBe('@id > 10 AND @id < 100')
    expect(result.count).toBe(2)
    expect(result.changed).toBe(true)
  })

  it('does not match the name inside longer identifiers', () => {
    const result = substitutePrimaryKey('gid = 1 OR idx = 2 OR my_id = 3 OR id2 = 4', 'id')

    expect(result.expression).toBe('gid = 1 OR idx = 2 OR my_id = 3 OR id2 = 4')
    expect(result.changed).toBe(false)
  })

  it('replaces standalone references of a short name', () => {
    const result = substitutePrimaryKey('id = 1 OR "id" = 2 OR (id)', 'id')

    expect(result.expression).toBe('@id = 1 OR @id = 2 OR (@id)')
    expect(result.count).toBe(3)
  })

  it('leaves expression variables alone', () => {
    const result = substitutePrimaryKey('@id = 5', 'id')

    expect(result.expression).toBe('@id = 5')
    expect(result.changed).toBe(false)
  })

  it('treats non-latin letters as part of the name', () => {
    const result = substitutePrimaryKey('"код" + код1 + код', 'код')

    expect(result.expression).toBe('@id + код1 + @id')
    expect(result.count).toBe(2)
  })

  it('escapes regular expression characters in the name', () => {
    const result = substitutePrimaryKey('a.b = 1 AND axb = 2', 'a.b')

    expect(result.expression).toBe('@id = 1 AND axb = 2')
  })

  it('matches quoted names containing spaces', () => {
    const result = substitutePrimaryKey('"feature id" > 0', 'feature id')

    expect(result.expression).toBe('@id > 0')
  })
})

describe('substituteBooleanField', () => {
  it('wraps a bare reference', () => {
    const result = substituteBooleanField('is_active = true', 'is_active')

    expect(result.expression).toBe('if("is_active", true, false) = true')
    expect(result.count).toBe(1)
    expect(result.changed).toBe(true)
  })

  it('wraps quoted and bare references independently', () => {
    const result = substituteBooleanField('is_active OR "is_active"', 'is_active')

    expect(result.expression).toBe('if("is_active", true, false) OR if("is_active", true, false)')
    expect(result.count).toBe(2)
  })

  it('does not wrap an already wrapped reference', () => {
    const result = substituteBooleanField('if("is_active", true, false) = true', 'is_active')

    expect(result.expression).toBe('if("is_active", true, false) = true')
    expect(result.changed).toBe(false)
  })

  it('accepts other spacing in the wrapped form', () => {
    const result = substituteBooleanField('if( "is_active" ,true,false)', 'is_active')

    expect(result.changed).toBe(false)
  })

  it('leaves the wrappers of other fields alone for a field named true', () => {
    const result = substituteBooleanField('if("flag", true, false) = true', 'true')

    expect(result.expression).toBe('if("flag", true, false) = if("true", true, false)')
    expect(result.count).toBe(1)
  })

  it('does not touch longer identifiers', () => {
    const result = substituteBooleanField('is_active_flag', 'is_active')

    expect(result.expression).toBe('is_active_flag')
    expect(result.changed).toBe(false)
  })

  it('inserts names with replacement patterns verbatim', () => {
    const result = substituteBooleanField('"a$&b"', 'a$&b')

    expect(result.expression).toBe('if("a$&b", true, false)')
  })
})

describe('booleanFieldExpression', () => {
  it('builds the conditional for a field', () => {
    expect(booleanFieldExpression('has_wifi')).toBe('if("has_wifi", true, false)')
  })
})
