import type { z } from 'zod'
import { StyleError } from './StyleError.js'

export class ValidationError extends StyleError {
  constructor(
    public readonly field: string,
    public readonly value: unknown,
    public readonly constraint: string,
    context?: Record<string, unknown>
  ) {
    super(`Validation failed for ${field}: ${constraint}`, 'VALIDATION_ERROR', {
      ...context,
      field,
      value,
      constraint
    })
  }

  toUserMessage(): string {
    const valueStr = typeof this.value === 'string' ? `"${this.value}"` : JSON.stringify(this.value)

    return (
      `Invalid value for parameter '${this.field}'\n\n` +
      `Constraint: ${this.constraint}\n` +
      `Received: ${valueStr}\n\n` +
      `Please check the parameter documentation and provide a valid value.`
    )
  }

  getSuggestions(): string[] {
    const suggestions: string[] = []
    const fieldLower = this.field.toLowerCase()

    if (fieldLower === 'style' || fieldLower.includes('qml')) {
      suggestions.push('Pass the complete QML document text, starting with <!DOCTYPE qgis ...> or <qgis>')
    }

    if (fieldLower.startsWith('fields')) {
      suggestions.push('Each field needs a non-empty "name" and a "type" of boolean, integer64 or other')
      suggestions.push('List fields in the layer order so primary_key_field_index points at the right one')
    }

    if (fieldLower.includes('primary_key')) {
      suggestions.push('primary_key_field_index is a zero-based index into "fields"')
    }

    if (fieldLower.includes('provider')) {
      suggestions.push('Use the layer data provider key, e.g. "ogr" for file or database layers')
    }

    if (suggestions.length === 0) {
      suggestions.push(`Call qml_help for documentation on the parameter "${this.field}"`)
    }

    return suggestions
  }

  static fromZodError(error: z.ZodError, field: string = 'unknown'): ValidationError {
    const issues = error.issues || []
    const firstIssue = issues[0]

    if (firstIssue) {
      const path = firstIssue.path.map(String).join('.')
      const received = 'input' in firstIssue ? firstIssue.input : undefined
      return new ValidationError(path || field, received, firstIssue.message, { zodIssues: issues })
    }

    return new ValidationError(field, undefined, error.message || 'Validation failed')
  }
}
