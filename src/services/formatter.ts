import { CHARACTER_LIMIT, MAX_ERROR_LENGTH } from '../constants.js'
import type { MCPToolResponse, ResponseFormat } from '../types.js'

function normalizeForSerialization(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value
  }

  if (value instanceof Date) {
    return value.toISOString()
  }

  if (Array.isArray(value)) {
    return value.map(normalizeForSerialization)
  }

  if (typeof value === 'object') {
    const normalized: Record<string, unknown> = {}
    for (const [key, val] of Object.entries(value)) {
      if (val !== undefined) {
        normalized[key] = normalizeForSerialization(val)
      }
    }
    return normalized
  }

  return value
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function formatToolResponse<T>(data: T, format: ResponseFormat = 'json'): MCPToolResponse {
  const normalized = normalizeForSerialization(data)

  const text =
    format === 'markdown'
      ? truncateText(formatAsMarkdown(normalized), CHARACTER_LIMIT)
      : JSON.stringify(normalized, null, 2)

  return {
    content: [
      {
        type: 'text',
        text
      }
    ],
    ...(isRecord(normalized) && { structuredContent: normalized })
  }
}

export function formatErrorResponse(
  errorMessage: string,
  options?: {
    suggestions?: string[]
  }
): MCPToolResponse {
  let displayMessage = truncateText(errorMessage, MAX_ERROR_LENGTH)

  if (options?.suggestions && options.suggestions.length > 0) {
    displayMessage += `\n\n**Suggestions:**\n${options.suggestions.map((s) => `- ${s}`).join('\n')}`
  }

  // No structuredContent: the SDK would validate it against the output schema
  return {
    content: [
      {
        type: 'text',
        text: displayMessage
      }
    ],
    isError: true
  }
}

export function truncateText(text: string, limit: number): string {
  if (text.length <= limit) {
    return text
  }
  return `${text.substring(0, limit)}\n\n[Truncated - ${text.length - limit} more characters]`
}

export function formatAsMarkdown(data: unknown): string {
  if (data === null || data === undefined) {
    return 'No data'
  }

  if (Array.isArray(data)) {
    return formatArrayAsMarkdown(data)
  }

  if (isRecord(data)) {
    return formatObjectAsMarkdown(data)
  }

  return String(data)
}

function formatArrayAsMarkdown(items: unknown[]): string {
  if (items.length === 0) {
    return 'No items'
  }

  return items.map((item, index) => `${index + 1}. ${formatItemAsMarkdown(item)}`).join('\n')
}

function formatItemAsMarkdown(item: unknown): string {
  if (isRecord(item)) {
    return Object.entries(item)
      .map(([key, value]) => `${key}: ${formatValue(value)}`)
      .join(', ')
  }
  return formatValue(item)
}

function formatObjectAsMarkdown(obj: Record<string, unknown>): string {
  return Object.entries(obj)
    .map(([key, value]) => {
      if (Array.isArray(value)) {
        return `${key}:\n${formatArrayAsMarkdown(value)}`
      }
      if (typeof value === 'string' && value.includes('\n')) {
        return `${key}:\n\`\`\`\n${value}\n\`\`\``
      }
      return `${key}: ${formatValue(value)}`
    })
    .join('\n')
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null'
  }

  if (typeof value === 'string') {
    return value
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }

  if (Array.isArray(value)) {
    if (value.length === 0) {
      return '[]'
    }
    if (value.length <= 3) {
      return `[${value.map((v) => formatValue(v)).join(', ')}]`
    }
    return `[${value
      .slice(0, 3)
      .map((v) => formatValue(v))
      .join(', ')}, ... (${value.length} items)]`
  }

  return JSON.stringify(value)
}
