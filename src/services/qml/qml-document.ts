/**
 * Thin DOM layer over @xmldom/xmldom for QML style documents.
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom'
import type { Logger } from '../../utils/logger.js'

export interface QmlParseIssue {
  readonly level: 'warning' | 'error' | 'fatalError'
  readonly message: string
}

export interface QmlParseResult {
  /** Undefined when the text is not well-formed XML */
  readonly document?: Document
  readonly issues: readonly QmlParseIssue[]
}

function describe(message: unknown): string {
  return message instanceof Error ? message.message : String(message)
}

/**
 * Parses QML text. Errors are collected rather than thrown; a document with
 * any error or fatal error is discarded so a half-read style is never
 * rewritten and serialized.
 */
export function parseQml(text: string): QmlParseResult {
  const issues: QmlParseIssue[] = []
  const parser = new DOMParser({
    errorHandler: {
      warning: (message: unknown) => issues.push({ level: 'warning', message: describe(message) }),
      error: (message: unknown) => issues.push({ level: 'error', message: describe(message) }),
      fatalError: (message: unknown) =>
        issues.push({ level: 'fatalError', message: describe(message) })
    }
  })

  let document: Document | undefined
  try {
    document = parser.parseFromString(text, 'text/xml')
  } catch (error) {
    issues.push({ level: 'fatalError', message: describe(error) })
    return { issues }
  }

  const failed = issues.some((issue) => issue.level !== 'warning')
  if (failed || !document || !document.documentElement) {
    return { issues }
  }
  return { document, issues }
}

/**
 * Same as parseQml, reporting problems on the given logger at debug level.
 */
export function parseQmlLogged(text: string, logger: Logger): Document | undefined {
  const { document, issues } = parseQml(text)
  if (!document) {
    logger.debug('Style is not well-formed XML, leaving it unchanged', {
      issues: issues.map((issue) => `${issue.level}: ${issue.message}`)
    })
  } else if (issues.length > 0) {
    logger.debug('Style parsed with warnings', { warnings: issues.length })
  }
  return document
}

export function serializeQml(document: Document): string {
  return new XMLSerializer().serializeToString(document)
}

/**
 * Descendants of `root` with the given tag name, in document order.
 */
export function elementsByTagName(root: Document | Element, tagName: string): Element[] {
  const list = root.getElementsByTagName(tagName)
  const elements: Element[] = []
  for (let i = 0; i < list.length; i++) {
    const element = list.item(i)
    if (element) {
      elements.push(element)
    }
  }
  return elements
}

/**
 * Attribute value, or '' when the attribute is missing.
 */
export function attributeOf(element: Element, name: string): string {
  return element.getAttribute(name) ?? ''
}
