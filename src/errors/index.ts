/**
 * Error hierarchy for the style server.
 *
 * Malformed QML and inconsistent layer metadata are not errors: the rewriter
 * returns the style untouched. These classes cover invalid requests and
 * contract violations.
 */

export { isStyleError, StyleError } from './StyleError.js'
export { ValidationError } from './ValidationError.js'
