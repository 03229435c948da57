/**
 * Library entry point: the style rewriter without the MCP server.
 */

export { ID_EXPRESSION, PRIMARY_KEY_PROVIDERS } from './constants.js'
export { isStyleError, StyleError, ValidationError } from './errors/index.js'
export {
  type FieldDescriptor,
  FieldDescriptorSchema,
  type FieldType,
  type LayerMetadata,
  LayerMetadataSchema
} from './schemas/field-metadata.js'
export * from './services/qml/index.js'
export { createStyleMcpServer, type ServerConfig, type ServerInstance } from './server.js'
export { Logger, LogLevel } from './utils/logger.js'
