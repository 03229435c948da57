export { defineStandardTool, handleToolError } from './define-tool.js'
export type { StandardToolConfig, ToolInputSchema, ToolMetadata } from './types.js'
