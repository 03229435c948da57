export type ResponseFormat = 'json' | 'markdown'

export interface MCPToolResponse {
  content: Array<{
    type: 'text'
    text: string
  }>
  structuredContent?: { [x: string]: unknown }
  isError?: boolean
  [key: string]: unknown
}
