export const TOOL_NAMES = ['qml_rewrite_style', 'qml_help'] as const

export type ToolName = (typeof TOOL_NAMES)[number]
