import { Logger, LogLevel, parseLogLevel } from './logger.js'

// Priority: QML_STYLE_DEBUG_MODE > QML_STYLE_LOG_LEVEL > NODE_ENV > INFO
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.QML_STYLE_DEBUG_MODE === 'true') {
    return LogLevel.DEBUG
  }

  return (
    parseLogLevel(env.QML_STYLE_LOG_LEVEL) ??
    (env.NODE_ENV === 'development' ? LogLevel.DEBUG : LogLevel.INFO)
  )
}

export const sharedLogger = new Logger({
  minLevel: resolveLogLevel(),
  includeStackTraces: true,
  prettyPrint:
    process.env.QML_STYLE_DEBUG_MODE === 'true' || process.env.QML_STYLE_LOG_PRETTY === 'true'
})
