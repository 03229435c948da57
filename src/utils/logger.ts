// Structured JSON logging on stderr; stdout is reserved for the MCP transport

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug'
}

export type LogContext = Record<string, unknown>

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  component?: string
  context?: LogContext
  error?: {
    name: string
    message: string
    stack?: string
  }
}

export interface LoggerConfig {
  minLevel: LogLevel
  includeStackTraces: boolean
  prettyPrint: boolean
  enableDebug?: boolean
  /** Tag written on every entry, e.g. the service that produced it */
  component?: string
  /** Receives each formatted line; defaults to console.error */
  sink?: (line: string) => void
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toLowerCase()) {
    case 'error':
      return LogLevel.ERROR
    case 'warn':
      return LogLevel.WARN
    case 'info':
      return LogLevel.INFO
    case 'debug':
      return LogLevel.DEBUG
    default:
      return undefined
  }
}

export class Logger {
  private config: LoggerConfig

  constructor(config: Partial<LoggerConfig> = {}) {
    const minLevel =
      config.enableDebug === true ? LogLevel.DEBUG : (config.minLevel ?? LogLevel.INFO)

    this.config = {
      minLevel,
      includeStackTraces: config.includeStackTraces ?? true,
      prettyPrint: config.prettyPrint ?? false,
      enableDebug: config.enableDebug,
      component: config.component,
      sink: config.sink
    }
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.log(LogLevel.ERROR, message, context, error)
  }

  warn(message: string, context?: LogContext, error?: Error): void {
    this.log(LogLevel.WARN, message, context, error)
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context)
  }

  debug(message: string, context?: LogContext, error?: Error): void {
    this.log(LogLevel.DEBUG, message, context, error)
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.config.minLevel]
  }

  /**
   * Logger sharing this one's settings, tagging entries with `component`.
   */
  child(component: string): Logger {
    return new Logger({ ...this.config, component })
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.isLevelEnabled(level)) {
      return
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message
    }

    if (this.config.component) {
      entry.component = this.config.component
    }

    if (context && Object.keys(context).length > 0) {
      entry.context = context
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message
      }

      if (this.config.includeStackTraces && error.stack) {
        entry.error.stack = error.stack
      }
    }

    const output = this.config.prettyPrint ? JSON.stringify(entry, null, 2) : JSON.stringify(entry)

    if (this.config.sink) {
      this.config.sink(output)
    } else {
      console.error(output)
    }
  }

  setConfig(config: Partial<LoggerConfig>): void {
    this.config = {
      ...this.config,
      ...config
    }
  }

  getConfig(): LoggerConfig {
    return { ...this.config }
  }
}
