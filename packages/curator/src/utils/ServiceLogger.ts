/**
 * ServiceLogger - Centralized logging for pipeline stages and collaborators
 *
 * Replaces bare console calls throughout services to:
 * - Prefix every line with the service name
 * - Forward log lines and audit entries to an optional sink
 * - Keep debug output off unless asked for
 */

type LogLevel = 'debug' | 'error' | 'info' | 'warn'

export type LogData = Record<string, unknown>

export interface LogLine {
  data?: LogData
  level: LogLevel
  message: string
}

export type LogEvent = {data: LogLine; type: 'log'} | {data: unknown; type: 'audit'}

/**
 * Receives every log line and audit entry, e.g. a file writer or a test collector
 */
export interface LogSink {
  write(event: LogEvent): Promise<void> | void
}

export interface ServiceLoggerOptions {
  debug?: boolean
  sink?: LogSink
}

export class ServiceLogger {
  private debugEnabled: boolean
  private serviceName: string
  private sink?: LogSink

  constructor(serviceName: string, options: ServiceLoggerOptions = {}) {
    this.serviceName = serviceName
    this.sink = options.sink
    this.debugEnabled = options.debug ?? false
  }

  /**
   * Emit a structured audit record through the sink
   */
  audit(entry: unknown): void {
    this.emit({data: entry, type: 'audit'})
  }

  /**
   * Create a child logger with a sub-context
   */
  child(subContext: string): ServiceLogger {
    return new ServiceLogger(`${this.serviceName}:${subContext}`, {debug: this.debugEnabled, sink: this.sink})
  }

  /**
   * Log a debug message (only when debug is enabled)
   */
  debug(message: string, data?: LogData): void {
    if (!this.debugEnabled) return
    this.log('debug', message, data)
  }

  /**
   * Log an error message
   */
  error(message: string, error?: unknown, data?: LogData): void {
    const errorData =
      error instanceof Error
        ? {error: error.message, stack: error.stack, ...data}
        : error === undefined
          ? data
          : {error: String(error), ...data}
    this.log('error', message, errorData)
  }

  /**
   * Log an info message
   */
  info(message: string, data?: LogData): void {
    this.log('info', message, data)
  }

  /**
   * Log a warning message
   */
  warn(message: string, data?: LogData): void {
    this.log('warn', message, data)
  }

  private emit(event: LogEvent): void {
    if (!this.sink) return

    // A failing sink must not break the run
    try {
      const pending = this.sink.write(event)
      if (pending instanceof Promise) {
        pending.catch(err => {
          console.error('[ServiceLogger] Failed to write to log sink:', err)
        })
      }
    } catch (err) {
      console.error('[ServiceLogger] Failed to write to log sink:', err)
    }
  }

  /**
   * Core logging method
   */
  private log(level: LogLevel, message: string, data?: LogData): void {
    const formattedMessage = `[${this.serviceName}] ${message}`

    const consoleMethod = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log
    if (data && Object.keys(data).length > 0) {
      consoleMethod(formattedMessage, data)
    } else {
      consoleMethod(formattedMessage)
    }

    this.emit({
      data: {
        level,
        message: formattedMessage,
        ...(data && Object.keys(data).length > 0 && {data}),
      },
      type: 'log',
    })
  }
}
