/**
 * Logging configuration shared by the vector store and its collections
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LoggerFunction = (level: LogLevel, message: string, data?: unknown) => void

export interface LogConfig {
  /** Enable debug logging (default: false) */
  debug: boolean
  /** Custom logger function */
  logger?: LoggerFunction
}

const DEFAULT_LOG_CONFIG: LogConfig = {
  debug: false,
}

/**
 * Logger bound to a resolved {@link LogConfig}
 */
export class Logger {
  private readonly config: LogConfig

  constructor(config?: Partial<LogConfig>) {
    this.config = { ...DEFAULT_LOG_CONFIG, ...config }
  }

  get debugEnabled(): boolean {
    return this.config.debug
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data)
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data)
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data)
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data)
  }

  log(level: LogLevel, message: string, data?: unknown): void {
    // Skip debug messages when debug mode is disabled
    if (level === 'debug' && !this.config.debug) {
      return
    }

    if (this.config.logger) {
      this.config.logger(level, message, data)
      return
    }

    const timestamp = new Date().toISOString()
    const prefix = `[${timestamp}] [es-vector-store:${level.toUpperCase()}]`

    switch (level) {
      case 'debug':
        console.debug(prefix, message, data ?? '')
        break
      case 'info':
        console.info(prefix, message, data ?? '')
        break
      case 'warn':
        console.warn(prefix, message, data ?? '')
        break
      case 'error':
        console.error(prefix, message, data ?? '')
        break
    }
  }
}
