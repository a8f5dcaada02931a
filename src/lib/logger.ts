/**
 * Namespaced console logger. Every line is prefixed with `[Namespace]`.
 * Messages below the global threshold are dropped.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

let threshold: LogLevel = 'info'

export function setLogLevel(level: LogLevel): void {
  threshold = level
}

export function getLogLevel(): LogLevel {
  return threshold
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value)
}

export interface Logger {
  debug: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
}

/**
 * @example
 * const log = createLogger('Queue')
 * log.warn('status check failed') // [Queue] status check failed
 */
export function createLogger(namespace: string): Logger {
  const prefix = `[${namespace}]`

  const log = (level: LogLevel, ...args: unknown[]): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return

    switch (level) {
      case 'debug':
        console.log(prefix, ...args)
        break
      case 'info':
        console.info(prefix, ...args)
        break
      case 'warn':
        console.warn(prefix, ...args)
        break
      case 'error':
        console.error(prefix, ...args)
        break
    }
  }

  return {
    debug: (...args: unknown[]) => log('debug', ...args),
    info: (...args: unknown[]) => log('info', ...args),
    warn: (...args: unknown[]) => log('warn', ...args),
    error: (...args: unknown[]) => log('error', ...args)
  }
}
