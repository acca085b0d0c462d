/**
 * Scoped console logger
 *
 * Lines are written as `[Scope] message`, the way the rest of the codebase
 * tags its console output. Anything below the configured level is dropped.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevel[]

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export interface Logger {
  debug: (message: string, meta?: unknown) => void
  info: (message: string, meta?: unknown) => void
  warn: (message: string, meta?: unknown) => void
  error: (message: string, meta?: unknown) => void
  child: (scope: string) => Logger
}

type Sink = (line: string, ...rest: unknown[]) => void

export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_RANK[level]

  const emit = (messageLevel: Exclude<LogLevel, 'silent'>, sink: Sink) =>
    (message: string, meta?: unknown) => {
      if (LEVEL_RANK[messageLevel] < threshold) return
      const line = `[${scope}] ${message}`
      if (meta === undefined) {
        sink(line)
      } else {
        sink(line, meta)
      }
    }

  return {
    debug: emit('debug', (...args) => console.debug(...args)),
    info: emit('info', (...args) => console.log(...args)),
    warn: emit('warn', (...args) => console.warn(...args)),
    error: emit('error', (...args) => console.error(...args)),
    child: (childScope) => createLogger(`${scope}:${childScope}`, level),
  }
}
