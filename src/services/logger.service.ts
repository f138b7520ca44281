import pino from 'pino'

export type Logger = pino.Logger

export interface LoggerOptions {
  level?: string
  pretty?: boolean
}

function hasPinoPretty(): boolean {
  try {
    import.meta.resolve('pino-pretty')
    return true
  } catch {
    return false
  }
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  return pino({
    level: opts.level ?? 'info',
    transport: opts.pretty && hasPinoPretty()
      ? {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' }
        }
      : undefined
  })
}
