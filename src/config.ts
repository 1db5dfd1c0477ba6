import type { Level, Logger } from 'pino'

export type LogLevel = Level | 'silent'

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']

const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some(level => level === value)

export type Environment = {
  nodeEnv: string
  logLevel: LogLevel
}

export function readEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
  const nodeEnv = env.NODE_ENV ?? 'development'
  const requested = env.LOG_LEVEL?.trim().toLowerCase() ?? ''
  const logLevel = isLogLevel(requested)
    ? requested
    : nodeEnv === 'production' ? 'info' : 'debug'
  return { nodeEnv, logLevel }
}

export type RouterOptions = {
  /** Compare static segments case-sensitively. Parameter values always keep their case. */
  caseSensitive?: boolean
  logger?: Logger
}

export type NodeAdapterOptions = RouterOptions & {
  /** Build the request URL from `x-forwarded-proto` and `x-forwarded-host`. */
  trustProxy?: boolean
  /** Largest request body read, in bytes. Larger bodies get a 413. Defaults to 1 MiB. */
  maxBodySize?: number
}
