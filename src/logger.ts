import pino, { type Logger } from 'pino'
import { readEnvironment } from './config'

let root: Logger | undefined

export function getLogger(name: string): Logger {
  root ??= pino({
    level: readEnvironment().logLevel
  })
  return root.child({ name })
}
