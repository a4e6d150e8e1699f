/**
 * Logger Utility
 *
 * pino logger writing to stderr, with pretty-print on an interactive
 * terminal in development. stdout is left to command output.
 */

import pino from 'pino'

const env = process.env.NODE_ENV ?? 'development'
const isDev = env !== 'production' && env !== 'test'
const isPretty = isDev && process.stderr.isTTY === true

function defaultLevel(): string {
  if (env === 'test') return 'silent'
  return isDev ? 'debug' : 'info'
}

/**
 * Base logger instance
 */
const baseLogger = isPretty
  ? pino({
      level: process.env.LOG_LEVEL ?? defaultLevel(),
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino({ level: process.env.LOG_LEVEL ?? defaultLevel() }, pino.destination(2))

const children = new Set<pino.Logger>()

/**
 * Create a child logger with a component name
 */
export function createLogger(component: string): pino.Logger {
  const child = baseLogger.child({ component })
  children.add(child)
  return child
}

/**
 * Change the level of the base logger and every child created from it
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  baseLogger.level = level
  for (const child of children) {
    child.level = level
  }
}
