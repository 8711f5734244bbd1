/**
 * Logging for matcher construction and processing.
 * @packageDocumentation
 */

import pino, { type Logger } from 'pino'
import { environment } from './environment'

/**
 * Namespaces used for child loggers.
 * @public
 */
export type LogNamespace = 'builder' | 'reporter'

let rootLogger: Logger | null = null

/**
 * Create the root pino logger.
 *
 * Development runs get human-readable output through pino-pretty;
 * everything else gets JSON lines with upper-case level labels.
 */
function createRootLogger(): Logger {
  const { NODE_ENV, MULTIMATCH_LOG_LEVEL } = environment()

  return pino({
    name: 'multimatch',
    level: MULTIMATCH_LOG_LEVEL,
    transport:
      NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    formatters:
      NODE_ENV === 'development'
        ? undefined
        : {
            level: (label) => ({ level: label.toUpperCase() }),
          },
  })
}

/**
 * The shared root logger, created on first use.
 *
 * @public
 */
export function getLogger(): Logger {
  if (rootLogger === null) {
    rootLogger = createRootLogger()
  }
  return rootLogger
}

/**
 * Child logger tagged with a namespace.
 *
 * @param namespace - Component emitting the records
 * @param parent - Logger to derive from (defaults to the root logger)
 *
 * @public
 */
export function namespacedLogger(namespace: LogNamespace, parent: Logger = getLogger()): Logger {
  return parent.child({ namespace })
}
