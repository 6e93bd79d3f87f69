import pino from 'pino'
import { env } from '../config/env'
import { DateTime } from 'luxon'

const createPinoLogger = () => {
  // no transport worker under test, output is discarded anyway
  if (env.NODE_ENV === 'test') {
    return pino({ level: 'silent' })
  }

  return pino(
    {
      formatters: {
        level(label) {
          return { level: label }
        },
      },
      level: env.DEBUG_LEVEL,
    },
    pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        translateTime: 'yyyy-mm-dd HH:MM:ss.l',
        // stdout carries the results
        destination: 2,
      },
    })
  )
}

const pinoLogger = createPinoLogger()

/**
 * Logger class for logging
 * @class
 */
class LoggerService {
  public static info(message: string, obj?: unknown): void {
    obj ? pinoLogger.info(obj, message) : pinoLogger.info(message)
  }
  public static warn(message: string, obj?: unknown): void {
    obj ? pinoLogger.warn(obj, message) : pinoLogger.warn(message)
  }
  public static debug(message: string, obj?: unknown): void {
    obj ? pinoLogger.debug(obj, message) : pinoLogger.debug(message)
  }
  public static error(message: string, obj?: unknown): void {
    obj ? pinoLogger.error(obj, message) : pinoLogger.error(message)
  }
}

export const logger = LoggerService

export const initLog = (sources: string[], from?: string, to?: string) => {
  const currentDate = DateTime.now()
  LoggerService.info(`
====================================================
Club night finder now online
----------------------------------------------------
Boot time:                ${process.uptime()}s
Current Time (ISO):       ${currentDate.toFormat('yyyy-MM-dd HH:mm:ss')}
Sources:                  ${sources.join(', ')}
Window:                   ${from ?? '*'} .. ${to ?? '*'}
Debug Level               ${env.DEBUG_LEVEL}
====================================================
`)
}
