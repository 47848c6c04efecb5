import * as log4js from 'log4js'

import type { LoggerService } from '@nestjs/common'

type LogContext = { err?: unknown } & Record<string, unknown>

const isLogContext = (value: unknown): value is LogContext =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const formatSingleLine = (logEvent: log4js.LoggingEvent): string => {
  const [msg, ctx]: unknown[] = logEvent.data
  let err: unknown = undefined
  let ctxSerialized = ''
  if (isLogContext(ctx)) {
    const { err: ctxErr, ...rest } = ctx
    err = ctxErr
    ctxSerialized = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : ''
  } else if (ctx !== undefined) {
    ctxSerialized = ` ${JSON.stringify(ctx)}`
  }
  const errSerialized = err instanceof Error ? ` <${err.name}: ${err.message}> (${err.stack ?? ''})` : ''

  return `${String(msg)}${errSerialized}${ctxSerialized}`.replace(/\n/g, '\\n')
}

const InternalLoggerFactory = () => {
  log4js.configure({
    appenders: {
      app: {
        type: 'stdout',
        layout: {
          type: 'pattern',
          pattern: '%d %[[%p]%] %x{singleLine}',
          tokens: {
            singleLine: formatSingleLine,
          },
        },
      },
    },
    categories: {
      default: { appenders: ['app'], level: process.env.LOG_LEVEL ?? 'DEBUG' },
    },
  })
  return log4js.getLogger()
}

export class Logger implements LoggerService {
  private readonly logger = InternalLoggerFactory()

  log (message: unknown, ...optionalParams: unknown[]) {
    this.logger.log('INFO', message, ...optionalParams)
  }
  error (message: unknown, ...optionalParams: unknown[]) {
    this.logger.log('ERROR', message, ...optionalParams)
  }
  warn (message: unknown, ...optionalParams: unknown[]) {
    this.logger.log('WARN', message, ...optionalParams)
  }
  debug (message: unknown, ...optionalParams: unknown[]) {
    this.logger.log('DEBUG', message, ...optionalParams)
  }
}
