import pino from 'pino'
import { context, trace } from '@opentelemetry/api'
import { config } from '@/config'

const isProduction = config.NODE_ENV === 'production'
const isTest = config.NODE_ENV === 'test'

const logger = pino({
  level: isTest && !process.env.LOG_LEVEL ? 'silent' : config.LOG_LEVEL,
  base : {
    service : config.SERVICE_NAME,
    pod : config.PODNAME
  },
  transport: !isProduction && !isTest
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard' } }
    : undefined,
})

export type LogMeta = Record<string, unknown>

// helper to extract trace & span IDs
function getTraceContext() : LogMeta {
  const span = trace.getSpan(context.active())
  if (!span) return {}
  const spanContext = span.spanContext()
  return {
    traceId: spanContext.traceId,
    spanId: spanContext.spanId,
  }
}

/**
 * Turns an unknown thrown value into something pino serializes usefully.
 */
export function describeError(error : unknown) : LogMeta {
  if (error instanceof Error) {
    return { errorMessage: error.message, errorName: error.name, errorStack: error.stack }
  }
  return { errorMessage: String(error) }
}

// Wrap default logger to automatically include trace info
const baseLogger = {
  info: (msg: string, meta?: LogMeta) => logger.info({ ...getTraceContext(), ...meta }, msg),
  error: (msg: string, meta?: LogMeta) => logger.error({ ...getTraceContext(), ...meta }, msg),
  warn: (msg: string, meta?: LogMeta) => logger.warn({ ...getTraceContext(), ...meta }, msg),
  debug: (msg: string, meta?: LogMeta) => logger.debug({ ...getTraceContext(), ...meta }, msg),
}

export default baseLogger
