/**
 * Structured JSON logger for API and worker. Single format: level, timestamp, service, env, release, requestId/jobId.
 * Redacts recipient addresses and credentials. Use LOG_LEVEL=debug only when needed.
 */
import pino from 'pino'

const release = process.env.RELEASE || 'dev'
const env = process.env.NODE_ENV || 'development'
const level = process.env.LOG_LEVEL || (env === 'test' ? 'silent' : 'info')

/** Keys (and nested paths) to redact from log output. */
const REDACT_PATHS = [
  'apiKey',
  'api_key',
  'authorization',
  'cookie',
  'email',
  '*.email',
  'to',
  'req.headers.authorization',
  'req.headers.cookie',
  'YOUTUBE_API_KEY',
  'RESEND_API_KEY',
  'SENTRY_DSN',
]

export type ServiceName = 'api' | 'worker'

function createBaseLogger(service: ServiceName): pino.Logger {
  return pino({
    level,
    base: { service, env, release },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

const loggers = new Map<ServiceName, pino.Logger>()

export function getLogger(service: ServiceName): pino.Logger {
  let logger = loggers.get(service)
  if (!logger) {
    logger = createBaseLogger(service)
    loggers.set(service, logger)
  }
  return logger
}

/** Child logger with requestId (API request context). */
export function withRequestId(requestId: string | undefined): pino.Logger {
  return getLogger('api').child({ requestId: requestId || undefined })
}

/** Child logger with jobId and the requestId of the submission that created the job. */
export function withJobContext(jobId: string, requestId?: string): pino.Logger {
  return getLogger('worker').child({ jobId, requestId: requestId || undefined })
}

/** Shorten a video URL for logs: host plus the video id, no other query params. */
export function redactVideoUrl(videoUrl: string): string {
  try {
    const u = new URL(videoUrl)
    const v = u.searchParams.get('v')
    return v ? `${u.host}${u.pathname}?v=${v}` : `${u.host}${u.pathname}`
  } catch {
    return '[INVALID_URL]'
  }
}
