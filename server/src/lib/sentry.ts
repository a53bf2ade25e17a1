/**
 * Sentry for API and worker errors. Enabled only when SENTRY_DSN is set.
 * Env: SENTRY_DSN, SENTRY_ENV (default NODE_ENV), SENTRY_TRACES_SAMPLE_RATE (default 0.05), RELEASE.
 * Uses @sentry/node v8: setupExpressErrorHandler(app) after routes.
 */
import * as Sentry from '@sentry/node'
import type { Express, Request, Response, NextFunction } from 'express'
import { getLogger } from './logger'

const DSN = process.env.SENTRY_DSN
const ENV = process.env.SENTRY_ENV || process.env.NODE_ENV || 'development'
const RELEASE = process.env.RELEASE || undefined
const TRACES_SAMPLE_RATE = Math.min(
  1,
  Math.max(0, parseFloat(process.env.SENTRY_TRACES_SAMPLE_RATE || '0.05') || 0.05)
)

function enabled(): boolean {
  return Boolean(DSN?.trim())
}

export function initSentry(): void {
  if (!enabled()) return
  try {
    Sentry.init({
      dsn: DSN,
      environment: ENV,
      release: RELEASE,
      tracesSampleRate: TRACES_SAMPLE_RATE,
      integrations: [Sentry.expressIntegration()],
    })
  } catch (err) {
    getLogger('api').warn({ msg: 'Sentry init failed; continuing without it', err })
  }
}

/** Call after all routes. No-op if SENTRY_DSN not set. */
export function setupSentryErrorHandler(app: Express): void {
  if (!enabled()) return
  Sentry.setupExpressErrorHandler(app)
}

/** Tag the Sentry scope with the request id. Run after requestIdMiddleware. */
export function sentryRequestIdScope(req: Request, _res: Response, next: NextFunction): void {
  if (enabled() && req.requestId) Sentry.getCurrentScope().setTag('request_id', req.requestId)
  next()
}

/** Capture a worker-side exception with job_id/request_id/stage tags. */
export function captureJobError(jobId: string, requestId: string | undefined, stage: string, err: unknown): void {
  if (!enabled()) return
  Sentry.withScope((scope) => {
    scope.setTag('service', 'worker')
    scope.setTag('job_id', jobId)
    scope.setTag('stage', stage)
    if (requestId) scope.setTag('request_id', requestId)
    Sentry.captureException(err)
  })
}

/** Flush pending events before the process exits. */
export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!enabled()) return
  await Sentry.flush(timeoutMs)
}
