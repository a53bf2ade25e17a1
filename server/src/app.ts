import express, { Request, Response, NextFunction } from 'express'
import cors from 'cors'
import rateLimit from 'express-rate-limit'
import type { AppConfig } from './config'
import type { JobService } from './services/jobService'
import type { StatusReader } from './services/statusReader'
import type { JobQueue } from './queue/jobQueue'
import type { WorkerState } from './workers/commentWorker'
import { createJobRoutes } from './routes/jobs'
import { createHealthRoutes } from './routes/health'
import { requestIdMiddleware, REQUEST_ID_HEADER } from './middleware/requestId'
import { sentryRequestIdScope, setupSentryErrorHandler } from './lib/sentry'
import { withRequestId } from './lib/logger'

export interface AppDeps {
  config: Pick<AppConfig, 'env' | 'release' | 'corsOrigins'>
  jobs: JobService
  statusReader: StatusReader
  queue: JobQueue
  workerState?: () => WorkerState
}

function normalizeOrigin(origin: string): string {
  return origin.trim().replace(/\/$/, '')
}

/** In dev, allow any origin that is localhost, 127.0.0.1, or [::1] (any port). */
function isLocalOrigin(origin: string): boolean {
  try {
    const host = new URL(origin).hostname.toLowerCase()
    return host === 'localhost' || host === '127.0.0.1' || host === '[::1]' || host === '::1'
  } catch {
    return false
  }
}

export function createApp(deps: AppDeps): express.Express {
  const app = express()
  app.disable('etag')
  app.disable('x-powered-by')
  // One proxy hop in front (load balancer); keeps rate-limit keyed on the client address
  app.set('trust proxy', 1)

  const allowedOrigins = new Set(deps.config.corsOrigins.map(normalizeOrigin))
  const isProduction = deps.config.env === 'production'
  const isAllowedOrigin = (origin?: string): boolean => {
    if (!origin) return true // curl, server-to-server
    const norm = normalizeOrigin(origin)
    if (allowedOrigins.has(norm)) return true
    return !isProduction && isLocalOrigin(norm)
  }

  app.use(
    cors({
      origin: (origin, callback) => callback(null, isAllowedOrigin(origin)),
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', REQUEST_ID_HEADER],
      exposedHeaders: [REQUEST_ID_HEADER],
      optionsSuccessStatus: 204,
    })
  )

  app.use(requestIdMiddleware)
  app.use(sentryRequestIdScope)
  app.use(express.json({ limit: '100kb' }))
  app.use(
    '/api',
    rateLimit({
      windowMs: 60 * 1000,
      max: 120,
      message: { error: 'Too many requests. Please wait.' },
      standardHeaders: true,
      legacyHeaders: false,
    })
  )

  app.use('/api', createJobRoutes(deps.jobs, deps.statusReader))
  app.use(
    createHealthRoutes({
      jobs: deps.jobs,
      queue: deps.queue,
      workerState: deps.workerState,
      release: deps.config.release,
      env: deps.config.env,
    })
  )

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' })
  })

  setupSentryErrorHandler(app)

  // Malformed JSON bodies arrive here from express.json()
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err)
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: 'Request body must be valid JSON' })
    }
    withRequestId(req.requestId).error({ msg: 'Unhandled request error', err })
    res.status(500).json({ error: 'Internal server error' })
  })

  return app
}
