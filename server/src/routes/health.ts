/**
 * Health, readiness, version, and ops/queue endpoints (no /api prefix).
 */
import { Router, Request, Response } from 'express'
import type { JobService } from '../services/jobService'
import type { JobQueue } from '../queue/jobQueue'
import type { WorkerState } from '../workers/commentWorker'
import { errorMessage } from '../lib/errors'
import { withTimeout } from '../utils/withTimeout'

const READYZ_TIMEOUT_MS = 5_000

export interface HealthDeps {
  jobs: JobService
  queue: JobQueue
  /** Undefined when the worker is disabled in this process. */
  workerState?: () => WorkerState
  release: string
  env: string
}

export function createHealthRoutes(deps: HealthDeps): Router {
  const router = Router()
  const buildTime = process.env.BUILD_TIME || undefined

  /** GET /healthz — process up, no dependency check */
  router.get('/healthz', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' })
  })

  /** GET /readyz — 200 only if the job store answers and the worker loop is running (or disabled here). */
  router.get('/readyz', async (_req: Request, res: Response) => {
    const errors: { store?: string; worker?: string } = {}
    try {
      await withTimeout(deps.jobs.counts(), READYZ_TIMEOUT_MS, 'Job store')
    } catch (err) {
      errors.store = errorMessage(err)
    }
    if (deps.workerState && !deps.workerState().running) {
      errors.worker = 'Worker loop is not running'
    }
    if (Object.keys(errors).length > 0) {
      res.status(503).json({ status: 'unhealthy', ...errors })
      return
    }
    res.status(200).json({ status: 'ok' })
  })

  /** GET /version — service, release, buildTime, env */
  router.get('/version', (_req: Request, res: Response) => {
    res.json({ service: 'api', release: deps.release, buildTime, env: deps.env })
  })

  /** GET /ops/queue — job counts by status, queued ids, worker activity. */
  router.get('/ops/queue', async (_req: Request, res: Response) => {
    try {
      const counts = await deps.jobs.counts()
      const worker = deps.workerState?.()
      res.json({
        ...counts,
        queued: deps.queue.size,
        workerRunning: worker?.running ?? false,
        currentJobId: worker?.currentJobId ?? null,
        lastActivityAt: worker?.lastActivityAt ?? null,
      })
    } catch (err) {
      res.status(503).json({ error: errorMessage(err) })
    }
  })

  return router
}
