import express, { Request, Response } from 'express'
import type { JobService } from '../services/jobService'
import type { StatusReader } from '../services/statusReader'
import { ValidationError } from '../lib/errors'
import { assertYouTubeVideoUrl } from '../utils/validation'
import { withRequestId } from '../lib/logger'

const NO_STORE = {
  'Cache-Control': 'no-store, no-cache, must-revalidate, proxy-revalidate',
  'Pragma': 'no-cache',
  'Expires': '0',
  'Surrogate-Control': 'no-store',
}

export function createJobRoutes(jobs: JobService, statusReader: StatusReader): express.Router {
  const router = express.Router()

  router.post('/submit', async (req: Request, res: Response) => {
    const log = withRequestId(req.requestId)
    try {
      assertYouTubeVideoUrl(req.body)
      const id = await jobs.submit(req.body, req.requestId)
      res.json({
        request_id: id,
        status: 'pending',
        message: 'Request submitted successfully',
      })
    } catch (error) {
      if (error instanceof ValidationError) {
        return res.status(400).json({ error: error.message, field: error.field })
      }
      log.error({ msg: 'Submit failed', err: error })
      res.status(500).json({ error: 'Could not submit request. Please try again.' })
    }
  })

  router.get('/status/:requestId', async (req: Request, res: Response) => {
    const log = withRequestId(req.requestId)
    res.set(NO_STORE)
    try {
      const view = await statusReader.getStatus(req.params.requestId)
      if (!view) {
        return res.status(404).json({ error: 'Request not found' })
      }
      res.json(view)
    } catch (error) {
      log.error({ msg: 'Status read failed', err: error })
      res.status(500).json({ error: 'Failed to get request status' })
    }
  })

  return router
}
