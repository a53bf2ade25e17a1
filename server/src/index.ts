import './env'
import { initSentry, flushSentry } from './lib/sentry'

initSentry()
import { loadConfig } from './config'
import { createApp } from './app'
import { getLogger } from './lib/logger'
import { FileJobStore } from './store/fileJobStore'
import { MemoryJobStore, type JobStore } from './store/jobStore'
import { JobQueue } from './queue/jobQueue'
import { JobService } from './services/jobService'
import { StatusReader } from './services/statusReader'
import { YouTubeCommentFetcher } from './services/youtubeComments'
import { LogNotifier, ResendNotifier, type Notifier } from './services/notifier'
import { CommentWorker } from './workers/commentWorker'

const log = getLogger('api')

async function main(): Promise<void> {
  const config = loadConfig()

  const store: JobStore = config.jobStore === 'memory' ? new MemoryJobStore() : new FileJobStore(config.dataDir)
  await store.open()

  const queue = new JobQueue()
  const jobs = new JobService(store, queue)
  const statusReader = new StatusReader(store)
  await jobs.recover()

  const notifier: Notifier = config.resendApiKey
    ? new ResendNotifier({ apiKey: config.resendApiKey, from: config.resendFromEmail })
    : new LogNotifier()
  if (!config.youtubeApiKey) {
    log.warn({ msg: 'YOUTUBE_API_KEY not set; every job will fail at comment retrieval' })
  }

  const worker = config.disableWorker
    ? null
    : new CommentWorker({
        store,
        queue,
        fetcher: new YouTubeCommentFetcher({ apiKey: config.youtubeApiKey, maxComments: config.maxComments }),
        notifier,
        collaboratorTimeoutMs: config.collaboratorTimeoutMs,
        storeWriteRetries: config.storeWriteRetries,
      })

  const app = createApp({
    config,
    jobs,
    statusReader,
    queue,
    workerState: worker ? () => worker.getState() : undefined,
  })

  const server = app.listen(config.port, () => {
    log.info({ msg: 'Server listening', port: config.port, store: config.jobStore })
  })

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE') {
      log.fatal({ msg: `Port ${config.port} is already in use; set PORT to a free port` })
    } else {
      log.fatal({ msg: 'Server error', err: error })
    }
    process.exit(1)
  })

  if (worker) {
    worker.start().catch(async (err: unknown) => {
      // A job's state could not be persisted; stop rather than process past it
      log.fatal({ msg: 'Worker stopped on a job store failure; exiting', err })
      await flushSentry()
      process.exit(1)
    })
    log.info({ msg: 'Background worker started' })
  }

  let shuttingDown = false
  const shutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    log.info({ msg: `${signal} received, shutting down gracefully` })
    server.close()
    try {
      await worker?.stop()
    } catch (err) {
      log.error({ msg: 'Worker did not stop cleanly', err })
    }
    await flushSentry()
    log.info({ msg: 'Server closed' })
    process.exit(0)
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'))
  process.on('SIGINT', () => void shutdown('SIGINT'))
}

main().catch((err: unknown) => {
  log.fatal({ msg: 'Startup failed', err })
  process.exit(1)
})
