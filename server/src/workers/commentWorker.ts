import type { Logger } from 'pino'
import { markCompleted, markFailed, markProcessing, type CompletedResult, type JobRecord } from '../models/Job'
import type { JobMutation, JobStore } from '../store/jobStore'
import type { JobQueue } from '../queue/jobQueue'
import type { CommentFetcher } from '../services/youtubeComments'
import type { Notifier } from '../services/notifier'
import { buildReport } from '../services/emailReport'
import { findMatches } from '../matching/commentMatches'
import { RetrievalError, StoreError, TimeoutError, errorMessage } from '../lib/errors'
import { getLogger, redactVideoUrl, withJobContext } from '../lib/logger'
import { captureJobError } from '../lib/sentry'
import { withTimeout } from '../utils/withTimeout'

export interface WorkerOptions {
  store: JobStore
  queue: JobQueue
  fetcher: CommentFetcher
  notifier: Notifier
  /** Bound on a single retrieval or notifier call. */
  collaboratorTimeoutMs: number
  /** Attempts for each store write before the worker gives up. */
  storeWriteRetries: number
  retryDelayMs?: number
  now?: () => Date
}

export interface WorkerState {
  running: boolean
  currentJobId: string | null
  completed: number
  failed: number
  lastActivityAt: string | null
}

/**
 * Single consumer of the job queue. Runs one job at a time, start to terminal state,
 * and is the only writer that moves a job out of `pending`.
 */
export class CommentWorker {
  private readonly log = getLogger('worker')
  private loop: Promise<void> | null = null
  private state: WorkerState = {
    running: false,
    currentJobId: null,
    completed: 0,
    failed: 0,
    lastActivityAt: null,
  }

  constructor(private readonly options: WorkerOptions) {}

  /**
   * Start the loop. The returned promise resolves after stop() and rejects only when a
   * job's state cannot be persisted, in which case the loop does not move on to the next job.
   */
  start(): Promise<void> {
    if (!this.loop) {
      this.state.running = true
      this.loop = this.run().finally(() => {
        this.state.running = false
        this.state.currentJobId = null
      })
    }
    return this.loop
  }

  /** Stop taking jobs. Resolves once the job in flight (if any) has reached a terminal state. */
  async stop(): Promise<void> {
    this.options.queue.close()
    if (this.loop) await this.loop
  }

  getState(): WorkerState {
    return { ...this.state }
  }

  private async run(): Promise<void> {
    this.log.info({ msg: 'Worker loop started', queued: this.options.queue.size })
    for (;;) {
      const id = await this.options.queue.next()
      if (id === undefined) break
      this.state.currentJobId = id
      try {
        await this.processJob(id)
      } finally {
        this.state.currentJobId = null
        this.state.lastActivityAt = this.now().toISOString()
      }
    }
    this.log.info({ msg: 'Worker loop stopped' })
  }

  /**
   * Claim one pending job and run it to a terminal state. Pipeline failures end as `failed`;
   * only a store write that keeps failing escapes (as StoreError).
   */
  async processJob(id: string): Promise<JobRecord | undefined> {
    let claimed = false
    const job = await this.writeWithRetry(id, 'claim', (current) => {
      if (current.status !== 'pending') return current
      claimed = true
      return markProcessing(current, this.now())
    })
    if (!job) {
      this.log.warn({ msg: 'Queued job not found in store', jobId: id })
      return undefined
    }
    const log = withJobContext(id, job.requestId)
    if (!claimed) {
      log.warn({ msg: 'Skipping job that is not pending', status: job.status })
      return job
    }
    log.info({ msg: 'Job processing', video: redactVideoUrl(job.videoUrl), phrases: job.phrases.length, attempt: job.attempts })

    let mutation: JobMutation
    try {
      const result = await this.execute(job, log)
      mutation = (current) => markCompleted(current, result, this.now())
      log.info({ msg: 'Job completed', commentCount: result.commentCount, emailSent: result.emailSent })
    } catch (err) {
      const message = errorMessage(err)
      mutation = (current) => markFailed(current, message, this.now())
      log.error({ msg: 'Job failed', error: message, errorName: err instanceof Error ? err.name : undefined })
      captureJobError(id, job.requestId, 'pipeline', err)
    }

    const terminal = await this.writeWithRetry(id, 'finish', mutation)
    if (terminal?.status === 'completed') this.state.completed += 1
    if (terminal?.status === 'failed') this.state.failed += 1
    return terminal
  }

  private async execute(job: JobRecord, log: Logger): Promise<CompletedResult> {
    const { collaboratorTimeoutMs } = this.options
    const { comments, truncated } = await withTimeout(
      this.options.fetcher.fetchComments(job.videoUrl),
      collaboratorTimeoutMs,
      'Comment retrieval'
    ).catch((err: unknown) => {
      throw err instanceof TimeoutError ? new RetrievalError(err.message, job.videoUrl) : err
    })
    log.info({ msg: 'Comments retrieved', total: comments.length, truncated })

    const matches = findMatches(job.videoUrl, job.phrases, comments)
    let emailSent = false
    if (matches.length > 0) {
      const report = buildReport({
        videoUrl: job.videoUrl,
        phrases: job.phrases,
        comments: matches,
        truncated,
        generatedAt: this.now(),
      })
      emailSent = await this.notify(job, report.subject, report.text, report.html, log)
    }
    return { commentCount: matches.length, emailSent, comments: matches, truncated }
  }

  // Delivery problems never fail the job; anything other than `true` is recorded as not sent
  private async notify(job: JobRecord, subject: string, text: string, html: string, log: Logger): Promise<boolean> {
    try {
      return await withTimeout(
        this.options.notifier.send(job.email, subject, text, html),
        this.options.collaboratorTimeoutMs,
        'Notification'
      )
    } catch (err) {
      log.warn({ msg: 'Notifier threw; recording email as not sent', error: errorMessage(err) })
      return false
    }
  }

  private async writeWithRetry(id: string, stage: string, mutation: JobMutation): Promise<JobRecord | undefined> {
    const { storeWriteRetries, retryDelayMs = 500 } = this.options
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.options.store.update(id, mutation)
      } catch (err) {
        if (!(err instanceof StoreError)) throw err
        this.log.error({ msg: 'Job store write failed', jobId: id, stage, attempt, error: err.message })
        if (attempt >= storeWriteRetries) {
          this.log.fatal({ msg: 'Giving up on job store write; worker stopping', jobId: id, stage })
          captureJobError(id, undefined, stage, err)
          throw err
        }
        await new Promise((resolve) => setTimeout(resolve, retryDelayMs * attempt))
      }
    }
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date()
  }
}
