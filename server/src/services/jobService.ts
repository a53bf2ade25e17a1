import type { JobStatus } from '../models/Job'
import { resetInterrupted } from '../models/Job'
import type { JobStore } from '../store/jobStore'
import type { JobQueue } from '../queue/jobQueue'
import { getLogger } from '../lib/logger'
import { validateSubmission } from '../utils/validation'

const log = getLogger('api')

export type JobCounts = Record<JobStatus, number>

export class JobService {
  constructor(
    private readonly store: JobStore,
    private readonly queue: JobQueue
  ) {}

  /**
   * Validate, persist as `pending`, then enqueue. The id is returned only after the record is durable.
   * Throws ValidationError for a malformed body (no job is created).
   */
  async submit(body: unknown, requestId?: string): Promise<string> {
    const submission = validateSubmission(body)
    const id = await this.store.create({ ...submission, requestId })
    this.queue.enqueue(id)
    log.info({ msg: 'Job submitted', jobId: id, requestId, phrases: submission.phrases.length })
    return id
  }

  /**
   * Startup recovery: jobs left in `processing` by a crash go back to `pending`, then every
   * pending job is queued in submission order. Returns the number of jobs queued.
   */
  async recover(): Promise<number> {
    const interrupted = await this.store.list('processing')
    for (const job of interrupted) {
      await this.store.update(job.id, resetInterrupted)
      log.warn({ msg: 'Re-queued interrupted job', jobId: job.id, attempts: job.attempts })
    }
    const queued = await this.queue.hydrate(this.store)
    log.info({ msg: 'Queue rebuilt from store', queued, interrupted: interrupted.length })
    return queued
  }

  async counts(): Promise<JobCounts> {
    const counts: JobCounts = { pending: 0, processing: 0, completed: 0, failed: 0 }
    for (const job of await this.store.list()) counts[job.status] += 1
    return counts
  }
}
