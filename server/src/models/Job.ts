export type JobStatus = 'pending' | 'processing' | 'completed' | 'failed'

export type TerminalStatus = Extract<JobStatus, 'completed' | 'failed'>

export interface TimestampLink {
  text: string // token as written, e.g. "1:23"
  seconds: number
  link: string
}

export interface MatchedComment {
  text: string
  author: string
  published: string
  likes: number
  link: string
  timestamps: TimestampLink[]
}

export interface CompletedResult {
  commentCount: number
  emailSent: boolean
  comments: MatchedComment[]
  // Retrieval stopped at MAX_COMMENTS, so later comments were never searched
  truncated: boolean
}

export interface FailedResult {
  errorMessage: string
}

interface JobBase {
  id: string
  videoUrl: string
  phrases: string[]
  email: string

  // Submission order; assigned by the store, used to rebuild the queue after a restart
  sequence: number
  requestId?: string

  // ISO-8601
  submissionTime: string
}

export interface PendingJob extends JobBase {
  status: 'pending' | 'processing'
  startedAt?: string
  attempts: number
}

export interface CompletedJob extends JobBase {
  status: 'completed'
  startedAt?: string
  attempts: number
  completionTime: string
  result: CompletedResult
}

export interface FailedJob extends JobBase {
  status: 'failed'
  startedAt?: string
  attempts: number
  completionTime: string
  result: FailedResult
}

/** Persisted job record. Terminal variants always carry completionTime and result. */
export type JobRecord = PendingJob | CompletedJob | FailedJob

export type NewJob = Pick<JobBase, 'videoUrl' | 'phrases' | 'email' | 'requestId'>

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['processing'],
  processing: ['completed', 'failed'],
  completed: [],
  failed: [],
}

export function isTerminal(status: JobStatus): status is TerminalStatus {
  return status === 'completed' || status === 'failed'
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to)
}

export class InvalidTransitionError extends Error {
  constructor(
    public readonly jobId: string,
    public readonly from: JobStatus,
    public readonly to: JobStatus
  ) {
    super(`Job ${jobId}: illegal transition ${from} -> ${to}`)
    this.name = 'InvalidTransitionError'
  }
}

function assertTransition(job: JobRecord, to: JobStatus): void {
  if (!canTransition(job.status, to)) {
    throw new InvalidTransitionError(job.id, job.status, to)
  }
}

export function markProcessing(job: JobRecord, now: Date = new Date()): PendingJob {
  assertTransition(job, 'processing')
  return {
    ...baseOf(job),
    status: 'processing',
    startedAt: now.toISOString(),
    attempts: job.attempts + 1,
  }
}

export function markCompleted(job: JobRecord, result: CompletedResult, now: Date = new Date()): CompletedJob {
  assertTransition(job, 'completed')
  return {
    ...baseOf(job),
    status: 'completed',
    startedAt: job.startedAt,
    attempts: job.attempts,
    completionTime: completionTimeFor(job, now),
    result,
  }
}

export function markFailed(job: JobRecord, errorMessage: string, now: Date = new Date()): FailedJob {
  assertTransition(job, 'failed')
  return {
    ...baseOf(job),
    status: 'failed',
    startedAt: job.startedAt,
    attempts: job.attempts,
    completionTime: completionTimeFor(job, now),
    result: { errorMessage: errorMessage.trim() || 'Processing failed' },
  }
}

/**
 * Crash recovery only: a job found in `processing` at startup was interrupted
 * and goes back to `pending` so it runs again from the beginning.
 */
export function resetInterrupted(job: JobRecord): PendingJob {
  if (job.status !== 'processing') {
    throw new InvalidTransitionError(job.id, job.status, 'pending')
  }
  return { ...baseOf(job), status: 'pending', attempts: job.attempts }
}

function baseOf(job: JobRecord): JobBase {
  return {
    id: job.id,
    videoUrl: job.videoUrl,
    phrases: job.phrases,
    email: job.email,
    sequence: job.sequence,
    requestId: job.requestId,
    submissionTime: job.submissionTime,
  }
}

// Clock skew must never produce completion_time < submission_time
function completionTimeFor(job: JobRecord, now: Date): string {
  const submitted = Date.parse(job.submissionTime)
  const at = Number.isNaN(submitted) ? now.getTime() : Math.max(submitted, now.getTime())
  return new Date(at).toISOString()
}
