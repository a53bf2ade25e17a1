import type { JobRecord, JobStatus } from '../src/models/Job'
import type { CommentFetch, CommentFetcher, RetrievedComment } from '../src/services/youtubeComments'
import type { Notifier } from '../src/services/notifier'
import { MemoryJobStore } from '../src/store/jobStore'

export const VIDEO_URL = 'https://www.youtube.com/watch?v=dQw4w9WgXcQ'

let counter = 0

/** A persisted-looking record for seeding stores. Terminal statuses get a matching result. */
export function makeJob(status: JobStatus, sequence: number, id = `job-${++counter}`): JobRecord {
  const base = {
    id,
    videoUrl: VIDEO_URL,
    phrases: ['great'],
    email: 'a@b.com',
    sequence,
    submissionTime: '2026-01-01T00:00:00.000Z',
    attempts: status === 'pending' ? 0 : 1,
  }
  if (status === 'completed') {
    return {
      ...base,
      status,
      completionTime: '2026-01-01T00:01:00.000Z',
      result: { commentCount: 0, emailSent: false, comments: [], truncated: false },
    }
  }
  if (status === 'failed') {
    return { ...base, status, completionTime: '2026-01-01T00:01:00.000Z', result: { errorMessage: 'boom' } }
  }
  return { ...base, status }
}

export class FakeFetcher implements CommentFetcher {
  readonly calls: string[] = []
  /** Reported with every result, as if a comment limit had cut retrieval short. */
  truncated = false

  constructor(private readonly impl: (videoUrl: string) => Promise<RetrievedComment[]> = async () => []) {}

  async fetchComments(videoUrl: string): Promise<CommentFetch> {
    this.calls.push(videoUrl)
    return { comments: await this.impl(videoUrl), truncated: this.truncated }
  }

  static returning(texts: string[]): FakeFetcher {
    return new FakeFetcher(async () => texts.map((text) => ({ text })))
  }
}

export class FakeNotifier implements Notifier {
  readonly sent: { email: string; subject: string; body: string; html?: string }[] = []

  constructor(private readonly outcome: () => Promise<boolean> = async () => true) {}

  send(email: string, subject: string, body: string, html?: string): Promise<boolean> {
    this.sent.push({ email, subject, body, html })
    return this.outcome()
  }
}

/** Memory store that records the status of every write, in order. */
export class RecordingStore extends MemoryJobStore {
  readonly writes: { id: string; status: JobStatus }[] = []

  protected async persist(job: JobRecord): Promise<void> {
    this.writes.push({ id: job.id, status: job.status })
  }

  statusesOf(id: string): JobStatus[] {
    return this.writes.filter((w) => w.id === id).map((w) => w.status)
  }
}

/** Memory store whose writes fail while `failing(job)` returns true. */
export class FlakyStore extends MemoryJobStore {
  failures = 0

  constructor(private readonly failing: (job: JobRecord) => boolean) {
    super()
  }

  protected async persist(job: JobRecord): Promise<void> {
    if (this.failing(job)) {
      this.failures += 1
      throw new Error('disk full')
    }
  }
}
