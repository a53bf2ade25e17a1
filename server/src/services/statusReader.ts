import type { JobRecord, JobStatus, MatchedComment } from '../models/Job'
import type { JobStore } from '../store/jobStore'

interface CommentView {
  text: string
  author: string
  time: string
  likes: number
  link: string
  timestamps: { text: string; seconds: number; link: string }[]
}

type ResultView =
  | { comment_count: number; email_sent: boolean; comments_truncated: boolean; comments: CommentView[] }
  | { error_message: string }

/** Public (snake_case) shape returned by GET /api/status/:id. */
export interface JobView {
  id: string
  video_url: string
  phrases: string[]
  email: string
  status: JobStatus
  submission_time: string
  completion_time?: string
  result?: ResultView
}

function commentView(c: MatchedComment): CommentView {
  return {
    text: c.text,
    author: c.author,
    time: c.published,
    likes: c.likes,
    link: c.link,
    timestamps: c.timestamps.map((t) => ({ text: t.text, seconds: t.seconds, link: t.link })),
  }
}

export function toJobView(job: JobRecord): JobView {
  const view: JobView = {
    id: job.id,
    video_url: job.videoUrl,
    phrases: [...job.phrases],
    email: job.email,
    status: job.status,
    submission_time: job.submissionTime,
  }
  if (job.status === 'completed') {
    view.completion_time = job.completionTime
    view.result = {
      comment_count: job.result.commentCount,
      email_sent: job.result.emailSent,
      comments_truncated: job.result.truncated,
      comments: job.result.comments.map(commentView),
    }
  } else if (job.status === 'failed') {
    view.completion_time = job.completionTime
    view.result = { error_message: job.result.errorMessage }
  }
  return view
}

/** Read path for polling. Reads committed state only and never waits on the worker. */
export class StatusReader {
  constructor(private readonly store: JobStore) {}

  async getStatus(id: string): Promise<JobView | undefined> {
    const job = await this.store.get(id)
    return job ? toJobView(job) : undefined
  }
}
