/**
 * Error classes shared by the API and the worker.
 * Only ValidationError ever reaches a client verbatim; the rest surface through a job's error_message or the logs.
 */

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

/** Comments could not be fetched or parsed for a video. Fails the job. */
export class RetrievalError extends Error {
  constructor(
    message: string,
    public readonly videoUrl?: string,
    public readonly status?: number
  ) {
    super(message)
    this.name = 'RetrievalError'
  }
}

/** Delivery attempt failed. Never fails a job; recorded as email_sent=false. */
export class NotificationError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message)
    this.name = 'NotificationError'
  }
}

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly operation: 'create' | 'read' | 'update' | 'load',
    public readonly jobId?: string,
    public readonly underlying?: unknown
  ) {
    super(message)
    this.name = 'StoreError'
  }
}

export class TimeoutError extends Error {
  constructor(
    label: string,
    public readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`)
    this.name = 'TimeoutError'
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  if (typeof err === 'string') return err
  return 'Unknown error'
}
