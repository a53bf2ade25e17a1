import { v4 as uuidv4 } from 'uuid'
import type { JobRecord, JobStatus, NewJob } from '../models/Job'
import { StoreError, errorMessage } from '../lib/errors'
import { KeyedLock } from './keyedLock'

export type JobMutation = (job: JobRecord) => JobRecord

/**
 * Durable id -> job mapping. The only shared mutable state in the service.
 * create/update resolve only after the record is persisted; updates to one id are serialized.
 * Missing ids resolve to undefined.
 */
export interface JobStore {
  open(): Promise<void>
  create(input: NewJob, now?: Date): Promise<string>
  get(id: string): Promise<JobRecord | undefined>
  update(id: string, mutation: JobMutation): Promise<JobRecord | undefined>
  /** Ids in `pending`, in submission order. */
  listPending(): Promise<string[]>
  /** Records matching a status (all when omitted), in submission order. */
  list(status?: JobStatus): Promise<JobRecord[]>
}

/**
 * Committed records are cached in memory; reads never wait on a writer.
 * Subclasses decide where a record is persisted.
 */
export abstract class CachedJobStore implements JobStore {
  protected readonly records = new Map<string, JobRecord>()
  private readonly locks = new KeyedLock()
  private lastSequence = 0
  private opened = false

  protected abstract loadAll(): Promise<JobRecord[]>
  protected abstract persist(job: JobRecord): Promise<void>

  async open(): Promise<void> {
    if (this.opened) return
    const loaded = await this.loadAll()
    for (const job of loaded) {
      this.records.set(job.id, job)
      this.lastSequence = Math.max(this.lastSequence, job.sequence)
    }
    this.opened = true
  }

  async create(input: NewJob, now: Date = new Date()): Promise<string> {
    this.assertOpen('create')
    const id = uuidv4()
    const job: JobRecord = {
      id,
      videoUrl: input.videoUrl,
      phrases: [...input.phrases],
      email: input.email,
      requestId: input.requestId,
      sequence: ++this.lastSequence,
      submissionTime: now.toISOString(),
      status: 'pending',
      attempts: 0,
    }
    await this.locks.run(id, async () => {
      await this.write(job, 'create')
      this.records.set(id, job)
    })
    return id
  }

  async get(id: string): Promise<JobRecord | undefined> {
    this.assertOpen('read')
    const job = this.records.get(id)
    return job ? structuredClone(job) : undefined
  }

  async update(id: string, mutation: JobMutation): Promise<JobRecord | undefined> {
    this.assertOpen('update', id)
    return this.locks.run(id, async () => {
      const current = this.records.get(id)
      if (!current) return undefined
      const next = mutation(structuredClone(current))
      if (next.id !== id) {
        throw new StoreError(`Mutation changed job id ${id} -> ${next.id}`, 'update', id)
      }
      await this.write(next, 'update')
      this.records.set(id, next)
      return structuredClone(next)
    })
  }

  async listPending(): Promise<string[]> {
    return (await this.list('pending')).map((job) => job.id)
  }

  async list(status?: JobStatus): Promise<JobRecord[]> {
    this.assertOpen('read')
    return [...this.records.values()]
      .filter((job) => status === undefined || job.status === status)
      .sort((a, b) => a.sequence - b.sequence)
      .map((job) => structuredClone(job))
  }

  private async write(job: JobRecord, operation: 'create' | 'update'): Promise<void> {
    try {
      await this.persist(job)
    } catch (err) {
      throw new StoreError(`Failed to persist job ${job.id}: ${errorMessage(err)}`, operation, job.id, err)
    }
  }

  private assertOpen(operation: 'create' | 'read' | 'update', id?: string): void {
    if (!this.opened) throw new StoreError('Job store used before open()', operation, id)
  }
}

/** Process-local store; nothing survives a restart. Used in tests and with JOB_STORE=memory. */
export class MemoryJobStore extends CachedJobStore {
  constructor(private readonly seed: JobRecord[] = []) {
    super()
  }

  protected async loadAll(): Promise<JobRecord[]> {
    return this.seed.map((job) => structuredClone(job))
  }

  protected async persist(_job: JobRecord): Promise<void> {
    // committed to the in-memory map by the caller
  }
}
