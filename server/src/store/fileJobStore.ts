import fs from 'fs'
import path from 'path'
import type { JobRecord } from '../models/Job'
import { jobRecordSchema } from '../models/jobSchema'
import { StoreError, errorMessage } from '../lib/errors'
import { getLogger } from '../lib/logger'
import { CachedJobStore } from './jobStore'

const log = getLogger('worker')

const RECORD_EXT = '.json'
const TMP_EXT = '.tmp'

/**
 * One JSON file per job under `<dataDir>/jobs`. Each write goes to a temp file,
 * is fsynced, then renamed over the record and the directory fsynced, so a crash leaves
 * either the old or the new record. A failed write removes its temp file.
 */
export class FileJobStore extends CachedJobStore {
  private readonly jobsDir: string

  constructor(dataDir: string) {
    super()
    this.jobsDir = path.join(dataDir, 'jobs')
  }

  recordPath(id: string): string {
    return path.join(this.jobsDir, `${id}${RECORD_EXT}`)
  }

  protected async loadAll(): Promise<JobRecord[]> {
    let files: string[]
    try {
      await fs.promises.mkdir(this.jobsDir, { recursive: true })
      files = await fs.promises.readdir(this.jobsDir)
    } catch (err) {
      throw new StoreError(`Cannot open job store at ${this.jobsDir}: ${errorMessage(err)}`, 'load', undefined, err)
    }

    const jobs: JobRecord[] = []
    for (const file of files) {
      const filePath = path.join(this.jobsDir, file)
      if (file.endsWith(TMP_EXT)) {
        // write interrupted before rename; the previous record (if any) is still intact
        await fs.promises.rm(filePath, { force: true })
        log.warn({ msg: 'Removed incomplete job write', file })
        continue
      }
      if (!file.endsWith(RECORD_EXT)) continue

      let raw: unknown
      try {
        raw = JSON.parse(await fs.promises.readFile(filePath, 'utf-8'))
      } catch (err) {
        throw new StoreError(`Unreadable job record ${file}: ${errorMessage(err)}`, 'load', undefined, err)
      }
      const parsed = jobRecordSchema.safeParse(raw)
      if (!parsed.success) {
        throw new StoreError(`Malformed job record ${file}: ${parsed.error.issues[0]?.message ?? 'invalid'}`, 'load')
      }
      jobs.push(parsed.data)
    }
    log.info({ msg: 'Job store loaded', dir: this.jobsDir, jobs: jobs.length })
    return jobs
  }

  protected async persist(job: JobRecord): Promise<void> {
    const target = this.recordPath(job.id)
    const tmp = `${target}.${process.pid}${TMP_EXT}`
    try {
      const handle = await fs.promises.open(tmp, 'w')
      try {
        await handle.writeFile(JSON.stringify(job, null, 2))
        await handle.sync()
      } finally {
        await handle.close()
      }
      await fs.promises.rename(tmp, target)
    } catch (err) {
      await fs.promises.rm(tmp, { force: true })
      throw err
    }
    await this.syncDir()
  }

  // makes the rename itself durable
  private async syncDir(): Promise<void> {
    if (process.platform === 'win32') return
    const dir = await fs.promises.open(this.jobsDir, 'r')
    try {
      await dir.sync()
    } finally {
      await dir.close()
    }
  }
}
