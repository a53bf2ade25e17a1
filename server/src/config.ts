import path from 'path'

export type JobStoreKind = 'file' | 'memory'

export interface AppConfig {
  port: number
  env: string
  release: string
  dataDir: string
  jobStore: JobStoreKind
  youtubeApiKey?: string
  /** Unset: every comment is read. */
  maxComments?: number
  resendApiKey?: string
  resendFromEmail: string
  collaboratorTimeoutMs: number
  storeWriteRetries: number
  corsOrigins: string[]
  disableWorker: boolean
}

const DEFAULT_FROM_EMAIL = 'Comment Scout <onboarding@resend.dev>'

function intFrom(raw: string | undefined, fallback: number, min = 0): number {
  if (raw === undefined || raw.trim() === '') return fallback
  const n = parseInt(raw, 10)
  return Number.isNaN(n) || n < min ? fallback : n
}

function optionalInt(raw: string | undefined, min: number): number | undefined {
  const n = intFrom(raw, Number.NaN, min)
  return Number.isNaN(n) ? undefined : n
}

function optional(raw: string | undefined): string | undefined {
  const v = raw?.trim()
  return v ? v : undefined
}

/** Read config from an env map (process.env by default). Invalid numbers fall back to defaults. */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: intFrom(source.PORT, 3001, 1),
    env: source.NODE_ENV || 'development',
    release: source.RELEASE || 'dev',
    dataDir: path.resolve(optional(source.DATA_DIR) ?? 'data'),
    jobStore: source.JOB_STORE === 'memory' ? 'memory' : 'file',
    youtubeApiKey: optional(source.YOUTUBE_API_KEY),
    maxComments: optionalInt(source.MAX_COMMENTS, 1),
    resendApiKey: optional(source.RESEND_API_KEY),
    resendFromEmail: optional(source.RESEND_FROM_EMAIL) ?? DEFAULT_FROM_EMAIL,
    collaboratorTimeoutMs: intFrom(source.COLLABORATOR_TIMEOUT_MS, 60_000, 1),
    storeWriteRetries: intFrom(source.STORE_WRITE_RETRIES, 3, 1),
    corsOrigins: (source.CORS_ORIGINS || '').split(',').map((o) => o.trim()).filter(Boolean),
    disableWorker: source.DISABLE_WORKER === 'true',
  }
}
