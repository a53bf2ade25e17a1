import { z } from 'zod'
import { ValidationError } from '../lib/errors'
import { normalizeText } from '../matching/phraseMatcher'
import { extractVideoId } from '../services/youtubeComments'

export const MAX_PHRASES = 20
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/

export interface Submission {
  videoUrl: string
  phrases: string[]
  email: string
}

function isHttpUrl(url: string): boolean {
  try {
    const { protocol } = new URL(url)
    return protocol === 'http:' || protocol === 'https:'
  } catch {
    return false
  }
}

const submissionSchema = z.object(
  {
    video_url: z
      .string({ required_error: 'Missing required field: video_url', invalid_type_error: 'video_url must be a string' })
      .trim()
      .refine(isHttpUrl, 'video_url must be an http(s) URL'),
    phrases: z
      .array(z.string({ invalid_type_error: 'Phrases must be strings' }), {
        required_error: 'Missing required field: phrases',
        invalid_type_error: 'Phrases must be a non-empty list',
      })
      .min(1, 'Phrases must be a non-empty list')
      .max(MAX_PHRASES, `At most ${MAX_PHRASES} phrases are allowed`),
    email: z
      .string({ required_error: 'Missing required field: email', invalid_type_error: 'email must be a string' })
      .trim()
      .regex(EMAIL_PATTERN, 'A valid email address is required'),
  },
  { invalid_type_error: 'Request body must be a JSON object', required_error: 'Request body must be a JSON object' }
)

/** Trim phrases and drop ones that repeat an earlier phrase after normalization, keeping order. */
export function dedupePhrases(phrases: readonly string[]): string[] {
  const seen = new Set<string>()
  const out: string[] = []
  for (const raw of phrases) {
    const phrase = raw.trim()
    const key = normalizeText(phrase)
    if (seen.has(key)) continue
    seen.add(key)
    out.push(phrase)
  }
  return out
}

/**
 * HTTP-boundary check that a submitted video_url names a YouTube video.
 * Other fields and shapes are left to validateSubmission.
 */
export function assertYouTubeVideoUrl(body: unknown): void {
  if (typeof body !== 'object' || body === null || !('video_url' in body)) return
  const url = body.video_url
  if (typeof url !== 'string' || !isHttpUrl(url.trim())) return
  if (extractVideoId(url.trim()) === null) {
    throw new ValidationError('Invalid YouTube URL', 'video_url')
  }
}

/** Validate a submit body (snake_case, as sent by clients). Throws ValidationError naming the field. */
export function validateSubmission(body: unknown): Submission {
  const parsed = submissionSchema.safeParse(body)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = typeof issue?.path[0] === 'string' ? issue.path[0] : undefined
    throw new ValidationError(issue?.message ?? 'Invalid submission', field)
  }
  const { video_url, phrases, email } = parsed.data
  if (phrases.some((p) => p.trim().length === 0)) {
    throw new ValidationError('Phrases must not be empty', 'phrases')
  }
  return { videoUrl: video_url, phrases: dedupePhrases(phrases), email }
}
