import { z } from 'zod'
import { RetrievalError, errorMessage } from '../lib/errors'
import { getLogger, redactVideoUrl } from '../lib/logger'

const log = getLogger('worker')

const THREADS_ENDPOINT = 'https://www.googleapis.com/youtube/v3/commentThreads'
const COMMENTS_ENDPOINT = 'https://www.googleapis.com/youtube/v3/comments'
const PAGE_SIZE = 100

/** A comment as supplied by a retrieval client. Only `text` is required. */
export interface RetrievedComment {
  id?: string
  text: string
  author?: string
  published?: string
  likes?: number
}

export interface CommentFetch {
  comments: RetrievedComment[]
  /** True when a configured limit cut retrieval short. */
  truncated: boolean
}

export interface CommentFetcher {
  /** All comments for the video, replies included. Rejects with RetrievalError when the video cannot be read. */
  fetchComments(videoUrl: string): Promise<CommentFetch>
}

/** Video id from watch?v=, youtu.be/<id>, /shorts/<id> or /embed/<id>; null otherwise. */
export function extractVideoId(videoUrl: string): string | null {
  let u: URL
  try {
    u = new URL(videoUrl)
  } catch {
    return null
  }
  const host = u.hostname.toLowerCase().replace(/^www\.|^m\./, '')
  const valid = (id: string | undefined | null) => (id && /^[A-Za-z0-9_-]{6,}$/.test(id) ? id : null)

  if (host === 'youtu.be') return valid(u.pathname.split('/')[1])
  if (host !== 'youtube.com' && host !== 'music.youtube.com') return null
  if (u.pathname === '/watch') return valid(u.searchParams.get('v'))
  const [, kind, id] = u.pathname.split('/')
  if (kind === 'shorts' || kind === 'embed' || kind === 'live') return valid(id)
  return null
}

const commentResource = z.object({
  id: z.string().optional(),
  snippet: z
    .object({
      textDisplay: z.string().optional(),
      textOriginal: z.string().optional(),
      authorDisplayName: z.string().optional(),
      publishedAt: z.string().optional(),
      likeCount: z.number().optional(),
    })
    .optional(),
})

type CommentResource = z.infer<typeof commentResource>

const threadsPageSchema = z.object({
  nextPageToken: z.string().optional(),
  items: z
    .array(
      z.object({
        id: z.string().optional(),
        snippet: z
          .object({
            topLevelComment: commentResource.optional(),
            totalReplyCount: z.number().optional(),
          })
          .optional(),
        replies: z.object({ comments: z.array(commentResource).default([]) }).optional(),
      })
    )
    .default([]),
})

type CommentThread = z.infer<typeof threadsPageSchema>['items'][number]

const repliesPageSchema = z.object({
  nextPageToken: z.string().optional(),
  items: z.array(commentResource).default([]),
})

export interface YouTubeFetcherOptions {
  apiKey?: string
  /** Stop after this many comments (replies included). Unset reads every comment. */
  maxComments?: number
  fetchImpl?: typeof fetch
}

function toRetrieved(resource: CommentResource | undefined, fallbackId?: string): RetrievedComment | null {
  const s = resource?.snippet
  const text = s?.textOriginal ?? s?.textDisplay
  if (typeof text !== 'string') return null
  return {
    id: resource?.id ?? fallbackId,
    text,
    author: s?.authorDisplayName,
    published: s?.publishedAt,
    likes: s?.likeCount,
  }
}

/**
 * Reads comments through the YouTube Data API: every thread from commentThreads (newest first),
 * each top-level comment followed by its replies. Threads with more replies than the API embeds
 * are completed from the comments endpoint.
 */
export class YouTubeCommentFetcher implements CommentFetcher {
  private readonly fetchImpl: typeof fetch

  constructor(private readonly options: YouTubeFetcherOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init))
  }

  async fetchComments(videoUrl: string): Promise<CommentFetch> {
    if (!this.options.apiKey) {
      throw new RetrievalError('YOUTUBE_API_KEY is not configured', videoUrl)
    }
    const videoId = extractVideoId(videoUrl)
    if (!videoId) {
      throw new RetrievalError('Could not find a video id in the URL', videoUrl)
    }

    const limit = this.options.maxComments ?? Number.POSITIVE_INFINITY
    const comments: RetrievedComment[] = []
    // false once a comment arrives that the limit leaves no room for
    const take = (comment: RetrievedComment | null): boolean => {
      if (!comment) return true
      if (comments.length >= limit) return false
      comments.push(comment)
      return true
    }

    let pageToken: string | undefined
    do {
      const raw = await this.request(
        THREADS_ENDPOINT,
        { part: 'snippet,replies', videoId, order: 'time', pageToken },
        videoUrl
      )
      const page = this.parse(threadsPageSchema, raw, videoUrl)
      for (const thread of page.items) {
        if (!take(toRetrieved(thread.snippet?.topLevelComment, thread.id))) {
          return this.truncated(comments, videoUrl)
        }
        for (const reply of await this.repliesOf(thread, videoUrl)) {
          if (!take(toRetrieved(reply))) return this.truncated(comments, videoUrl)
        }
      }
      pageToken = page.nextPageToken
      log.debug({ msg: 'Fetched comment page', video: redactVideoUrl(videoUrl), count: comments.length })
    } while (pageToken)

    return { comments, truncated: false }
  }

  private truncated(comments: RetrievedComment[], videoUrl: string): CommentFetch {
    log.warn({ msg: 'Comment limit reached; remaining comments skipped', video: redactVideoUrl(videoUrl), limit: comments.length })
    return { comments, truncated: true }
  }

  /** Embedded replies when they are complete, otherwise every reply from the comments endpoint. */
  private async repliesOf(thread: CommentThread, videoUrl: string): Promise<CommentResource[]> {
    const embedded = thread.replies?.comments ?? []
    const total = thread.snippet?.totalReplyCount ?? embedded.length
    const parentId = thread.snippet?.topLevelComment?.id ?? thread.id
    if (total <= embedded.length || !parentId) return embedded

    const replies: CommentResource[] = []
    let pageToken: string | undefined
    do {
      const raw = await this.request(COMMENTS_ENDPOINT, { part: 'snippet', parentId, pageToken }, videoUrl)
      const page = this.parse(repliesPageSchema, raw, videoUrl)
      replies.push(...page.items)
      pageToken = page.nextPageToken
    } while (pageToken)
    return replies
  }

  private async request(endpoint: string, query: Record<string, string | undefined>, videoUrl: string): Promise<unknown> {
    const params = new URLSearchParams({
      maxResults: String(PAGE_SIZE),
      textFormat: 'plainText',
      key: this.options.apiKey ?? '',
    })
    for (const [name, value] of Object.entries(query)) {
      if (value) params.set(name, value)
    }

    let res: Response
    try {
      res = await this.fetchImpl(`${endpoint}?${params.toString()}`)
    } catch (err) {
      throw new RetrievalError(`Could not reach YouTube: ${errorMessage(err)}`, videoUrl)
    }
    const body = await res.text()
    if (!res.ok) {
      throw new RetrievalError(`YouTube returned ${res.status}${apiReason(body)}`, videoUrl, res.status)
    }
    try {
      return JSON.parse(body)
    } catch {
      throw new RetrievalError('YouTube returned a body that is not JSON', videoUrl, res.status)
    }
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, videoUrl: string): T {
    const parsed = schema.safeParse(raw)
    if (!parsed.success) {
      throw new RetrievalError('YouTube returned an unexpected response shape', videoUrl)
    }
    return parsed.data
  }
}

function apiReason(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body)
    if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
      const error = parsed.error
      if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return `: ${error.message}`
      }
    }
  } catch {
    // body is not JSON; status alone is reported
  }
  return ''
}
