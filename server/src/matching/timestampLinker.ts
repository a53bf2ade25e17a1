import type { TimestampLink } from '../models/Job'

// M:SS, MM:SS, H:MM:SS with any number of hour digits.
// A match may not start or end inside a longer digit-and-colon run ("1:2:34", "100:00:00").
const TIMESTAMP_PATTERN = /(?<!\w|\d:)(\d+):(\d{2})(?::(\d{2}))?(?!\w|:\d)/g

export interface TimestampToken {
  text: string
  seconds: number
}

/**
 * Parse one token. Minutes and seconds must be 0-59; the hour field is not range-checked.
 * Returns null for anything that is not a timestamp (e.g. "0:60").
 */
export function parseTimestamp(token: string): number | null {
  const parts = token.split(':')
  if (parts.length < 2 || parts.length > 3) return null
  if (!parts.every((p) => /^\d+$/.test(p))) return null
  const nums = parts.map((p) => parseInt(p, 10))
  const [hours, minutes, seconds] = nums.length === 3 ? nums : [0, nums[0], nums[1]]
  if (minutes > 59 || seconds > 59) return null
  return hours * 3600 + minutes * 60 + seconds
}

/** Timestamp tokens in order of first appearance; a repeated value is reported once. */
export function extractTimestamps(text: string): TimestampToken[] {
  const seen = new Set<number>()
  const tokens: TimestampToken[] = []
  for (const match of text.matchAll(TIMESTAMP_PATTERN)) {
    const seconds = parseTimestamp(match[0])
    if (seconds === null || seen.has(seconds)) continue
    seen.add(seconds)
    tokens.push({ text: match[0], seconds })
  }
  return tokens
}

/**
 * Drop every `t` query parameter, keeping the rest of the URL byte for byte.
 * The fragment, if any, is returned separately so callers can re-attach it after new params.
 */
export function stripTimeParam(videoUrl: string): { base: string; hash: string } {
  const hashAt = videoUrl.indexOf('#')
  const hash = hashAt >= 0 ? videoUrl.slice(hashAt) : ''
  const withoutHash = hashAt >= 0 ? videoUrl.slice(0, hashAt) : videoUrl
  const queryAt = withoutHash.indexOf('?')
  if (queryAt < 0) return { base: withoutHash, hash }

  const path = withoutHash.slice(0, queryAt)
  const kept = withoutHash
    .slice(queryAt + 1)
    .split('&')
    .filter((pair) => pair !== '' && pair.split('=')[0] !== 't')
  return { base: kept.length > 0 ? `${path}?${kept.join('&')}` : path, hash }
}

/** Append a query parameter, keeping any fragment at the end. */
export function appendParam(url: string, key: string, value: string): string {
  const hashAt = url.indexOf('#')
  const base = hashAt >= 0 ? url.slice(0, hashAt) : url
  const hash = hashAt >= 0 ? url.slice(hashAt) : ''
  const sep = base.includes('?') ? '&' : '?'
  return `${base}${sep}${key}=${value}${hash}`
}

export function buildDeepLink(videoUrl: string, seconds: number): string {
  const { base, hash } = stripTimeParam(videoUrl)
  return appendParam(`${base}${hash}`, 't', `${seconds}s`)
}

/** Detect timestamps in a comment and attach one deep link per distinct offset. */
export function linkTimestamps(text: string, videoUrl: string): TimestampLink[] {
  return extractTimestamps(text).map((token) => ({
    text: token.text,
    seconds: token.seconds,
    link: buildDeepLink(videoUrl, token.seconds),
  }))
}
