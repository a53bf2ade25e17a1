import type { MatchedComment } from '../models/Job'
import type { RetrievedComment } from '../services/youtubeComments'
import { createPhraseMatcher } from './phraseMatcher'
import { appendParam, linkTimestamps } from './timestampLinker'

/** Link to a single comment: the video URL with `lc=<comment id>`, or the plain video URL. */
export function commentLink(videoUrl: string, commentId?: string): string {
  return commentId ? appendParam(videoUrl, 'lc', encodeURIComponent(commentId)) : videoUrl
}

/** Comments containing every phrase, in retrieval order, each with its timestamp deep links. */
export function findMatches(videoUrl: string, phrases: readonly string[], comments: readonly RetrievedComment[]): MatchedComment[] {
  const matches = createPhraseMatcher(phrases)
  return comments
    .filter((c) => matches(c.text))
    .map((c) => ({
      text: c.text,
      author: c.author || 'Unknown',
      published: c.published || 'Unknown',
      likes: c.likes ?? 0,
      link: commentLink(videoUrl, c.id),
      timestamps: linkTimestamps(c.text, videoUrl),
    }))
}
