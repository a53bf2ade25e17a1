/** Collapse whitespace runs to a single space, trim, and case-fold. */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim().toLowerCase()
}

/**
 * True when every phrase occurs in the comment as a substring (after normalization).
 * Phrase order does not matter. An empty phrase list matches every comment.
 */
export function matchesAllPhrases(comment: string, phrases: readonly string[]): boolean {
  const haystack = normalizeText(comment)
  return phrases.every((phrase) => haystack.includes(normalizeText(phrase)))
}

/** Prepare phrases once per job so the per-comment check skips re-normalizing them. */
export function createPhraseMatcher(phrases: readonly string[]): (comment: string) => boolean {
  const needles = phrases.map(normalizeText)
  return (comment) => {
    const haystack = normalizeText(comment)
    return needles.every((needle) => haystack.includes(needle))
  }
}
