import { describe, it, expect } from 'vitest'
import { createPhraseMatcher, matchesAllPhrases, normalizeText } from '../src/matching/phraseMatcher'

describe('normalizeText', () => {
  it('collapses whitespace, trims and lowercases', () => {
    expect(normalizeText('  Great\t\tTIP\nhere  ')).toBe('great tip here')
  })
})

describe('matchesAllPhrases', () => {
  it('matches when every phrase occurs, ignoring case', () => {
    expect(matchesAllPhrases('This is GREAT, check 1:23', ['great', 'Check'])).toBe(true)
  })

  it('does not match when any phrase is missing', () => {
    expect(matchesAllPhrases('This is great, check 1:23', ['great', 'timestamp'])).toBe(false)
  })

  it('ignores phrase order', () => {
    expect(matchesAllPhrases('alpha then beta', ['beta', 'alpha'])).toBe(true)
  })

  it('normalizes whitespace on both sides before comparing', () => {
    expect(matchesAllPhrases('so   much\nfun', ['much fun'])).toBe(true)
    expect(matchesAllPhrases('so much fun', ['  MUCH   fun '])).toBe(true)
  })

  it('matches substrings inside words', () => {
    expect(matchesAllPhrases('unexpensive', ['expensive'])).toBe(true)
  })

  it('matches every comment when the phrase list is empty', () => {
    expect(matchesAllPhrases('anything at all', [])).toBe(true)
    expect(matchesAllPhrases('', [])).toBe(true)
  })

  it('never loses matches when a required phrase is dropped', () => {
    const comments = ['great tip at 1:23', 'great video', 'tip: skip to 4:00', 'nothing here']
    const withBoth = comments.filter((c) => matchesAllPhrases(c, ['great', 'tip']))
    const withOne = comments.filter((c) => matchesAllPhrases(c, ['great']))
    expect(withBoth).toEqual(['great tip at 1:23'])
    expect(withOne).toEqual(['great tip at 1:23', 'great video'])
    for (const c of withBoth) expect(withOne).toContain(c)
  })
})

describe('createPhraseMatcher', () => {
  it('agrees with matchesAllPhrases', () => {
    const phrases = ['Great', 'check']
    const match = createPhraseMatcher(phrases)
    for (const c of ['great, check it', 'GREAT', 'check great', '']) {
      expect(match(c)).toBe(matchesAllPhrases(c, phrases))
    }
  })
})
