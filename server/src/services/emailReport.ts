import type { MatchedComment } from '../models/Job'

export interface ReportInput {
  videoUrl: string
  phrases: string[]
  comments: MatchedComment[]
  truncated?: boolean
  generatedAt?: Date
}

export interface EmailReport {
  subject: string
  text: string
  html: string
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
]

const TRUNCATED_NOTE = 'Only the first comments up to the configured limit were searched.'

const pad = (n: number) => String(n).padStart(2, '0')

/** e.g. "October 19, 2026 at 09:05 PM UTC" */
export function formatGeneratedOn(date: Date): string {
  const hours = date.getUTCHours()
  const h12 = hours % 12 === 0 ? 12 : hours % 12
  const meridiem = hours < 12 ? 'AM' : 'PM'
  return `${MONTHS[date.getUTCMonth()]} ${pad(date.getUTCDate())}, ${date.getUTCFullYear()} at ${pad(h12)}:${pad(date.getUTCMinutes())} ${meridiem} UTC`
}

export function reportSubject(phrases: string[]): string {
  return `YouTube Comment Search Results: ${phrases.join(', ')}`
}

function textBody(input: ReportInput, generatedOn: string): string {
  const lines = [
    `Video: ${input.videoUrl}`,
    `Phrases: ${input.phrases.join(', ')}`,
    `Generated on ${generatedOn}`,
    '',
    `Found ${input.comments.length} comment(s) containing all the phrases.`,
  ]
  if (input.truncated) lines.push(TRUNCATED_NOTE)
  input.comments.forEach((c, i) => {
    lines.push('', `=== Match #${i + 1} ===`)
    lines.push(`Comment by   : ${c.author}`)
    lines.push(`Comment text : ${c.text}`)
    lines.push(`Likes        : ${c.likes}`)
    lines.push(`Comment link : ${c.link}`)
    for (const ts of c.timestamps) {
      lines.push(`  ${ts.text} -> ${ts.link}`)
    }
  })
  return lines.join('\n')
}

function htmlBody(input: ReportInput, generatedOn: string): string {
  const items = input.comments
    .map((c) => {
      const stamps = c.timestamps
        .map((ts) => `<a href="${escapeHtml(ts.link)}">${escapeHtml(ts.text)}</a>`)
        .join(' ')
      return [
        '<li>',
        `<p><strong>${escapeHtml(c.author)}</strong> &middot; ${escapeHtml(c.published)} &middot; ${c.likes} likes</p>`,
        `<p>${escapeHtml(c.text)}</p>`,
        stamps ? `<p>Jump to: ${stamps}</p>` : '',
        `<p><a href="${escapeHtml(c.link)}">View comment</a></p>`,
        '</li>',
      ].join('')
    })
    .join('\n')
  return [
    '<html><body>',
    '<h2>Comment search results</h2>',
    `<p>Video: <a href="${escapeHtml(input.videoUrl)}">${escapeHtml(input.videoUrl)}</a></p>`,
    `<p>Phrases: ${input.phrases.map(escapeHtml).join(', ')}</p>`,
    `<p>Found ${input.comments.length} matching comment(s). Generated on ${escapeHtml(generatedOn)}.</p>`,
    input.truncated ? `<p><em>${TRUNCATED_NOTE}</em></p>` : '',
    `<ol>\n${items}\n</ol>`,
    '</body></html>',
  ].join('\n')
}

export function buildReport(input: ReportInput): EmailReport {
  const generatedOn = formatGeneratedOn(input.generatedAt ?? new Date())
  return {
    subject: reportSubject(input.phrases),
    text: textBody(input, generatedOn),
    html: htmlBody(input, generatedOn),
  }
}
