import type { Logger } from 'pino'
import { NotificationError, errorMessage } from '../lib/errors'
import { getLogger } from '../lib/logger'

/**
 * Outbound mail transport. send() resolves true when the message was accepted for delivery
 * and false otherwise; it never rejects.
 */
export interface Notifier {
  send(email: string, subject: string, body: string, html?: string): Promise<boolean>
}

const RESEND_ENDPOINT = 'https://api.resend.com/emails'

export interface ResendNotifierOptions {
  apiKey: string
  from: string
  fetchImpl?: typeof fetch
  logger?: Logger
}

export class ResendNotifier implements Notifier {
  private readonly fetchImpl: typeof fetch
  private readonly log: Logger

  constructor(private readonly options: ResendNotifierOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init))
    this.log = options.logger ?? getLogger('worker')
  }

  async send(email: string, subject: string, body: string, html?: string): Promise<boolean> {
    try {
      const id = await this.deliver(email, subject, body, html)
      this.log.info({ msg: 'Report email accepted', provider: 'resend', messageId: id ?? 'n/a' })
      return true
    } catch (err) {
      const status = err instanceof NotificationError ? err.status : undefined
      this.log.error({ msg: 'Report email failed', provider: 'resend', status, error: errorMessage(err) })
      return false
    }
  }

  private async deliver(email: string, subject: string, text: string, html?: string): Promise<string | undefined> {
    const res = await this.fetchImpl(RESEND_ENDPOINT, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.options.apiKey}`,
      },
      body: JSON.stringify({
        from: this.options.from,
        to: [email],
        subject,
        text,
        ...(html ? { html } : {}),
      }),
    })
    const responseBody = await res.text()
    if (!res.ok) {
      throw new NotificationError(`Resend error ${res.status}: ${responseBody || res.statusText}`, res.status)
    }
    try {
      const data: unknown = JSON.parse(responseBody)
      if (typeof data === 'object' && data !== null && 'id' in data && typeof data.id === 'string') return data.id
    } catch {
      // accepted; id is informational only
    }
    return undefined
  }
}

/** Used when no mail provider is configured: logs the report and reports it as not sent. */
export class LogNotifier implements Notifier {
  constructor(private readonly log: Logger = getLogger('worker')) {}

  async send(_email: string, subject: string, body: string): Promise<boolean> {
    this.log.warn({ msg: 'RESEND_API_KEY not set; report not emailed', subject, bodyLength: body.length })
    return false
  }
}
