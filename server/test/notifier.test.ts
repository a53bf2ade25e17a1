import { describe, it, expect } from 'vitest'
import { LogNotifier, ResendNotifier } from '../src/services/notifier'

interface Captured {
  url: string
  init?: RequestInit
}

function capture(response: () => Response) {
  const calls: Captured[] = []
  const impl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init })
    return response()
  }
  return { impl, calls }
}

describe('ResendNotifier', () => {
  it('posts the message to Resend and reports acceptance', async () => {
    const { impl, calls } = capture(() => new Response(JSON.stringify({ id: 'msg-1' }), { status: 200 }))
    const notifier = new ResendNotifier({ apiKey: 'test-resend-key', from: 'Reports <reports@example.com>', fetchImpl: impl })

    const sent = await notifier.send('user@example.com', 'Subject line', 'plain body', '<p>html body</p>')

    expect(sent).toBe(true)
    expect(calls).toHaveLength(1)
    expect(calls[0]?.url).toBe('https://api.resend.com/emails')
    expect(calls[0]?.init?.method).toBe('POST')
    expect(calls[0]?.init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-resend-key',
    })
    expect(JSON.parse(String(calls[0]?.init?.body))).toEqual({
      from: 'Reports <reports@example.com>',
      to: ['user@example.com'],
      subject: 'Subject line',
      text: 'plain body',
      html: '<p>html body</p>',
    })
  })

  it('leaves html out when none is given', async () => {
    const { impl, calls } = capture(() => new Response('{}', { status: 200 }))
    const notifier = new ResendNotifier({ apiKey: 'test-resend-key', from: 'a@example.com', fetchImpl: impl })

    expect(await notifier.send('user@example.com', 's', 't')).toBe(true)
    expect(JSON.parse(String(calls[0]?.init?.body))).not.toHaveProperty('html')
  })

  it('returns false when the provider rejects the message', async () => {
    const { impl } = capture(() => new Response('{"message":"invalid from"}', { status: 422 }))
    const notifier = new ResendNotifier({ apiKey: 'test-resend-key', from: 'a@example.com', fetchImpl: impl })

    expect(await notifier.send('user@example.com', 's', 't')).toBe(false)
  })

  it('returns false instead of throwing when the request fails', async () => {
    const impl: typeof fetch = async () => {
      throw new TypeError('fetch failed')
    }
    const notifier = new ResendNotifier({ apiKey: 'test-resend-key', from: 'a@example.com', fetchImpl: impl })

    await expect(notifier.send('user@example.com', 's', 't')).resolves.toBe(false)
  })
})

describe('LogNotifier', () => {
  it('never reports a message as sent', async () => {
    expect(await new LogNotifier().send('user@example.com', 's', 't')).toBe(false)
  })
})
