import request from 'supertest'
import { describe, it, expect } from 'vitest'
import { createApp } from '../src/app'
import { JobService } from '../src/services/jobService'
import { StatusReader } from '../src/services/statusReader'
import { JobQueue } from '../src/queue/jobQueue'
import { MemoryJobStore } from '../src/store/jobStore'
import type { JobRecord } from '../src/models/Job'
import type { WorkerState } from '../src/workers/commentWorker'
import { VIDEO_URL, makeJob } from './helpers'

const body = { video_url: VIDEO_URL, phrases: ['great', 'tip'], email: 'user@example.com' }

function workerState(running: boolean): () => WorkerState {
  return () => ({ running, currentJobId: null, completed: 0, failed: 0, lastActivityAt: null })
}

async function buildApp(seed: JobRecord[] = [], state?: () => WorkerState) {
  const store = new MemoryJobStore(seed)
  await store.open()
  const queue = new JobQueue()
  const jobs = new JobService(store, queue)
  const app = createApp({
    config: { env: 'test', release: 'test-release', corsOrigins: ['https://app.example.com'] },
    jobs,
    statusReader: new StatusReader(store),
    queue,
    workerState: state,
  })
  return { app, store, queue }
}

describe('POST /api/submit', () => {
  it('accepts a valid submission and returns its id', async () => {
    const { app, store, queue } = await buildApp()

    const res = await request(app).post('/api/submit').set('x-request-id', 'req-123').send(body)

    expect(res.status).toBe(200)
    expect(res.body).toEqual({
      request_id: expect.any(String),
      status: 'pending',
      message: 'Request submitted successfully',
    })
    expect(res.headers['x-request-id']).toBe('req-123')
    const job = await store.get(res.body.request_id)
    expect(job).toMatchObject({ status: 'pending', requestId: 'req-123', phrases: ['great', 'tip'] })
    expect(queue.snapshot()).toEqual([res.body.request_id])
  })

  it('rejects an invalid submission with the offending field', async () => {
    const { app, store } = await buildApp()

    const res = await request(app)
      .post('/api/submit')
      .send({ video_url: VIDEO_URL, phrases: ['great'] })

    expect(res.status).toBe(400)
    expect(res.body).toEqual({ error: 'Missing required field: email', field: 'email' })
    expect(await store.list()).toEqual([])
  })

  it('rejects a URL that is not a YouTube video before anything is stored', async () => {
    const { app, store, queue } = await buildApp()

    const res = await request(app)
      .post('/api/submit')
      .send({ ...body, video_url: 'https://vimeo.com/123456' })

    expect(res.status).toBe(400)
    expect(res.body).toEqual({ error: 'Invalid YouTube URL', field: 'video_url' })
    expect(await store.list()).toEqual([])
    expect(queue.snapshot()).toEqual([])
  })

  it('rejects a video_url without a scheme', async () => {
    const { app } = await buildApp()

    const res = await request(app)
      .post('/api/submit')
      .send({ ...body, video_url: 'www.youtube.com/watch?v=dQw4w9WgXcQ' })

    expect(res.status).toBe(400)
    expect(res.body).toEqual({ error: 'video_url must be an http(s) URL', field: 'video_url' })
  })

  it('rejects a JSON array body', async () => {
    const { app } = await buildApp()
    const res = await request(app).post('/api/submit').send([body])
    expect(res.status).toBe(400)
    expect(res.body).toEqual({ error: 'Request body must be a JSON object' })
  })

  it('rejects malformed JSON', async () => {
    const { app } = await buildApp()

    const res = await request(app).post('/api/submit').set('Content-Type', 'application/json').send('{"video_url":')

    expect(res.status).toBe(400)
    expect(res.body).toEqual({ error: 'Request body must be valid JSON' })
  })

  it('generates a request id when none is sent', async () => {
    const { app } = await buildApp()
    const res = await request(app).post('/api/submit').send(body)
    expect(res.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/)
  })
})

describe('GET /api/status/:requestId', () => {
  it('returns the job view without caching', async () => {
    const { app } = await buildApp([makeJob('completed', 1, 'job-done')])

    const res = await request(app).get('/api/status/job-done')

    expect(res.status).toBe(200)
    expect(res.headers['cache-control']).toBe('no-store, no-cache, must-revalidate, proxy-revalidate')
    expect(res.body).toEqual({
      id: 'job-done',
      video_url: VIDEO_URL,
      phrases: ['great'],
      email: 'a@b.com',
      status: 'completed',
      submission_time: '2026-01-01T00:00:00.000Z',
      completion_time: '2026-01-01T00:01:00.000Z',
      result: { comment_count: 0, email_sent: false, comments_truncated: false, comments: [] },
    })
  })

  it('reports a freshly submitted job as pending', async () => {
    const { app } = await buildApp()
    const submitted = await request(app).post('/api/submit').send(body)

    const res = await request(app).get(`/api/status/${submitted.body.request_id}`)

    expect(res.status).toBe(200)
    expect(res.body.status).toBe('pending')
    expect(res.body).not.toHaveProperty('result')
  })

  it('returns 404 for an unknown id', async () => {
    const { app } = await buildApp()
    const res = await request(app).get('/api/status/does-not-exist')
    expect(res.status).toBe(404)
    expect(res.body).toEqual({ error: 'Request not found' })
  })
})

describe('health and ops routes', () => {
  it('GET /healthz always answers ok', async () => {
    const { app } = await buildApp()
    const res = await request(app).get('/healthz')
    expect(res.status).toBe(200)
    expect(res.body).toEqual({ status: 'ok' })
  })

  it('GET /readyz is ok while the worker runs', async () => {
    const { app } = await buildApp([], workerState(true))
    const res = await request(app).get('/readyz')
    expect(res.status).toBe(200)
    expect(res.body).toEqual({ status: 'ok' })
  })

  it('GET /readyz is unavailable when the worker loop has stopped', async () => {
    const { app } = await buildApp([], workerState(false))
    const res = await request(app).get('/readyz')
    expect(res.status).toBe(503)
    expect(res.body).toEqual({ status: 'unhealthy', worker: 'Worker loop is not running' })
  })

  it('GET /version reports the release', async () => {
    const { app } = await buildApp()
    const res = await request(app).get('/version')
    expect(res.body).toEqual({ service: 'api', release: 'test-release', env: 'test' })
  })

  it('GET /ops/queue reports counts and queue depth', async () => {
    const { app } = await buildApp(
      [makeJob('pending', 1, 'p1'), makeJob('completed', 2), makeJob('failed', 3)],
      workerState(true)
    )
    const res = await request(app).get('/ops/queue')
    expect(res.body).toEqual({
      pending: 1,
      processing: 0,
      completed: 1,
      failed: 1,
      queued: 0,
      workerRunning: true,
      currentJobId: null,
      lastActivityAt: null,
    })
  })

  it('answers unknown routes with a JSON 404', async () => {
    const { app } = await buildApp()
    const res = await request(app).get('/nope')
    expect(res.status).toBe(404)
    expect(res.body).toEqual({ error: 'Not found' })
  })
})

describe('CORS', () => {
  it('allows configured origins', async () => {
    const { app } = await buildApp()
    const res = await request(app).get('/healthz').set('Origin', 'https://app.example.com')
    expect(res.headers['access-control-allow-origin']).toBe('https://app.example.com')
  })

  it('does not allow unknown origins', async () => {
    const { app } = await buildApp()
    const res = await request(app).get('/healthz').set('Origin', 'https://evil.example.com')
    expect(res.headers['access-control-allow-origin']).toBeUndefined()
  })
})
