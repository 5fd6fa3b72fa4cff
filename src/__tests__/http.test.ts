import { describe, it, expect, beforeEach } from '@jest/globals'
import express from 'express'
import request from 'supertest'
import { loadConfig } from '../config.js'
import { ProcessingError } from '../errors.js'
import { createHealthRouter, type RedisHealthClient } from '../routes/health.js'
import { buildServices, createApp } from '../server.js'
import { documentJobId } from '../utils/hash.js'
import { FakePlatform, FakeProcessing, FakeStorage, silentLogger } from './support/fakes.js'

const SENDER = '15550004444'
const API_KEY = 'test-token'

function payload(messages: Array<Record<string, unknown>>) {
  return {
    object: 'whatsapp_business_account',
    entry: [{ id: 'waba-1', changes: [{ field: 'messages', value: { messaging_product: 'whatsapp', messages } }] }]
  }
}

function textMessage(id: string, body: string) {
  return { id, from: SENDER, timestamp: '1700000000', type: 'text', text: { body } }
}

function documentMessage(id: string, mediaRef: string) {
  return { id, from: SENDER, type: 'document', document: { id: mediaRef, mime_type: 'application/pdf', filename: 'invoice.pdf' } }
}

describe('HTTP surface', () => {
  let platform: FakePlatform
  let storage: FakeStorage
  let processing: FakeProcessing
  let app: express.Express

  beforeEach(() => {
    platform = new FakePlatform()
    storage = new FakeStorage()
    processing = new FakeProcessing()
    const config = loadConfig({
      API_TOKENS: API_KEY,
      WHATSAPP_VERIFY_TOKEN: 'verify-me',
      RETRY_BASE_DELAY_MS: '1',
      RETRY_MAX_DELAY_MS: '1'
    })
    const services = buildServices(config, { platform, storage, processing, logger: silentLogger })
    app = createApp(services, silentLogger)
  })

  describe('GET /webhook', () => {
    it('echoes the challenge when the verify token matches', async () => {
      const res = await request(app)
        .get('/webhook')
        .query({ 'hub.mode': 'subscribe', 'hub.verify_token': 'verify-me', 'hub.challenge': '12345' })
      expect(res.status).toBe(200)
      expect(res.text).toBe('12345')
    })

    it('refuses a wrong verify token', async () => {
      const res = await request(app)
        .get('/webhook')
        .query({ 'hub.mode': 'subscribe', 'hub.verify_token': 'nope', 'hub.challenge': '12345' })
      expect(res.status).toBe(403)
      expect(res.body).toEqual({ success: false, error: 'Verification failed' })
    })
  })

  describe('POST /webhook', () => {
    it('handles a command once across redeliveries', async () => {
      const body = payload([textMessage('wamid.in1', 'help')])
      const first = await request(app).post('/webhook').send(body)
      const second = await request(app).post('/webhook').send(body)

      expect(first.status).toBe(200)
      expect(first.body).toEqual({ success: true, results: [{ status: 'processed', messageId: 'wamid.in1', detail: 'help' }] })
      expect(second.body.results).toEqual([{ status: 'duplicate_skipped', messageId: 'wamid.in1', reason: 'message_seen' }])
      expect(platform.sent).toHaveLength(1)
    })

    it('ingests a document and exposes its job', async () => {
      platform.media.set('media-42', Buffer.from('%PDF-1.4'))
      const res = await request(app).post('/webhook').send(payload([documentMessage('wamid.in2', 'media-42')]))
      expect(res.status).toBe(200)
      expect(res.body.results[0]).toMatchObject({ status: 'processed', detail: 'completed' })

      const jobId = documentJobId(SENDER, 'media-42')
      const job = await request(app).get(`/jobs/${jobId}`).set('x-api-key', API_KEY)
      expect(job.status).toBe(200)
      expect(job.body.job).toMatchObject({ jobId, state: 'Completed', storageLocation: `mem://${jobId}` })
    })

    it('acknowledges status-only callbacks without work', async () => {
      const body = {
        object: 'whatsapp_business_account',
        entry: [{ changes: [{ value: { statuses: [{ id: 'wamid.out1', status: 'read' }] } }] }]
      }
      const res = await request(app).post('/webhook').send(body)
      expect(res.status).toBe(200)
      expect(res.body).toEqual({ success: true, results: [] })
    })

    it('rejects a malformed payload', async () => {
      const res = await request(app).post('/webhook').send({ entry: 'nope' })
      expect(res.status).toBe(400)
      expect(res.body).toEqual({ success: false, error: 'Invalid webhook payload' })
    })

    it('answers 503 so the platform redelivers when a reply could not be sent', async () => {
      platform.sendFailures.push(new TypeError('fetch failed'), new TypeError('fetch failed'), new TypeError('fetch failed'))
      const body = payload([textMessage('wamid.in3', 'help')])

      const failed = await request(app).post('/webhook').send(body)
      expect(failed.status).toBe(503)
      expect(failed.body.results).toEqual([
        { status: 'failed', messageId: 'wamid.in3', reason: 'reply_failed:fetch failed', retryable: true }
      ])

      const redelivered = await request(app).post('/webhook').send(body)
      expect(redelivered.status).toBe(200)
      expect(platform.sent).toHaveLength(1)
    })
  })

  describe('jobs API', () => {
    it('requires an API key', async () => {
      const res = await request(app).get('/jobs/anything')
      expect(res.status).toBe(401)
      expect(res.body).toEqual({ success: false, error: 'Invalid or missing API key' })
    })

    it('accepts a bearer token', async () => {
      const res = await request(app).get('/jobs/anything').set('authorization', `Bearer ${API_KEY}`)
      expect(res.status).toBe(404)
      expect(res.body).toEqual({ success: false, error: 'Job not found' })
    })

    it('reprocesses a stored job whose processing failed', async () => {
      platform.media.set('media-7', Buffer.from('%PDF-1.4'))
      processing.failures.push(new ProcessingError('model unavailable'))
      await request(app).post('/webhook').send(payload([documentMessage('wamid.in4', 'media-7')]))
      const jobId = documentJobId(SENDER, 'media-7')

      const res = await request(app).post(`/jobs/${jobId}/reprocess`).set('x-api-key', API_KEY)
      expect(res.status).toBe(200)
      expect(res.body.success).toBe(true)
      expect(res.body.result).toMatchObject({ status: 'processed', messageId: jobId, detail: 'completed' })
      expect(platform.mediaCalls).toEqual(['media-7'])

      const again = await request(app).post(`/jobs/${jobId}/reprocess`).set('x-api-key', API_KEY)
      expect(again.status).toBe(409)
    })

    it('answers 409 to the loser of two concurrent reprocess requests', async () => {
      platform.media.set('media-8', Buffer.from('%PDF-1.4'))
      processing.failures.push(new ProcessingError('model unavailable'))
      await request(app).post('/webhook').send(payload([documentMessage('wamid.in5', 'media-8')]))
      const jobId = documentJobId(SENDER, 'media-8')

      const responses = await Promise.all([
        request(app).post(`/jobs/${jobId}/reprocess`).set('x-api-key', API_KEY),
        request(app).post(`/jobs/${jobId}/reprocess`).set('x-api-key', API_KEY)
      ])

      expect(responses.map((r) => r.status).sort()).toEqual([200, 409])
      expect(processing.runs).toHaveLength(2)
    })

    it('returns 404 when reprocessing an unknown job', async () => {
      const res = await request(app).post('/jobs/unknown/reprocess').set('x-api-key', API_KEY)
      expect(res.status).toBe(404)
    })
  })

  describe('health', () => {
    it('reports the in-process stores', async () => {
      const res = await request(app).get('/health')
      expect(res.status).toBe(200)
      expect(res.body).toMatchObject({ status: 'ok', stores: 'memory' })
    })

    it('reports Redis as unavailable when it is not configured', async () => {
      const res = await request(app).get('/health/redis')
      expect(res.status).toBe(503)
      expect(res.body).toEqual({ redis: 'fail', reason: 'Redis not configured' })
    })
  })
})

describe('GET /health/redis', () => {
  function healthApp(redis: RedisHealthClient): express.Express {
    const app = express()
    app.use(createHealthRouter({ redis }))
    return app
  }

  function fakeRedis(status: string, writes = true): RedisHealthClient & { keys: Set<string> } {
    const keys = new Set<string>()
    return {
      status,
      keys,
      async ping() {
        return 'PONG'
      },
      async set(key: string) {
        if (!writes) return null
        keys.add(key)
        return 'OK'
      },
      async del(key: string) {
        return keys.delete(key) ? 1 : 0
      }
    }
  }

  it('round-trips a throwaway key', async () => {
    const redis = fakeRedis('ready')
    const res = await request(healthApp(redis)).get('/health/redis')
    expect(res.status).toBe(200)
    expect(res.body).toMatchObject({ redis: 'ok', writeDelete: 'ok' })
    expect(typeof res.body.latencyMs).toBe('number')
    expect(redis.keys.size).toBe(0)
  })

  it('fails while the connection is not ready', async () => {
    const res = await request(healthApp(fakeRedis('reconnecting'))).get('/health/redis')
    expect(res.status).toBe(503)
    expect(res.body).toEqual({ redis: 'fail', reason: 'connection is reconnecting' })
  })

  it('fails when the test key cannot be written', async () => {
    const res = await request(healthApp(fakeRedis('ready', false))).get('/health/redis')
    expect(res.status).toBe(503)
    expect(res.body).toEqual({ redis: 'fail', reason: 'Failed to write test key' })
  })
})
