import { Router } from 'express'
import { randomBytes } from 'crypto'
import { performance } from 'perf_hooks'
import { errorMessage } from '../errors.js'

/** The slice of the ioredis client the health check uses. */
export interface RedisHealthClient {
  status: string
  ping(): Promise<string>
  set(key: string, value: string, mode: 'EX', seconds: number, condition: 'NX'): Promise<'OK' | null>
  del(key: string): Promise<number>
}

export interface HealthRouterOptions {
  redis?: RedisHealthClient
  now?: () => number
}

export function createHealthRouter(options: HealthRouterOptions): Router {
  const router = Router()
  const { redis } = options
  const now = options.now ?? Date.now

  router.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date(now()).toISOString(),
      stores: redis ? 'redis' : 'memory'
    })
  })

  // Round-trips a throwaway key so a read-only or full instance shows up as a failure
  router.get('/health/redis', async (_req, res) => {
    if (!redis) {
      res.status(503).json({ redis: 'fail', reason: 'Redis not configured' })
      return
    }
    const start = performance.now()
    const key = `test:health:${randomBytes(8).toString('hex')}`
    try {
      if (redis.status !== 'ready') {
        throw new Error(`connection is ${redis.status}`)
      }
      await redis.ping()
      if ((await redis.set(key, 'ok', 'EX', 5, 'NX')) !== 'OK') {
        throw new Error('Failed to write test key')
      }
      if ((await redis.del(key)) !== 1) {
        throw new Error('Failed to delete test key')
      }
      res.json({ redis: 'ok', writeDelete: 'ok', latencyMs: performance.now() - start })
    } catch (err) {
      res.status(503).json({ redis: 'fail', reason: errorMessage(err) })
    }
  })

  return router
}
