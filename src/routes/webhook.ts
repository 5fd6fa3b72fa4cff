import { Router } from 'express'
import { webhookBodySchema } from '../dto/messages.js'
import { errorMessage } from '../errors.js'
import type { EventRouter } from '../services/eventRouter.js'
import type { Logger } from '../utils/logger.js'

export interface WebhookRouterOptions {
  router: EventRouter
  verifyToken: string | undefined
  logger: Logger
}

export function createWebhookRouter(options: WebhookRouterOptions): Router {
  const { router: events, verifyToken, logger } = options
  const router = Router()

  // Subscription handshake: echo hub.challenge when the verify token matches
  router.get('/webhook', (req, res) => {
    const mode = req.query['hub.mode']
    const token = req.query['hub.verify_token']
    const challenge = req.query['hub.challenge']
    if (verifyToken && mode === 'subscribe' && token === verifyToken && typeof challenge === 'string') {
      res.status(200).send(challenge)
      return
    }
    res.status(403).json({ success: false, error: 'Verification failed' })
  })

  router.post('/webhook', async (req, res) => {
    const parse = webhookBodySchema.safeParse(req.body)
    if (!parse.success) {
      logger.warn({ issues: parse.error.issues.length }, 'Rejected malformed webhook payload')
      res.status(400).json({ success: false, error: 'Invalid webhook payload' })
      return
    }
    try {
      const results = await events.handleWebhook(parse.data)
      // 503 makes the platform redeliver; already handled messages dedupe on the way back in
      const retry = results.some((r) => r.status === 'failed' && r.retryable)
      res.status(retry ? 503 : 200).json({ success: !retry, results })
    } catch (err) {
      logger.error({ err: errorMessage(err) }, 'Webhook handling failed')
      res.status(500).json({ success: false, error: 'Failed to handle webhook' })
    }
  })

  return router
}
