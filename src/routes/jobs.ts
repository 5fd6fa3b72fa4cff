import { Router } from 'express'
import { errorMessage, InvalidTransitionError, LedgerUnavailableError } from '../errors.js'
import type { DocumentProcessor } from '../services/documentProcessor.js'
import type { DocumentTracker } from '../services/documentTracker.js'
import type { Logger } from '../utils/logger.js'

export interface JobsRouterOptions {
  tracker: DocumentTracker
  processor: DocumentProcessor
  logger: Logger
}

export function createJobsRouter(options: JobsRouterOptions): Router {
  const { tracker, processor, logger } = options
  const router = Router()

  router.get('/jobs/:id', async (req, res) => {
    try {
      const job = await tracker.get(req.params.id)
      if (!job) {
        res.status(404).json({ success: false, error: 'Job not found' })
        return
      }
      res.json({ success: true, job })
    } catch (err) {
      const status = err instanceof LedgerUnavailableError ? 503 : 500
      logger.error({ err: errorMessage(err), jobId: req.params.id }, 'Failed to load job')
      res.status(status).json({ success: false, error: 'Failed to load job' })
    }
  })

  router.post('/jobs/:id/reprocess', async (req, res) => {
    try {
      const result = await processor.reprocess(req.params.id)
      if (!result) {
        res.status(404).json({ success: false, error: 'Job not found' })
        return
      }
      if (result.status === 'duplicate_skipped') {
        res.status(409).json({ success: false, error: 'Job is already being processed', result })
        return
      }
      res.status(result.status === 'failed' && result.retryable ? 503 : 200).json({
        success: result.status === 'processed',
        result
      })
    } catch (err) {
      if (err instanceof InvalidTransitionError) {
        res.status(409).json({ success: false, error: err.message })
        return
      }
      const status = err instanceof LedgerUnavailableError ? 503 : 500
      logger.error({ err: errorMessage(err), jobId: req.params.id }, 'Failed to reprocess job')
      res.status(status).json({ success: false, error: 'Failed to reprocess job' })
    }
  })

  return router
}
