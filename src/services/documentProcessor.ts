import type { DocumentMetadata, DocumentStorage, Processing } from '../core/interfaces.js'
import type { DocumentJob } from '../dto/jobs.js'
import type { HandledResult, MediaPayload, RoutedEvent } from '../dto/messages.js'
import {
  AuthError,
  errorMessage,
  InvalidTransitionError,
  LeaseLostError,
  LedgerUnavailableError,
  type PipelineStage
} from '../errors.js'
import { documentJobId } from '../utils/hash.js'
import { createLogger, maskPhone, type Logger } from '../utils/logger.js'
import { RetryExhaustedError, withTimeout, type RetryPolicy } from '../utils/retry.js'
import type { AlertChannel } from './alerts.js'
import type { DocumentDownloader } from './documentDownloader.js'
import type { DocumentTracker, JobHandle } from './documentTracker.js'
import type { MessageSender } from './messageSender.js'

export type DocumentEvent = Extract<RoutedEvent, { type: 'document' }>

export interface DocumentProcessorOptions {
  tracker: DocumentTracker
  downloader: DocumentDownloader
  storage: DocumentStorage
  processing: Processing
  sender: MessageSender
  retry: RetryPolicy
  stepTimeoutMs: number
  alerts?: AlertChannel
  logger?: Logger
}

type StepOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown }

const FAILURE_TEXT: Record<PipelineStage, (filename: string) => string> = {
  download: (filename) => `Sorry, I couldn't download "${filename}". Please send it again.`,
  store: (filename) => `Sorry, I couldn't save "${filename}". Please try again later.`,
  process: (filename) =>
    `"${filename}" was saved but could not be processed. It is kept and can be processed again later.`
}

export class DocumentProcessor {
  private readonly tracker: DocumentTracker
  private readonly downloader: DocumentDownloader
  private readonly storage: DocumentStorage
  private readonly processing: Processing
  private readonly sender: MessageSender
  private readonly retry: RetryPolicy
  private readonly stepTimeoutMs: number
  private readonly alerts: AlertChannel | undefined
  private readonly logger: Logger

  constructor(options: DocumentProcessorOptions) {
    this.tracker = options.tracker
    this.downloader = options.downloader
    this.storage = options.storage
    this.processing = options.processing
    this.sender = options.sender
    this.retry = options.retry
    this.stepTimeoutMs = options.stepTimeoutMs
    this.alerts = options.alerts
    this.logger = options.logger ?? createLogger('document-processor')
  }

  /**
   * Takes one document delivery through claim, download, store, process and
   * notify. Any number of deliveries of the same document, concurrent or
   * not, produce one artifact, one processing run and one terminal reply.
   */
  async handleDocumentEvent(event: DocumentEvent): Promise<HandledResult> {
    const { messageId, sender } = event.message
    const media: MediaPayload = event.media
    const jobId = documentJobId(sender, media.mediaRef)
    const log = this.logger.child({ jobId, messageId, sender: maskPhone(sender) })

    try {
      const acquired = await this.tracker.createOrGet({
        jobId,
        sender,
        mediaRef: media.mediaRef,
        filename: media.filename,
        mimeType: media.mimeType,
        messageId,
        ...(media.caption ? { description: media.caption } : {})
      })

      if (acquired.outcome === 'terminal') {
        log.info({ evt: 'duplicate_skipped', state: acquired.job.state }, 'Document already finished')
        return { status: 'duplicate_skipped', messageId, reason: 'job_terminal', job: acquired.job }
      }
      if (acquired.outcome === 'busy') {
        log.info({ evt: 'duplicate_skipped', state: acquired.job.state }, 'Document is being handled by another worker')
        return { status: 'duplicate_skipped', messageId, reason: 'job_in_progress', job: acquired.job }
      }

      if (!acquired.reclaimed) {
        await this.notify(acquired.handle.job, `Received "${media.filename}". I'll let you know once it has been processed.`)
      }
      return await this.runPipeline(acquired.handle, messageId, log)
    } catch (err) {
      return this.handlePipelineError(err, messageId, log)
    }
  }

  /**
   * Runs processing again for a job that was stored but failed to process.
   * Returns null when the job does not exist.
   */
  async reprocess(jobId: string): Promise<HandledResult | null> {
    const log = this.logger.child({ jobId })
    let handle: JobHandle | null
    try {
      handle = await this.tracker.reopen(jobId)
    } catch (err) {
      // A concurrent reopen won the compare-and-set
      if (err instanceof LeaseLostError) return this.handlePipelineError(err, jobId, log)
      throw err
    }
    if (!handle) return null
    log.info({ evt: 'job_reprocess' }, 'Reprocessing stored document')
    try {
      return await this.runPipeline(handle, jobId, log)
    } catch (err) {
      return this.handlePipelineError(err, jobId, log)
    }
  }

  private async runPipeline(initial: JobHandle, messageId: string, log: Logger): Promise<HandledResult> {
    let handle = initial
    const { sender, filename, mimeType, messageId: sourceMessageId, description } = handle.job
    const metadata: DocumentMetadata = {
      jobId: handle.jobId,
      sender,
      filename,
      mimeType,
      ...(sourceMessageId ? { messageId: sourceMessageId } : {}),
      ...(description ? { description } : {})
    }

    const resumeAt = handle.job.state === 'Stored' ? handle.job.storageLocation : null
    if (resumeAt && !(await this.artifactExists(resumeAt, log))) {
      handle = await this.tracker.restartDownload(handle)
    }

    if (handle.job.state === 'Received') {
      handle = await this.tracker.transition(handle, 'Downloading')
      const mediaRef = handle.job.mediaRef
      const downloaded = await this.step(handle.jobId, 'download', (signal) => this.downloader.download(mediaRef, signal), log)
      if (!downloaded.ok) return this.failJob(handle, 'download', downloaded.error, messageId)
      handle = await this.tracker.transition(handle, 'Downloaded')

      handle = await this.tracker.transition(handle, 'Storing')
      const bytes = downloaded.value
      const stored = await this.step(handle.jobId, 'store', (signal) => this.storage.store(bytes, metadata, signal), log)
      if (!stored.ok) return this.failJob(handle, 'store', stored.error, messageId)
      handle = await this.tracker.transition(handle, 'Stored', { storageLocation: stored.value })
    }

    if (handle.job.state !== 'Stored' || !handle.job.storageLocation) {
      throw new InvalidTransitionError(`job ${handle.jobId} cannot be processed from ${handle.job.state}`)
    }

    const location = handle.job.storageLocation
    handle = await this.tracker.transition(handle, 'Processing')
    const processed = await this.step(handle.jobId, 'process', (signal) => this.processing.run(location, metadata, signal), log)
    if (!processed.ok) return this.failJob(handle, 'process', processed.error, messageId)
    handle = await this.tracker.transition(handle, 'Completed', { result: processed.value })

    await this.notify(handle.job, `Done: "${handle.job.filename}" has been stored and processed.`)
    return { status: 'processed', messageId, detail: 'completed', job: handle.job }
  }

  private async artifactExists(location: string, log: Logger): Promise<boolean> {
    try {
      return await withTimeout('exists', this.stepTimeoutMs, () => this.storage.exists(location))
    } catch (err) {
      log.warn({ evt: 'artifact_check_failed', location, err: errorMessage(err) }, 'Could not verify stored artifact')
      return false
    }
  }

  private async step<T>(
    jobId: string,
    stage: PipelineStage,
    fn: (signal: AbortSignal) => Promise<T>,
    log: Logger
  ): Promise<StepOutcome<T>> {
    try {
      const outcome = await this.retry.execute(
        () => withTimeout(stage, this.stepTimeoutMs, fn),
        {
          onRetry: ({ attempt, delayMs, err }) => {
            log.warn({ evt: 'step_retry', stage, attempt, delayMs, err: errorMessage(err) }, 'Pipeline step failed, retrying')
          }
        }
      )
      return { ok: true, value: outcome.value }
    } catch (err) {
      const cause = err instanceof RetryExhaustedError ? err.lastError : err
      if (cause instanceof AuthError) {
        this.alerts?.publish({ kind: 'auth_failure', component: 'document-processor', message: cause.message, at: Date.now() })
      }
      log.error({ evt: 'step_failed', jobId, stage, err: errorMessage(cause) }, 'Pipeline step failed')
      return { ok: false, error: cause }
    }
  }

  private async failJob(handle: JobHandle, stage: PipelineStage, err: unknown, messageId: string): Promise<HandledResult> {
    // Only the worker whose Failed write landed gets past this line
    const failed = await this.tracker.fail(handle, stage, err)
    await this.notify(failed.job, FAILURE_TEXT[stage](failed.job.filename))
    return { status: 'failed', messageId, reason: `${stage}_failed`, retryable: false, job: failed.job }
  }

  private async notify(job: DocumentJob, body: string): Promise<void> {
    const result = await this.sender.send({
      recipient: job.sender,
      body,
      replyKind: 'document_status',
      bypassDedup: true
    })
    if (result.status === 'failed') {
      this.logger.error({ jobId: job.jobId, state: job.state, reason: result.reason }, 'Status notification not delivered')
    }
  }

  private handlePipelineError(err: unknown, messageId: string, log: Logger): HandledResult {
    if (err instanceof LeaseLostError) {
      log.warn({ evt: 'duplicate_skipped', err: err.message }, 'Lost the job lease, stopping')
      return { status: 'duplicate_skipped', messageId, reason: 'lease_lost' }
    }
    if (err instanceof LedgerUnavailableError) {
      log.error({ evt: 'ledger_unavailable', err: err.message }, 'Job store unavailable')
      this.alerts?.publish({ kind: 'ledger_unavailable', component: 'document-processor', message: err.message, at: Date.now() })
      return { status: 'failed', messageId, reason: 'ledger_unavailable', retryable: true }
    }
    if (err instanceof InvalidTransitionError) {
      log.error({ err: err.message }, 'Invalid job transition')
      return { status: 'failed', messageId, reason: 'invalid_transition', retryable: false }
    }
    throw err
  }
}
