import { v4 as uuidv4 } from 'uuid'
import { isTerminal, type DocumentJob, type JobSeed, type JobState } from '../dto/jobs.js'
import {
  errorMessage,
  InvalidTransitionError,
  LeaseLostError,
  type PipelineStage
} from '../errors.js'
import { createLogger, type Logger } from '../utils/logger.js'
import type { JobStore } from './jobStore.js'

const ALLOWED: Record<JobState, readonly JobState[]> = {
  Received: ['Downloading', 'Failed'],
  Downloading: ['Downloaded', 'Failed'],
  Downloaded: ['Storing', 'Failed'],
  Storing: ['Stored', 'Failed'],
  Stored: ['Processing', 'Failed'],
  Processing: ['Completed', 'Failed'],
  Completed: [],
  Failed: []
}

export function canTransition(from: JobState, to: JobState): boolean {
  return ALLOWED[from].includes(to)
}

/**
 * Proof of ownership of a job. Only the holder of the current handle may
 * advance the job; every successful write returns a fresh handle.
 */
export interface JobHandle {
  readonly jobId: string
  readonly leaseToken: string
  readonly version: number
  readonly job: DocumentJob
}

export type AcquireResult =
  | { outcome: 'acquired'; handle: JobHandle; reclaimed: boolean }
  | { outcome: 'busy'; job: DocumentJob }
  | { outcome: 'terminal'; job: DocumentJob }

export type JobPatch = Partial<Pick<DocumentJob, 'storageLocation' | 'result'>>

export interface DocumentTrackerOptions {
  store: JobStore
  leaseMs: number
  retentionMs: number
  logger?: Logger
  now?: () => number
}

// Bound on compare-and-set retries when racing another writer on acquire
const MAX_ACQUIRE_ROUNDS = 5

export class DocumentTracker {
  private readonly store: JobStore
  private readonly leaseMs: number
  private readonly retentionMs: number
  private readonly logger: Logger
  private readonly now: () => number

  constructor(options: DocumentTrackerOptions) {
    this.store = options.store
    this.leaseMs = options.leaseMs
    this.retentionMs = options.retentionMs
    this.logger = options.logger ?? createLogger('document-tracker')
    this.now = options.now ?? Date.now
  }

  async get(jobId: string): Promise<DocumentJob | null> {
    const current = await this.store.load(jobId)
    return current ? current.job : null
  }

  /**
   * Creates the job for `seed` or attaches to the existing one. Exactly one
   * concurrent caller is handed a lease; the others see `busy` or
   * `terminal`. An expired lease is taken over and the job resumes from
   * the last durable step.
   */
  async createOrGet(seed: JobSeed): Promise<AcquireResult> {
    for (let round = 0; round < MAX_ACQUIRE_ROUNDS; round++) {
      const current = await this.store.load(seed.jobId)
      const now = this.now()

      if (!current) {
        const job: DocumentJob = {
          ...seed,
          state: 'Received',
          retryCount: 0,
          lastError: null,
          failedStage: null,
          leaseOwner: null,
          leaseExpiresAt: null,
          storageLocation: null,
          createdAt: now,
          updatedAt: now
        }
        const handle = await this.writeLeased(job, 0, now)
        if (handle) {
          this.logger.info({ evt: 'job_created', jobId: seed.jobId }, 'Document job created')
          return { outcome: 'acquired', handle, reclaimed: false }
        }
        continue
      }

      const { job, version } = current
      if (isTerminal(job.state)) {
        return { outcome: 'terminal', job }
      }
      if (job.leaseExpiresAt !== null && job.leaseExpiresAt > now) {
        return { outcome: 'busy', job }
      }

      const resumeState: JobState =
        job.storageLocation && (job.state === 'Stored' || job.state === 'Processing') ? 'Stored' : 'Received'
      const handle = await this.writeLeased(
        { ...job, state: resumeState, retryCount: job.retryCount + 1, updatedAt: now },
        version,
        now
      )
      if (handle) {
        this.logger.warn(
          { evt: 'job_reclaimed', jobId: job.jobId, from: job.state, resumeAt: resumeState, previousOwner: job.leaseOwner },
          'Expired lease reclaimed'
        )
        return { outcome: 'acquired', handle, reclaimed: true }
      }
    }

    // Still contended after every round: someone else is actively writing
    const latest = await this.store.load(seed.jobId)
    if (latest && isTerminal(latest.job.state)) {
      return { outcome: 'terminal', job: latest.job }
    }
    if (!latest) {
      throw new LeaseLostError(`job ${seed.jobId} vanished while acquiring`)
    }
    return { outcome: 'busy', job: latest.job }
  }

  /** Advances the job one step and renews the lease. */
  async transition(handle: JobHandle, to: JobState, patch: JobPatch = {}): Promise<JobHandle> {
    const from = handle.job.state
    if (!canTransition(from, to)) {
      throw new InvalidTransitionError(`job ${handle.jobId}: ${from} -> ${to} is not allowed`)
    }
    const next = await this.writeOwned(handle, { ...handle.job, ...patch, state: to })
    this.logger.info({ evt: 'job_transition', jobId: handle.jobId, from, to }, 'Job state changed')
    return next
  }

  /** Moves the job to Failed, recording the stage and the error message. */
  async fail(handle: JobHandle, stage: PipelineStage, err: unknown): Promise<JobHandle> {
    if (!canTransition(handle.job.state, 'Failed')) {
      throw new InvalidTransitionError(`job ${handle.jobId} is already ${handle.job.state}`)
    }
    const lastError = `${stage}:${errorMessage(err)}`
    const next = await this.writeOwned(handle, { ...handle.job, state: 'Failed', lastError, failedStage: stage })
    this.logger.warn(
      { evt: 'job_transition', jobId: handle.jobId, from: handle.job.state, to: 'Failed', lastError },
      'Job failed'
    )
    return next
  }

  /**
   * Puts a Failed job whose artifact is already stored back into Stored
   * under a new lease, so processing can run again without another
   * download. Returns null when no such job exists.
   */
  async reopen(jobId: string): Promise<JobHandle | null> {
    const current = await this.store.load(jobId)
    if (!current) return null
    const { job, version } = current
    if (job.state !== 'Failed' || !job.storageLocation) {
      throw new InvalidTransitionError(`job ${jobId} in state ${job.state} cannot be reopened`)
    }
    const now = this.now()
    const handle = await this.writeLeased(
      { ...job, state: 'Stored', lastError: null, failedStage: null, retryCount: job.retryCount + 1, updatedAt: now },
      version,
      now
    )
    if (!handle) {
      throw new LeaseLostError(`job ${jobId} changed while reopening`)
    }
    this.logger.info({ evt: 'job_reopened', jobId }, 'Failed job reopened for processing')
    return handle
  }

  /**
   * Sends a Stored job whose artifact has gone missing back to Received
   * under the same lease, so the next pass downloads and stores it again.
   */
  async restartDownload(handle: JobHandle): Promise<JobHandle> {
    if (handle.job.state !== 'Stored') {
      throw new InvalidTransitionError(`job ${handle.jobId} in state ${handle.job.state} cannot restart its download`)
    }
    const next = await this.writeOwned(handle, { ...handle.job, state: 'Received', storageLocation: null })
    this.logger.warn(
      { evt: 'job_transition', jobId: handle.jobId, from: 'Stored', to: 'Received', missing: handle.job.storageLocation },
      'Stored artifact missing, downloading again'
    )
    return next
  }

  private async writeOwned(handle: JobHandle, job: DocumentJob): Promise<JobHandle> {
    if (handle.job.leaseOwner !== handle.leaseToken) {
      throw new LeaseLostError(`job ${handle.jobId} is not leased by this handle`)
    }
    const now = this.now()
    const terminal = isTerminal(job.state)
    const next: DocumentJob = {
      ...job,
      leaseOwner: terminal ? null : handle.leaseToken,
      leaseExpiresAt: terminal ? null : now + this.leaseMs,
      updatedAt: now
    }
    const version = await this.store.save(next, handle.version, this.ttlFor(next))
    if (version === null) {
      throw new LeaseLostError(`job ${handle.jobId} was modified by another worker`)
    }
    return { jobId: handle.jobId, leaseToken: handle.leaseToken, version, job: next }
  }

  private async writeLeased(job: DocumentJob, expectedVersion: number, now: number): Promise<JobHandle | null> {
    const leaseToken = uuidv4()
    const leased: DocumentJob = { ...job, leaseOwner: leaseToken, leaseExpiresAt: now + this.leaseMs }
    const version = await this.store.save(leased, expectedVersion, this.ttlFor(leased))
    if (version === null) return null
    return { jobId: job.jobId, leaseToken, version, job: leased }
  }

  private ttlFor(job: DocumentJob): number {
    return isTerminal(job.state) ? this.retentionMs : this.retentionMs + this.leaseMs
  }
}
