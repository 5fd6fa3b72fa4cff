import { describe, it, expect, beforeEach } from '@jest/globals'
import type { JobSeed } from '../../dto/jobs.js'
import { InvalidTransitionError, LeaseLostError } from '../../errors.js'
import { canTransition, DocumentTracker, type JobHandle } from '../documentTracker.js'
import { MemoryJobStore } from '../jobStore.js'
import { LEASE_MS, ManualClock, RETENTION_MS, silentLogger } from '../../__tests__/support/fakes.js'

const seed: JobSeed = {
  jobId: 'job-abc',
  sender: '15550001111',
  mediaRef: 'media-1',
  filename: 'report.pdf',
  mimeType: 'application/pdf'
}

describe('DocumentTracker', () => {
  let clock: ManualClock
  let store: MemoryJobStore
  let tracker: DocumentTracker

  beforeEach(() => {
    clock = new ManualClock()
    store = new MemoryJobStore(clock.now)
    tracker = new DocumentTracker({ store, leaseMs: LEASE_MS, retentionMs: RETENTION_MS, logger: silentLogger, now: clock.now })
  })

  async function acquire(): Promise<JobHandle> {
    const result = await tracker.createOrGet(seed)
    if (result.outcome !== 'acquired') throw new Error(`expected acquired, got ${result.outcome}`)
    return result.handle
  }

  async function advanceTo(handle: JobHandle, location = 'mem://job-abc'): Promise<JobHandle> {
    let h = await tracker.transition(handle, 'Downloading')
    h = await tracker.transition(h, 'Downloaded')
    h = await tracker.transition(h, 'Storing')
    return tracker.transition(h, 'Stored', { storageLocation: location })
  }

  it('creates a Received job holding a lease', async () => {
    const result = await tracker.createOrGet(seed)
    expect(result.outcome).toBe('acquired')
    if (result.outcome !== 'acquired') return
    expect(result.reclaimed).toBe(false)
    expect(result.handle.job).toMatchObject({
      state: 'Received',
      retryCount: 0,
      leaseOwner: result.handle.leaseToken,
      leaseExpiresAt: clock.now() + LEASE_MS
    })
  })

  it('reports busy while the lease is live', async () => {
    await acquire()
    clock.advance(LEASE_MS - 1)
    const again = await tracker.createOrGet(seed)
    expect(again.outcome).toBe('busy')
  })

  it('gives exactly one of many concurrent callers the lease', async () => {
    const results = await Promise.all(Array.from({ length: 10 }, () => tracker.createOrGet(seed)))
    expect(results.filter((r) => r.outcome === 'acquired')).toHaveLength(1)
    expect(results.filter((r) => r.outcome === 'busy')).toHaveLength(9)
  })

  it('reports terminal jobs without touching them', async () => {
    let h = await advanceTo(await acquire())
    h = await tracker.transition(h, 'Processing')
    h = await tracker.transition(h, 'Completed', { result: { summary: 'ok' } })
    const again = await tracker.createOrGet(seed)
    expect(again.outcome).toBe('terminal')
    if (again.outcome === 'terminal') {
      expect(again.job.state).toBe('Completed')
      expect(again.job.leaseOwner).toBeNull()
    }
  })

  it('restarts from Received when a lease expires before storage', async () => {
    const first = await acquire()
    await tracker.transition(first, 'Downloading')
    clock.advance(LEASE_MS)
    const result = await tracker.createOrGet(seed)
    expect(result.outcome).toBe('acquired')
    if (result.outcome !== 'acquired') return
    expect(result.reclaimed).toBe(true)
    expect(result.handle.job.state).toBe('Received')
    expect(result.handle.job.retryCount).toBe(1)
    expect(result.handle.leaseToken).not.toBe(first.leaseToken)
  })

  it('resumes at Stored when the artifact was already stored', async () => {
    let h = await advanceTo(await acquire())
    h = await tracker.transition(h, 'Processing')
    clock.advance(LEASE_MS + 1)
    const result = await tracker.createOrGet(seed)
    if (result.outcome !== 'acquired') throw new Error('expected acquired')
    expect(result.handle.job.state).toBe('Stored')
    expect(result.handle.job.storageLocation).toBe('mem://job-abc')
  })

  it('fences the previous holder after a reclaim', async () => {
    const stale = await tracker.transition(await acquire(), 'Downloading')
    clock.advance(LEASE_MS)
    await tracker.createOrGet(seed)
    await expect(tracker.transition(stale, 'Downloaded')).rejects.toBeInstanceOf(LeaseLostError)
    await expect(tracker.fail(stale, 'download', new Error('boom'))).rejects.toBeInstanceOf(LeaseLostError)
  })

  it('rejects transitions that skip or reverse states', async () => {
    const h = await acquire()
    await expect(tracker.transition(h, 'Stored')).rejects.toBeInstanceOf(InvalidTransitionError)
    const downloading = await tracker.transition(h, 'Downloading')
    await expect(tracker.transition(downloading, 'Received')).rejects.toBeInstanceOf(InvalidTransitionError)
  })

  it('renews the lease on every transition', async () => {
    const h = await acquire()
    clock.advance(1000)
    const next = await tracker.transition(h, 'Downloading')
    expect(next.job.leaseExpiresAt).toBe(clock.now() + LEASE_MS)
    expect(next.version).toBe(h.version + 1)
  })

  it('records the stage and message on failure', async () => {
    let h = await advanceTo(await acquire())
    h = await tracker.transition(h, 'Processing')
    const failed = await tracker.fail(h, 'process', new Error('timeout'))
    expect(failed.job).toMatchObject({
      state: 'Failed',
      lastError: 'process:timeout',
      failedStage: 'process',
      storageLocation: 'mem://job-abc',
      leaseOwner: null,
      leaseExpiresAt: null
    })
    await expect(tracker.fail(failed, 'process', new Error('again'))).rejects.toBeInstanceOf(InvalidTransitionError)
  })

  it('reopens a stored but unprocessed job at Stored', async () => {
    let h = await advanceTo(await acquire())
    h = await tracker.transition(h, 'Processing')
    await tracker.fail(h, 'process', new Error('timeout'))
    const reopened = await tracker.reopen(seed.jobId)
    expect(reopened?.job).toMatchObject({ state: 'Stored', lastError: null, failedStage: null, retryCount: 1 })
  })

  it('refuses to reopen a job that never stored anything', async () => {
    const h = await tracker.transition(await acquire(), 'Downloading')
    await tracker.fail(h, 'download', new Error('gone'))
    await expect(tracker.reopen(seed.jobId)).rejects.toBeInstanceOf(InvalidTransitionError)
    expect(await tracker.reopen('missing')).toBeNull()
  })

  it('sends a Stored job back to Received under the same lease', async () => {
    const stored = await advanceTo(await acquire())
    const restarted = await tracker.restartDownload(stored)
    expect(restarted.leaseToken).toBe(stored.leaseToken)
    expect(restarted.job).toMatchObject({ state: 'Received', storageLocation: null, leaseOwner: stored.leaseToken })
    expect(await tracker.get(seed.jobId)).toMatchObject({ state: 'Received', storageLocation: null })
    await expect(tracker.transition(restarted, 'Downloading')).resolves.toMatchObject({ job: { state: 'Downloading' } })
  })

  it('only restarts the download of a Stored job', async () => {
    const handle = await acquire()
    await expect(tracker.restartDownload(handle)).rejects.toBeInstanceOf(InvalidTransitionError)
  })

  it('keeps terminal records for the retention period only', async () => {
    const h = await tracker.transition(await acquire(), 'Downloading')
    await tracker.fail(h, 'download', new Error('gone'))
    clock.advance(RETENTION_MS - 1)
    expect((await tracker.get(seed.jobId))?.state).toBe('Failed')
    clock.advance(1)
    expect(await tracker.get(seed.jobId)).toBeNull()
  })
})

describe('canTransition', () => {
  it('allows Failed from any non-terminal state', () => {
    expect(canTransition('Received', 'Failed')).toBe(true)
    expect(canTransition('Processing', 'Failed')).toBe(true)
    expect(canTransition('Completed', 'Failed')).toBe(false)
    expect(canTransition('Failed', 'Stored')).toBe(false)
  })
})
