import { documentJobSchema, type DocumentJob, type VersionedJob } from '../dto/jobs.js'
import { LedgerUnavailableError } from '../errors.js'

/**
 * Versioned persistence for DocumentJob records. `save` is a
 * compare-and-set: it writes only when the stored version still equals
 * `expectedVersion` (0 means "must not exist") and returns the new version,
 * or null when another writer got there first.
 */
export interface JobStore {
  load(jobId: string): Promise<VersionedJob | null>
  save(job: DocumentJob, expectedVersion: number, ttlMs: number): Promise<number | null>
}

function decodeJob(raw: string, jobId: string): DocumentJob {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (err) {
    throw new LedgerUnavailableError(`job record ${jobId} is not valid JSON`, { cause: err })
  }
  const parsed = documentJobSchema.safeParse(json)
  if (!parsed.success) {
    throw new LedgerUnavailableError(`job record ${jobId} failed validation`, { cause: parsed.error })
  }
  return parsed.data
}

// KEYS[1] job hash; ARGV: expected version, next version, job JSON, ttl ms
const COMPARE_AND_SET = `
local current = redis.call('HGET', KEYS[1], 'version')
if not current then current = '0' end
if current ~= ARGV[1] then return 0 end
redis.call('HSET', KEYS[1], 'version', ARGV[2], 'data', ARGV[3])
redis.call('PEXPIRE', KEYS[1], ARGV[4])
return 1
`

/** The slice of the ioredis client the job store uses. */
export interface JobStoreRedis {
  eval(script: string, numKeys: number, ...args: Array<string | number>): Promise<unknown>
  hmget(key: string, ...fields: string[]): Promise<Array<string | null>>
}

export class RedisJobStore implements JobStore {
  constructor(
    private readonly redis: JobStoreRedis,
    private readonly prefix = 'job:'
  ) {}

  async load(jobId: string): Promise<VersionedJob | null> {
    let fields: Array<string | null>
    try {
      fields = await this.redis.hmget(this.prefix + jobId, 'version', 'data')
    } catch (err) {
      throw new LedgerUnavailableError(`job store read failed for ${jobId}`, { cause: err })
    }
    const [version, data] = fields
    if (!version || !data) return null
    return { job: decodeJob(data, jobId), version: Number(version) }
  }

  async save(job: DocumentJob, expectedVersion: number, ttlMs: number): Promise<number | null> {
    const nextVersion = expectedVersion + 1
    let written: unknown
    try {
      written = await this.redis.eval(
        COMPARE_AND_SET,
        1,
        this.prefix + job.jobId,
        String(expectedVersion),
        String(nextVersion),
        JSON.stringify(job),
        Math.max(1, Math.round(ttlMs))
      )
    } catch (err) {
      throw new LedgerUnavailableError(`job store write failed for ${job.jobId}`, { cause: err })
    }
    return written === 1 ? nextVersion : null
  }
}

/**
 * In-process job store with the same compare-and-set contract. Records are
 * kept serialized so callers never share mutable state with the store.
 */
export class MemoryJobStore implements JobStore {
  private readonly records = new Map<string, { version: number; data: string; expiresAt: number }>()

  constructor(private readonly now: () => number = Date.now) {}

  async load(jobId: string): Promise<VersionedJob | null> {
    const record = this.live(jobId)
    if (!record) return null
    return { job: decodeJob(record.data, jobId), version: record.version }
  }

  async save(job: DocumentJob, expectedVersion: number, ttlMs: number): Promise<number | null> {
    const current = this.live(job.jobId)?.version ?? 0
    if (current !== expectedVersion) return null
    const nextVersion = expectedVersion + 1
    this.records.set(job.jobId, {
      version: nextVersion,
      data: JSON.stringify(job),
      expiresAt: this.now() + ttlMs
    })
    return nextVersion
  }

  sweep(): number {
    let removed = 0
    for (const jobId of [...this.records.keys()]) {
      if (!this.live(jobId)) removed++
    }
    return removed
  }

  get size(): number {
    return this.records.size
  }

  private live(jobId: string) {
    const record = this.records.get(jobId)
    if (!record) return undefined
    if (record.expiresAt <= this.now()) {
      this.records.delete(jobId)
      return undefined
    }
    return record
  }
}
