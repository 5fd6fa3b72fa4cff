import type { SentRecord } from '../dto/messages.js'

/**
 * Interface for recording sent messages to different backends
 */
export interface SentMessageRecorder {
  /**
   * Record a sent message
   * @returns the backend's id for the stored record
   */
  recordSent(record: SentRecord): Promise<string>

  getBackendType(): string
}

export interface RecorderTransaction {
  hset(key: string, fields: Record<string, string>): RecorderTransaction
  expire(key: string, seconds: number): RecorderTransaction
  exec(): Promise<Array<[Error | null, unknown]> | null>
}

/** The slice of the ioredis client the recorder uses. */
export interface RecorderRedis {
  xadd(key: string, ...args: string[]): Promise<string | null>
  multi(): RecorderTransaction
}

/**
 * Appends every delivery to a capped stream and keeps a lookup hash per
 * record. Index hashes expire after `indexTtlSec`, the stream is trimmed
 * to about `maxLen` entries.
 */
export class RedisSentRecorder implements SentMessageRecorder {
  constructor(
    private readonly redis: RecorderRedis,
    private readonly stream: string,
    private readonly maxLen: number,
    private readonly indexTtlSec: number
  ) {}

  async recordSent(record: SentRecord): Promise<string> {
    const json = JSON.stringify(record)
    const id = await this.redis.xadd(
      this.stream, 'MAXLEN', '~', this.maxLen.toString(), '*', 'v', json
    )
    if (id === null) {
      throw new Error(`XADD to ${this.stream} returned no id`)
    }

    const idxKey = `sent:index:${record.id}`
    const replies = await this.redis.multi()
      .hset(idxKey, {
        ts: String(record.ts),
        to: record.to,
        kind: record.replyKind,
        waId: record.waMessageId,
        ddk: record.dedupeKey || '',
        utk: record.uniquenessToken || ''
      })
      .expire(idxKey, this.indexTtlSec)
      .exec()
    const failure = replies?.find(([err]) => err !== null)?.[0]
    if (!replies || failure) {
      throw new Error(`indexing ${idxKey} failed: ${failure ? failure.message : 'transaction aborted'}`)
    }

    return id
  }

  getBackendType(): string {
    return 'redis'
  }
}

/** Keeps the most recent records in process memory. */
export class MemorySentRecorder implements SentMessageRecorder {
  private readonly records: SentRecord[] = []

  constructor(private readonly maxLen = 1000) {}

  async recordSent(record: SentRecord): Promise<string> {
    this.records.push(record)
    if (this.records.length > this.maxLen) {
      this.records.splice(0, this.records.length - this.maxLen)
    }
    return record.id
  }

  getBackendType(): string {
    return 'memory'
  }

  list(): readonly SentRecord[] {
    return this.records
  }
}
