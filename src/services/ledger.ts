import { LedgerUnavailableError } from '../errors.js'

/**
 * Shared, TTL-bounded claim registry. `claim` is the only correctness
 * primitive the pipeline relies on: among concurrent callers with the same
 * key, exactly one observes `true` until the key expires or is released.
 */
export interface DeduplicationLedger {
  claim(key: string, ttlSec: number): Promise<boolean>
  release(key: string): Promise<void>
  exists(key: string): Promise<boolean>
}

export const ledgerKeys = {
  inbound: (sender: string, messageId: string) => `msg:${sender}:${messageId}`,
  reply: (sender: string, replyKind: string) => `reply:${sender}:${replyKind}`
}

/** The slice of the ioredis client the ledger uses. */
export interface LedgerRedis {
  set(key: string, value: string, mode: 'EX', seconds: number, condition: 'NX'): Promise<'OK' | null>
  del(key: string): Promise<number>
  exists(key: string): Promise<number>
}

export class RedisLedger implements DeduplicationLedger {
  constructor(
    private readonly redis: LedgerRedis,
    private readonly prefix = 'ledger:',
    private readonly now: () => number = Date.now
  ) {}

  async claim(key: string, ttlSec: number): Promise<boolean> {
    try {
      // Single SET NX: check and write happen in one command
      const result = await this.redis.set(this.prefix + key, String(this.now()), 'EX', ttlSec, 'NX')
      return result === 'OK'
    } catch (err) {
      throw new LedgerUnavailableError(`ledger claim failed for ${key}`, { cause: err })
    }
  }

  async release(key: string): Promise<void> {
    try {
      await this.redis.del(this.prefix + key)
    } catch (err) {
      throw new LedgerUnavailableError(`ledger release failed for ${key}`, { cause: err })
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      return (await this.redis.exists(this.prefix + key)) === 1
    } catch (err) {
      throw new LedgerUnavailableError(`ledger lookup failed for ${key}`, { cause: err })
    }
  }
}

/**
 * In-process ledger. Claims are atomic within one Node.js process because
 * the check and the write run in the same synchronous turn; it gives no
 * guarantee across processes and is meant for tests and single-instance runs.
 */
export class MemoryLedger implements DeduplicationLedger {
  private readonly entries = new Map<string, { claimedAt: number; expiresAt: number }>()

  constructor(private readonly now: () => number = Date.now) {}

  async claim(key: string, ttlSec: number): Promise<boolean> {
    const now = this.now()
    const entry = this.entries.get(key)
    if (entry && entry.expiresAt > now) {
      return false
    }
    this.entries.set(key, { claimedAt: now, expiresAt: now + ttlSec * 1000 })
    return true
  }

  async release(key: string): Promise<void> {
    this.entries.delete(key)
  }

  async exists(key: string): Promise<boolean> {
    const entry = this.entries.get(key)
    if (!entry) return false
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key)
      return false
    }
    return true
  }

  /** Drops expired entries; returns how many were removed. */
  sweep(): number {
    const now = this.now()
    let removed = 0
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key)
        removed++
      }
    }
    return removed
  }

  get size(): number {
    return this.entries.size
  }
}
