import { IngestError, TransientError } from '../errors.js'

export type Sleep = (ms: number) => Promise<void>

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms))

export interface RetryOptions {
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
  factor?: number
  isRetryable?: (err: unknown) => boolean
  sleep?: Sleep
}

export interface RetryHooks {
  onRetry?: (info: { attempt: number; delayMs: number; err: unknown }) => void
}

export interface RetryOutcome<T> {
  value: T
  attempts: number
}

/**
 * Thrown once a retryable failure has used up the attempt budget. Carries
 * the last underlying error and the number of attempts made.
 */
export class RetryExhaustedError extends Error {
  constructor(readonly lastError: unknown, readonly attempts: number) {
    super(lastError instanceof Error ? lastError.message : 'retries exhausted', { cause: lastError })
    this.name = 'RetryExhaustedError'
  }
}

export function defaultIsRetryable(err: unknown): boolean {
  return err instanceof IngestError && err.retryable
}

/**
 * One retry policy shared by every external call: bounded attempts,
 * exponential backoff capped at maxDelayMs, and a predicate that decides
 * which failures are worth another attempt.
 */
export class RetryPolicy {
  readonly maxAttempts: number
  private readonly baseDelayMs: number
  private readonly maxDelayMs: number
  private readonly factor: number
  private readonly isRetryable: (err: unknown) => boolean
  private readonly sleep: Sleep

  constructor(options: RetryOptions) {
    if (options.maxAttempts < 1) {
      throw new Error('maxAttempts must be at least 1')
    }
    this.maxAttempts = options.maxAttempts
    this.baseDelayMs = options.baseDelayMs
    this.maxDelayMs = options.maxDelayMs
    this.factor = options.factor ?? 2
    this.isRetryable = options.isRetryable ?? defaultIsRetryable
    this.sleep = options.sleep ?? defaultSleep
  }

  /** Delay before attempt `attempt + 1`, attempt counting from 1. */
  delayFor(attempt: number): number {
    const delay = this.baseDelayMs * Math.pow(this.factor, attempt - 1)
    return Math.min(delay, this.maxDelayMs)
  }

  /**
   * Runs `fn` until it succeeds, fails with a non-retryable error (rethrown
   * as is), or runs out of attempts (RetryExhaustedError).
   */
  async execute<T>(fn: (attempt: number) => Promise<T>, hooks: RetryHooks = {}): Promise<RetryOutcome<T>> {
    for (let attempt = 1; ; attempt++) {
      try {
        const value = await fn(attempt)
        return { value, attempts: attempt }
      } catch (err) {
        if (!this.isRetryable(err)) {
          throw err
        }
        if (attempt >= this.maxAttempts) {
          throw new RetryExhaustedError(err, attempt)
        }
        const delayMs = this.delayFor(attempt)
        hooks.onRetry?.({ attempt, delayMs, err })
        await this.sleep(delayMs)
      }
    }
  }
}

/**
 * Bounds a blocking call. On expiry the returned promise rejects with a
 * TransientError; the underlying work is not cancelled unless it observes
 * the passed AbortSignal.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      reject(new TransientError(`${label} timed out after ${timeoutMs}ms`))
    }, timeoutMs)
  })
  try {
    return await Promise.race([fn(controller.signal), timeout])
  } finally {
    if (timer) clearTimeout(timer)
  }
}
