export type ErrorCode =
  | 'transient'
  | 'auth'
  | 'permanent'
  | 'download_transient'
  | 'download_permanent'
  | 'storage'
  | 'processing'
  | 'ledger_unavailable'
  | 'lease_lost'
  | 'invalid_transition'
  | 'platform_http'

export type PipelineStage = 'download' | 'store' | 'process'

export abstract class IngestError extends Error {
  abstract readonly code: ErrorCode
  abstract readonly retryable: boolean

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Network timeouts, 5xx and 429 responses. */
export class TransientError extends IngestError {
  readonly code: ErrorCode = 'transient'
  readonly retryable = true
}

/** Expired or invalid credential. Never retried automatically. */
export class AuthError extends IngestError {
  readonly code = 'auth'
  readonly retryable = false
}

export class PermanentError extends IngestError {
  readonly code: ErrorCode = 'permanent'
  readonly retryable = false
}

export class TransientDownloadError extends TransientError {
  readonly code = 'download_transient'
}

export class PermanentDownloadError extends PermanentError {
  readonly code = 'download_permanent'
}

export class StorageError extends PermanentError {
  readonly code = 'storage'
}

export class ProcessingError extends PermanentError {
  readonly code = 'processing'
}

export class LedgerUnavailableError extends IngestError {
  readonly code = 'ledger_unavailable'
  readonly retryable = true
}

/** Another worker advanced or reclaimed the job since this worker last wrote it. */
export class LeaseLostError extends IngestError {
  readonly code = 'lease_lost'
  readonly retryable = false
}

export class InvalidTransitionError extends IngestError {
  readonly code = 'invalid_transition'
  readonly retryable = false
}

/**
 * Raw transport failure from the messaging platform or another HTTP
 * collaborator. `status` is undefined for network-level failures.
 */
export class PlatformHttpError extends Error {
  readonly code = 'platform_http'

  constructor(
    message: string,
    readonly status: number | undefined,
    readonly platformCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'PlatformHttpError'
  }
}

export function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500
}

/**
 * Maps a raw platform failure onto the error taxonomy. Already classified
 * errors pass through unchanged.
 */
export function classifyPlatformError(err: unknown): IngestError {
  if (err instanceof IngestError) return err
  if (err instanceof PlatformHttpError) {
    if (err.status === undefined) {
      return new TransientError(err.message, { cause: err })
    }
    if (err.status === 401 || err.status === 403) {
      return new AuthError(`credential rejected (HTTP ${err.status})`, { cause: err })
    }
    // The Cloud API reports expired tokens as 400 with OAuth error code 190
    if (err.platformCode === 190) {
      return new AuthError('access token expired', { cause: err })
    }
    if (isRetryableStatus(err.status)) {
      return new TransientError(err.message, { cause: err })
    }
    return new PermanentError(err.message, { cause: err })
  }
  if (isTimeoutError(err)) {
    return new TransientError('request timed out', { cause: err })
  }
  if (err instanceof TypeError) {
    // fetch() rejects with a TypeError on network failure
    return new TransientError(err.message, { cause: err })
  }
  const message = err instanceof Error ? err.message : String(err)
  return new PermanentError(message, { cause: err })
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error'
}
