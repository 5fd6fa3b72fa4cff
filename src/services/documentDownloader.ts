import {
  AuthError,
  classifyPlatformError,
  IngestError,
  PermanentDownloadError,
  PlatformHttpError,
  TransientDownloadError
} from '../errors.js'
import { createLogger, type Logger } from '../utils/logger.js'
import type { MessagingPlatform } from './whatsappCloud.js'

const PERMANENT_STATUSES = new Set([400, 404, 410])

/**
 * Fetches document bytes from the platform and maps every failure onto
 * the download error classes. It does not retry; the caller owns the
 * retry policy.
 */
export class DocumentDownloader {
  private readonly logger: Logger

  constructor(private readonly platform: MessagingPlatform, logger?: Logger) {
    this.logger = logger ?? createLogger('document-downloader')
  }

  async download(mediaRef: string, signal?: AbortSignal): Promise<Buffer> {
    let bytes: Buffer
    try {
      bytes = (await this.platform.fetchMedia(mediaRef, signal)).bytes
    } catch (err) {
      const classified = this.classify(err, mediaRef)
      this.logger.warn({ mediaRef, code: classified.code, err: classified.message }, 'Media download failed')
      throw classified
    }
    if (bytes.length === 0) {
      throw new PermanentDownloadError(`media ${mediaRef} is empty`)
    }
    return bytes
  }

  private classify(err: unknown, mediaRef: string): IngestError {
    if (err instanceof PlatformHttpError && err.status !== undefined && PERMANENT_STATUSES.has(err.status) && err.platformCode !== 190) {
      return new PermanentDownloadError(`media ${mediaRef} is unavailable (HTTP ${err.status})`, { cause: err })
    }
    const classified = classifyPlatformError(err)
    if (classified instanceof AuthError) return classified
    if (classified.retryable) {
      return new TransientDownloadError(classified.message, { cause: err })
    }
    return new PermanentDownloadError(classified.message, { cause: err })
  }
}
