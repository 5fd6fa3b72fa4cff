import * as fs from 'fs/promises'
import { z } from 'zod'
import type {
  DocumentMetadata,
  Processing,
  ProcessingResult,
  QuestionAnswerer
} from '../core/interfaces.js'
import { errorMessage, isRetryableStatus, isTimeoutError, ProcessingError, TransientError } from '../errors.js'
import { createLogger, type Logger } from '../utils/logger.js'
import type { FetchFn } from './whatsappCloud.js'

const processResponseSchema = z.object({ summary: z.string().optional() }).passthrough()
const askResponseSchema = z.object({ answer: z.string() }).passthrough()

export interface RemoteProcessingOptions {
  baseUrl: string
  timeoutMs: number
  apiKey?: string
  fetch?: FetchFn
  logger?: Logger
}

/**
 * HTTP client for the processing service: `POST /process` for stored
 * documents and `POST /ask` for questions about them.
 */
export class RemoteProcessingClient implements Processing, QuestionAnswerer {
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly apiKey: string | undefined
  private readonly fetchFn: FetchFn
  private readonly logger: Logger

  constructor(options: RemoteProcessingOptions) {
    this.baseUrl = options.baseUrl
    this.timeoutMs = options.timeoutMs
    this.apiKey = options.apiKey
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init))
    this.logger = options.logger ?? createLogger('remote-processing')
  }

  async run(location: string, metadata: DocumentMetadata, signal?: AbortSignal): Promise<ProcessingResult> {
    const json = await this.post('/process', { location, ...metadata }, signal)
    const parsed = processResponseSchema.safeParse(json)
    if (!parsed.success) {
      throw new ProcessingError('processing service returned an unexpected body')
    }
    this.logger.debug({ jobId: metadata.jobId }, 'Processing finished')
    return parsed.data
  }

  async ask(sender: string, question: string, signal?: AbortSignal): Promise<string> {
    const json = await this.post('/ask', { sender, question }, signal)
    const parsed = askResponseSchema.safeParse(json)
    if (!parsed.success) {
      throw new ProcessingError('processing service returned no answer')
    }
    return parsed.data.answer
  }

  private async post(route: string, payload: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' }
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`

    let response: Response
    try {
      response = await this.fetchFn(`${this.baseUrl}${route}`, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal: signal ?? AbortSignal.timeout(this.timeoutMs)
      })
    } catch (err) {
      if (isTimeoutError(err) || err instanceof TypeError) {
        throw new TransientError(`processing ${route} unreachable: ${errorMessage(err)}`, { cause: err })
      }
      throw new ProcessingError(`processing ${route} failed: ${errorMessage(err)}`, { cause: err })
    }

    if (!response.ok) {
      const message = `processing ${route} failed with HTTP ${response.status}`
      if (isRetryableStatus(response.status)) throw new TransientError(message)
      throw new ProcessingError(message)
    }
    try {
      return await response.json()
    } catch (err) {
      throw new ProcessingError(`processing ${route} returned invalid JSON`, { cause: err })
    }
  }
}

/**
 * Used when no processing service is configured: records basic facts
 * about the artifact and answers questions with a fixed notice.
 */
export class FileInfoProcessing implements Processing, QuestionAnswerer {
  async run(location: string, metadata: DocumentMetadata): Promise<ProcessingResult> {
    let size: number
    try {
      size = (await fs.stat(location)).size
    } catch (err) {
      throw new ProcessingError(`stored file is missing: ${errorMessage(err)}`, { cause: err })
    }
    return { summary: `${metadata.filename} (${metadata.mimeType}, ${size} bytes)`, size }
  }

  async ask(): Promise<string> {
    return 'Question answering is not configured on this server.'
  }
}
