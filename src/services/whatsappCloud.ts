import { z } from 'zod'
import { AuthError, PermanentError, PlatformHttpError } from '../errors.js'
import { createLogger, maskPhone, type Logger } from '../utils/logger.js'

export interface CredentialProvider {
  /** Current bearer token; throws AuthError when none is available. */
  currentToken(): string
}

/** Reads the token from configuration. Refreshing it is left to the operator. */
export class EnvCredentialProvider implements CredentialProvider {
  constructor(private readonly token: string | undefined) {}

  currentToken(): string {
    if (!this.token) {
      throw new AuthError('WHATSAPP_ACCESS_TOKEN is not configured')
    }
    return this.token
  }
}

export interface FetchedMedia {
  bytes: Buffer
  mimeType?: string
}

export interface SendOptions {
  /** Opaque per-message value the platform echoes back in status webhooks. */
  callbackData?: string
  signal?: AbortSignal
}

/**
 * Transport to the chat platform. Implementations throw PlatformHttpError
 * for transport failures; callers classify them.
 */
export interface MessagingPlatform {
  fetchMedia(mediaRef: string, signal?: AbortSignal): Promise<FetchedMedia>
  sendMessage(recipient: string, body: string, options?: SendOptions): Promise<{ deliveryId: string }>
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>

export interface WhatsAppCloudOptions {
  apiBase: string
  apiVersion: string
  phoneNumberId: string | undefined
  credentials: CredentialProvider
  timeoutMs: number
  fetch?: FetchFn
  logger?: Logger
}

const graphErrorSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    code: z.number().optional(),
    type: z.string().optional()
  }).passthrough()
}).passthrough()

const mediaInfoSchema = z.object({
  url: z.string().url(),
  mime_type: z.string().optional()
}).passthrough()

const sendResponseSchema = z.object({
  messages: z.array(z.object({ id: z.string() }).passthrough()).min(1)
}).passthrough()

export class WhatsAppCloudClient implements MessagingPlatform {
  private readonly baseUrl: string
  private readonly phoneNumberId: string | undefined
  private readonly credentials: CredentialProvider
  private readonly timeoutMs: number
  private readonly fetchFn: FetchFn
  private readonly logger: Logger

  constructor(options: WhatsAppCloudOptions) {
    this.baseUrl = `${options.apiBase}/${options.apiVersion}`
    this.phoneNumberId = options.phoneNumberId
    this.credentials = options.credentials
    this.timeoutMs = options.timeoutMs
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init))
    this.logger = options.logger ?? createLogger('whatsapp-cloud')
  }

  async fetchMedia(mediaRef: string, signal?: AbortSignal): Promise<FetchedMedia> {
    const infoResponse = await this.request('GET', `${this.baseUrl}/${encodeURIComponent(mediaRef)}`, undefined, signal)
    const info = mediaInfoSchema.safeParse(await this.readJson(infoResponse))
    if (!info.success) {
      throw new PlatformHttpError(`media ${mediaRef} has no download url`, 404)
    }

    const contentResponse = await this.request('GET', info.data.url, undefined, signal)
    const bytes = Buffer.from(await contentResponse.arrayBuffer())
    this.logger.debug({ mediaRef, size: bytes.length }, 'Media downloaded')
    return { bytes, mimeType: info.data.mime_type }
  }

  async sendMessage(recipient: string, body: string, options: SendOptions = {}): Promise<{ deliveryId: string }> {
    if (!this.phoneNumberId) {
      throw new PermanentError('WHATSAPP_PHONE_NUMBER_ID is not configured')
    }
    const payload: Record<string, unknown> = {
      messaging_product: 'whatsapp',
      recipient_type: 'individual',
      to: recipient,
      type: 'text',
      text: { preview_url: false, body }
    }
    if (options.callbackData) {
      payload.biz_opaque_callback_data = options.callbackData
    }

    const response = await this.request(
      'POST',
      `${this.baseUrl}/${this.phoneNumberId}/messages`,
      JSON.stringify(payload),
      options.signal
    )
    const parsed = sendResponseSchema.safeParse(await this.readJson(response))
    if (!parsed.success) {
      throw new PlatformHttpError('send response did not include a message id', response.status)
    }
    const deliveryId = parsed.data.messages[0]?.id ?? ''
    this.logger.debug({ to: maskPhone(recipient), deliveryId }, 'Message accepted by platform')
    return { deliveryId }
  }

  private async request(method: 'GET' | 'POST', url: string, body?: string, signal?: AbortSignal): Promise<Response> {
    const headers: Record<string, string> = { Authorization: `Bearer ${this.credentials.currentToken()}` }
    if (body !== undefined) headers['Content-Type'] = 'application/json'
    let response: Response
    try {
      response = await this.fetchFn(url, {
        method,
        headers,
        body,
        signal: signal ?? AbortSignal.timeout(this.timeoutMs)
      })
    } catch (err) {
      const message = err instanceof Error ? err.message : 'request failed'
      throw new PlatformHttpError(`${method} ${this.describe(url)}: ${message}`, undefined, undefined, { cause: err })
    }
    if (!response.ok) {
      const graph = graphErrorSchema.safeParse(await this.readJson(response))
      const detail = graph.success ? graph.data.error.message : undefined
      throw new PlatformHttpError(
        `${method} ${this.describe(url)} failed with HTTP ${response.status}${detail ? `: ${detail}` : ''}`,
        response.status,
        graph.success ? graph.data.error.code : undefined
      )
    }
    return response
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return await response.json()
    } catch {
      return undefined
    }
  }

  // Media download URLs carry signed query strings; keep them out of errors
  private describe(url: string): string {
    return url.split('?')[0] ?? url
  }
}
