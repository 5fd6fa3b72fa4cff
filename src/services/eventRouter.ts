import type {
  HandledResult,
  InboundMessage,
  InboundPayload,
  MediaPayload,
  MediaType,
  RoutedEvent,
  WebhookBody,
  WebhookMessage
} from '../dto/messages.js'
import { errorMessage } from '../errors.js'
import { createLogger, maskPhone, type Logger } from '../utils/logger.js'
import type { CommandProcessor } from './commandProcessor.js'
import type { DocumentProcessor } from './documentProcessor.js'
import { ledgerKeys, type DeduplicationLedger } from './ledger.js'
import type { MessageSender } from './messageSender.js'

const MEDIA_TYPES: readonly MediaType[] = ['document', 'image', 'video', 'audio']

const EXTENSIONS: Record<string, string> = {
  'application/pdf': 'pdf',
  'image/jpeg': 'jpg',
  'image/png': 'png',
  'image/webp': 'webp',
  'video/mp4': 'mp4',
  'audio/ogg': 'ogg',
  'audio/mpeg': 'mp3',
  'text/plain': 'txt'
}

function isMediaType(type: string): type is MediaType {
  return MEDIA_TYPES.some((t) => t === type)
}

function toMedia(raw: WebhookMessage, mediaType: MediaType): MediaPayload | undefined {
  const media = raw[mediaType]
  if (!media) return undefined
  const mimeType = media.mime_type?.split(';')[0]?.trim() || 'application/octet-stream'
  const filename = media.filename || `${mediaType}-${media.id}.${EXTENSIONS[mimeType] ?? 'bin'}`
  return media.caption === undefined
    ? { mediaRef: media.id, mediaType, filename, mimeType }
    : { mediaRef: media.id, mediaType, filename, mimeType, caption: media.caption }
}

/** Normalizes one webhook message into the internal, immutable shape. */
export function toInboundMessage(raw: WebhookMessage, now: number = Date.now()): InboundMessage {
  const seconds = raw.timestamp ? Number(raw.timestamp) : NaN
  const receivedAt = Number.isFinite(seconds) ? seconds * 1000 : now
  let message: InboundMessage = {
    messageId: raw.id,
    sender: raw.from,
    kind: 'other',
    payload: { kind: 'other', platformType: raw.type },
    receivedAt
  }

  if (raw.type === 'text' && raw.text) {
    const payload: InboundPayload = raw.context
      ? { kind: 'text', text: raw.text.body, replyTo: raw.context.id }
      : { kind: 'text', text: raw.text.body }
    message = { ...message, kind: 'text', payload }
  } else if (isMediaType(raw.type)) {
    const media = toMedia(raw, raw.type)
    if (media) {
      message = { ...message, kind: 'document', payload: { kind: 'document', media } }
    }
  }
  return Object.freeze(message)
}

/** Every message in a webhook body; status updates are dropped. */
export function extractMessages(body: WebhookBody, now: number = Date.now()): InboundMessage[] {
  const messages: InboundMessage[] = []
  for (const entry of body.entry) {
    for (const change of entry.changes) {
      for (const raw of change.value.messages ?? []) {
        messages.push(toInboundMessage(raw, now))
      }
    }
  }
  return messages
}

export function classify(message: InboundMessage): RoutedEvent {
  switch (message.payload.kind) {
    case 'text':
      return message.payload.replyTo === undefined
        ? { type: 'command', message, text: message.payload.text }
        : { type: 'command', message, text: message.payload.text, replyTo: message.payload.replyTo }
    case 'document':
      return { type: 'document', message, media: message.payload.media }
    case 'other':
      return { type: 'unsupported', message, platformType: message.payload.platformType }
  }
}

export interface EventRouterOptions {
  commands: CommandProcessor
  documents: DocumentProcessor
  ledger: DeduplicationLedger
  sender: MessageSender
  dedupeTtlSec: number
  logger?: Logger
}

export const UNSUPPORTED_TEXT =
  'Sorry, I can only handle text commands and documents, images, audio or video. Send "help" for the list of commands.'

export class EventRouter {
  private readonly commands: CommandProcessor
  private readonly documents: DocumentProcessor
  private readonly ledger: DeduplicationLedger
  private readonly sender: MessageSender
  private readonly dedupeTtlSec: number
  private readonly logger: Logger

  constructor(options: EventRouterOptions) {
    this.commands = options.commands
    this.documents = options.documents
    this.ledger = options.ledger
    this.sender = options.sender
    this.dedupeTtlSec = options.dedupeTtlSec
    this.logger = options.logger ?? createLogger('event-router')
  }

  async handleInboundEvent(event: RoutedEvent): Promise<HandledResult> {
    switch (event.type) {
      case 'command':
        return this.commands.handleCommand(event)
      case 'document':
        return this.documents.handleDocumentEvent(event)
      case 'unsupported':
        return this.handleUnsupported(event)
    }
  }

  /** Handles every message of a webhook body in order. */
  async handleWebhook(body: WebhookBody): Promise<HandledResult[]> {
    const results: HandledResult[] = []
    for (const message of extractMessages(body)) {
      results.push(await this.handleInboundEvent(classify(message)))
    }
    return results
  }

  private async handleUnsupported(event: Extract<RoutedEvent, { type: 'unsupported' }>): Promise<HandledResult> {
    const { messageId, sender } = event.message
    const key = ledgerKeys.inbound(sender, messageId)
    let claimed: boolean
    try {
      claimed = await this.ledger.claim(key, this.dedupeTtlSec)
    } catch (err) {
      this.logger.error({ evt: 'ledger_unavailable', messageId, err: errorMessage(err) }, 'Inbound ledger unavailable')
      return { status: 'failed', messageId, reason: 'ledger_unavailable', retryable: true }
    }
    if (!claimed) {
      return { status: 'duplicate_skipped', messageId, reason: 'message_seen' }
    }

    this.logger.info(
      { evt: 'unsupported_message', messageId, sender: maskPhone(sender), platformType: event.platformType },
      'Unsupported message type'
    )
    const delivery = await this.sender.send({
      recipient: sender,
      body: UNSUPPORTED_TEXT,
      replyKind: 'unsupported_message',
      bypassDedup: false
    })
    if (delivery.status === 'failed') {
      if (!delivery.fatal) {
        await this.ledger.release(key).catch((err: unknown) => {
          this.logger.error({ evt: 'ledger_unavailable', messageId, err: errorMessage(err) }, 'Could not release inbound claim')
        })
      }
      return { status: 'failed', messageId, reason: `reply_failed:${delivery.reason}`, retryable: !delivery.fatal }
    }
    return { status: 'processed', messageId, detail: `unsupported:${delivery.status}` }
  }
}
