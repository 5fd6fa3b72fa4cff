import { z } from 'zod'
import type { DocumentJob } from './jobs.js'

export type MessageKind = 'text' | 'document' | 'other'

export type MediaType = 'document' | 'image' | 'video' | 'audio'

export interface MediaPayload {
  readonly mediaRef: string
  readonly mediaType: MediaType
  readonly filename: string
  readonly mimeType: string
  readonly caption?: string
}

export type InboundPayload =
  | { readonly kind: 'text'; readonly text: string; readonly replyTo?: string }
  | { readonly kind: 'document'; readonly media: MediaPayload }
  | { readonly kind: 'other'; readonly platformType: string }

export interface InboundMessage {
  readonly messageId: string
  readonly sender: string
  readonly kind: MessageKind
  readonly payload: InboundPayload
  readonly receivedAt: number
}

/** Closed set of events the router dispatches on. */
export type RoutedEvent =
  | {
      readonly type: 'command'
      readonly message: InboundMessage
      readonly text: string
      /** Id of the message this text replies to. */
      readonly replyTo?: string
    }
  | { readonly type: 'document'; readonly message: InboundMessage; readonly media: MediaPayload }
  | { readonly type: 'unsupported'; readonly message: InboundMessage; readonly platformType: string }

export type ReplyKind =
  | 'help_command'
  | 'list_command'
  | 'find_command'
  | 'ask_command'
  | 'unknown_command'
  | 'delete_command'
  | 'describe_command'
  | 'command_error'
  | 'document_status'
  | 'unsupported_message'

export interface OutboundMessage {
  recipient: string
  body: string
  replyKind: ReplyKind
  bypassDedup: boolean
  uniquenessToken?: string
}

export type DeliveryResult =
  | { status: 'sent'; deliveryId: string; attempts: number; uniquenessToken?: string }
  | { status: 'suppressed'; reason: 'duplicate_reply' }
  | { status: 'failed'; reason: string; attempts: number; fatal: boolean }

export type HandledResult =
  | { status: 'processed'; messageId: string; detail?: string; job?: DocumentJob }
  | { status: 'duplicate_skipped'; messageId: string; reason: string; job?: DocumentJob }
  | { status: 'failed'; messageId: string; reason: string; retryable: boolean; job?: DocumentJob }

export interface SentRecord {
  id: string
  ts: number
  to: string
  replyKind: ReplyKind
  bodyPreview: string
  waMessageId: string
  dedupeKey?: string
  uniquenessToken?: string
}

// WhatsApp Cloud API webhook payload. Only the fields the router reads are
// modelled; everything else passes through untouched.
const mediaSchema = z.object({
  id: z.string(),
  mime_type: z.string().optional(),
  filename: z.string().optional(),
  caption: z.string().optional()
}).passthrough()

export const webhookMessageSchema = z.object({
  id: z.string(),
  from: z.string(),
  timestamp: z.string().optional(),
  type: z.string(),
  text: z.object({ body: z.string() }).passthrough().optional(),
  context: z.object({ id: z.string(), from: z.string().optional() }).passthrough().optional(),
  document: mediaSchema.optional(),
  image: mediaSchema.optional(),
  video: mediaSchema.optional(),
  audio: mediaSchema.optional()
}).passthrough()

export const webhookBodySchema = z.object({
  object: z.string().optional(),
  entry: z.array(z.object({
    id: z.string().optional(),
    changes: z.array(z.object({
      field: z.string().optional(),
      value: z.object({
        messages: z.array(webhookMessageSchema).optional(),
        statuses: z.array(z.unknown()).optional()
      }).passthrough()
    })).default([])
  })).default([])
})

export type WebhookMessage = z.infer<typeof webhookMessageSchema>
export type WebhookBody = z.infer<typeof webhookBodySchema>
