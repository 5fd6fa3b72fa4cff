import { v4 as uuidv4 } from 'uuid'
import type { DeliveryResult, OutboundMessage } from '../dto/messages.js'
import { AuthError, classifyPlatformError, errorMessage, LedgerUnavailableError } from '../errors.js'
import { uniquenessToken } from '../utils/hash.js'
import { createLogger, maskPhone, type Logger } from '../utils/logger.js'
import { RetryExhaustedError, withTimeout, type RetryPolicy } from '../utils/retry.js'
import type { AlertChannel } from './alerts.js'
import { ledgerKeys, type DeduplicationLedger } from './ledger.js'
import type { SentMessageRecorder } from './sentRecorder.js'
import type { MessagingPlatform } from './whatsappCloud.js'

export interface MessageSenderOptions {
  platform: MessagingPlatform
  ledger: DeduplicationLedger
  retry: RetryPolicy
  replyDedupeTtlSec: number
  /** Bound on a single send attempt. */
  timeoutMs: number
  alerts?: AlertChannel
  recorder?: SentMessageRecorder
  logger?: Logger
  now?: () => number
}

/** Appends the per-message token so identical bodies stay distinct downstream. */
export function withUniquenessToken(body: string, token: string): string {
  return `${body}\n\n[ref ${token}]`
}

export class MessageSender {
  private readonly platform: MessagingPlatform
  private readonly ledger: DeduplicationLedger
  private readonly retry: RetryPolicy
  private readonly replyDedupeTtlSec: number
  private readonly timeoutMs: number
  private readonly alerts: AlertChannel | undefined
  private readonly recorder: SentMessageRecorder | undefined
  private readonly logger: Logger
  private readonly now: () => number

  constructor(options: MessageSenderOptions) {
    this.platform = options.platform
    this.ledger = options.ledger
    this.retry = options.retry
    this.replyDedupeTtlSec = options.replyDedupeTtlSec
    this.timeoutMs = options.timeoutMs
    this.alerts = options.alerts
    this.recorder = options.recorder
    this.logger = options.logger ?? createLogger('message-sender')
    this.now = options.now ?? Date.now
  }

  /**
   * Delivers one message. Never throws: every outcome, including a
   * suppressed duplicate and an exhausted retry budget, is a DeliveryResult.
   */
  async send(message: OutboundMessage): Promise<DeliveryResult> {
    const to = maskPhone(message.recipient)
    let dedupeKey: string | undefined
    let token: string | undefined
    let body = message.body

    if (message.bypassDedup) {
      token = message.uniquenessToken ?? uniquenessToken(this.now())
      body = withUniquenessToken(message.body, token)
    } else {
      dedupeKey = ledgerKeys.reply(message.recipient, message.replyKind)
      try {
        const claimed = await this.ledger.claim(dedupeKey, this.replyDedupeTtlSec)
        if (!claimed) {
          this.logger.info({ evt: 'reply_suppressed', to, replyKind: message.replyKind }, 'Duplicate reply suppressed')
          return { status: 'suppressed', reason: 'duplicate_reply' }
        }
      } catch (err) {
        this.logger.error({ evt: 'ledger_unavailable', to, err: errorMessage(err) }, 'Reply ledger unavailable, not sending')
        return { status: 'failed', reason: 'ledger_unavailable', attempts: 0, fatal: false }
      }
    }

    let attempts = 0
    try {
      const outcome = await this.retry.execute(
        (attempt) => {
          attempts = attempt
          return this.attempt(message.recipient, body, token)
        },
        {
          onRetry: ({ attempt, delayMs, err }) => {
            this.logger.warn(
              { evt: 'send_retry', to, replyKind: message.replyKind, attempt, delayMs, err: errorMessage(err) },
              'Send failed, retrying'
            )
          }
        }
      )
      const deliveryId = outcome.value.deliveryId
      this.logger.info(
        { evt: 'message_sent', to, replyKind: message.replyKind, deliveryId, attempts: outcome.attempts },
        'Message sent'
      )
      await this.record(message, deliveryId, dedupeKey, token)
      return token === undefined
        ? { status: 'sent', deliveryId, attempts: outcome.attempts }
        : { status: 'sent', deliveryId, attempts: outcome.attempts, uniquenessToken: token }
    } catch (err) {
      const cause = err instanceof RetryExhaustedError ? err.lastError : err
      const fatal = cause instanceof AuthError
      if (fatal) {
        this.logger.fatal({ evt: 'auth_failure', to, err: errorMessage(cause) }, 'Platform rejected the credential')
        this.alerts?.publish({ kind: 'auth_failure', component: 'message-sender', message: errorMessage(cause), at: this.now() })
      } else {
        this.logger.error({ evt: 'send_failed', to, replyKind: message.replyKind, attempts, err: errorMessage(cause) }, 'Message not delivered')
      }
      if (dedupeKey) {
        await this.releaseClaim(dedupeKey)
      }
      return { status: 'failed', reason: errorMessage(cause), attempts, fatal }
    }
  }

  private async attempt(recipient: string, body: string, token: string | undefined) {
    try {
      return await withTimeout('send', this.timeoutMs, (signal) =>
        this.platform.sendMessage(recipient, body, { callbackData: token, signal })
      )
    } catch (err) {
      throw classifyPlatformError(err)
    }
  }

  // A failed send must not leave the reply key claimed, or the retry the
  // caller makes would be suppressed.
  private async releaseClaim(key: string): Promise<void> {
    try {
      await this.ledger.release(key)
    } catch (err) {
      if (!(err instanceof LedgerUnavailableError)) throw err
      this.logger.error({ evt: 'ledger_unavailable', key, err: err.message }, 'Could not release reply claim')
    }
  }

  private async record(message: OutboundMessage, deliveryId: string, dedupeKey?: string, token?: string): Promise<void> {
    if (!this.recorder) return
    try {
      await this.recorder.recordSent({
        id: uuidv4(),
        ts: this.now(),
        to: message.recipient,
        replyKind: message.replyKind,
        bodyPreview: message.body.slice(0, 120),
        waMessageId: deliveryId,
        dedupeKey,
        uniquenessToken: token
      })
    } catch (err) {
      this.logger.warn({ err: errorMessage(err), backend: this.recorder.getBackendType() }, 'Failed to record sent message')
    }
  }
}
