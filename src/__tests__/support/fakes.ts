import pino from 'pino'
import type {
  DocumentLibrary,
  DocumentMetadata,
  DocumentStorage,
  LibraryEntry,
  Processing,
  ProcessingResult,
  QuestionAnswerer
} from '../../core/interfaces.js'
import type { InboundMessage, RoutedEvent } from '../../dto/messages.js'
import { PlatformHttpError } from '../../errors.js'
import { AlertChannel, type OperationalAlert } from '../../services/alerts.js'
import { CommandProcessor } from '../../services/commandProcessor.js'
import { DocumentDownloader } from '../../services/documentDownloader.js'
import { DocumentProcessor } from '../../services/documentProcessor.js'
import { DocumentTracker } from '../../services/documentTracker.js'
import { EventRouter } from '../../services/eventRouter.js'
import { MemoryJobStore } from '../../services/jobStore.js'
import { MemoryLedger } from '../../services/ledger.js'
import { MessageSender } from '../../services/messageSender.js'
import { MemorySentRecorder } from '../../services/sentRecorder.js'
import type { FetchedMedia, MessagingPlatform, SendOptions } from '../../services/whatsappCloud.js'
import { RetryPolicy } from '../../utils/retry.js'

export const silentLogger = pino({ level: 'silent' })

export class ManualClock {
  constructor(public current = 1_700_000_000_000) {}

  now = (): number => this.current

  advance(ms: number): void {
    this.current += ms
  }
}

export interface SentMessage {
  recipient: string
  body: string
  callbackData?: string
}

/** In-process stand-in for the chat platform. Queued failures are thrown first. */
export class FakePlatform implements MessagingPlatform {
  readonly sent: SentMessage[] = []
  readonly mediaCalls: string[] = []
  readonly media = new Map<string, Buffer>()
  readonly sendFailures: unknown[] = []
  readonly mediaFailures: unknown[] = []
  sendAttempts = 0

  async fetchMedia(mediaRef: string): Promise<FetchedMedia> {
    this.mediaCalls.push(mediaRef)
    const failure = this.mediaFailures.shift()
    if (failure !== undefined) throw failure
    const bytes = this.media.get(mediaRef)
    if (!bytes) throw new PlatformHttpError(`media ${mediaRef} not found`, 404)
    return { bytes }
  }

  async sendMessage(recipient: string, body: string, options: SendOptions = {}): Promise<{ deliveryId: string }> {
    this.sendAttempts++
    const failure = this.sendFailures.shift()
    if (failure !== undefined) throw failure
    this.sent.push(options.callbackData === undefined
      ? { recipient, body }
      : { recipient, body, callbackData: options.callbackData })
    return { deliveryId: `wamid.${this.sent.length}` }
  }

  bodiesTo(recipient: string): string[] {
    return this.sent.filter((m) => m.recipient === recipient).map((m) => m.body)
  }
}

export class FakeStorage implements DocumentStorage, DocumentLibrary {
  readonly artifacts = new Map<string, { bytes: Buffer; entry: LibraryEntry; sender: string }>()
  readonly failures: unknown[] = []
  storeCalls = 0

  async store(bytes: Buffer, metadata: DocumentMetadata): Promise<string> {
    this.storeCalls++
    const failure = this.failures.shift()
    if (failure !== undefined) throw failure
    const location = `mem://${metadata.jobId}`
    if (!this.artifacts.has(location)) {
      this.artifacts.set(location, {
        bytes,
        sender: metadata.sender,
        entry: {
          jobId: metadata.jobId,
          filename: metadata.filename,
          mimeType: metadata.mimeType,
          location,
          storedAt: this.artifacts.size,
          ...(metadata.messageId ? { messageId: metadata.messageId } : {}),
          ...(metadata.description ? { description: metadata.description } : {})
        }
      })
    }
    return location
  }

  async exists(location: string): Promise<boolean> {
    return this.artifacts.has(location)
  }

  async list(sender: string): Promise<LibraryEntry[]> {
    return [...this.artifacts.values()].filter((a) => a.sender === sender).map((a) => a.entry)
  }

  async find(sender: string, query: string): Promise<LibraryEntry[]> {
    const needle = query.toLowerCase()
    return (await this.list(sender)).filter((e) =>
      e.filename.toLowerCase().includes(needle) || (e.description ?? '').toLowerCase().includes(needle)
    )
  }

  async describe(sender: string, messageId: string, description: string): Promise<LibraryEntry | null> {
    for (const artifact of this.artifacts.values()) {
      if (artifact.sender === sender && artifact.entry.messageId === messageId) {
        artifact.entry = { ...artifact.entry, description }
        return artifact.entry
      }
    }
    return null
  }

  async remove(sender: string, jobId: string): Promise<LibraryEntry | null> {
    for (const [location, artifact] of this.artifacts) {
      if (artifact.sender === sender && artifact.entry.jobId === jobId) {
        this.artifacts.delete(location)
        return artifact.entry
      }
    }
    return null
  }
}

export class FakeProcessing implements Processing, QuestionAnswerer {
  readonly runs: string[] = []
  readonly failures: unknown[] = []
  readonly questions: string[] = []
  answer = 'It is in the second paragraph.'
  /** When set, run() waits for it before answering. */
  gate: Promise<void> | undefined

  async run(location: string): Promise<ProcessingResult> {
    this.runs.push(location)
    if (this.gate) await this.gate
    const failure = this.failures.shift()
    if (failure !== undefined) throw failure
    return { summary: `processed ${location}` }
  }

  async ask(_sender: string, question: string): Promise<string> {
    this.questions.push(question)
    const failure = this.failures.shift()
    if (failure !== undefined) throw failure
    return this.answer
  }
}

export function instantRetry(maxAttempts = 3): RetryPolicy {
  return new RetryPolicy({ maxAttempts, baseDelayMs: 1, maxDelayMs: 1, sleep: async () => undefined })
}

export interface Harness {
  clock: ManualClock
  ledger: MemoryLedger
  jobStore: MemoryJobStore
  platform: FakePlatform
  storage: FakeStorage
  processing: FakeProcessing
  recorder: MemorySentRecorder
  alerts: AlertChannel
  alertLog: OperationalAlert[]
  tracker: DocumentTracker
  sender: MessageSender
  documents: DocumentProcessor
  commands: CommandProcessor
  router: EventRouter
}

export const LEASE_MS = 300_000
export const RETENTION_MS = 86_400_000

/** Every component wired over in-memory stores and fakes. */
export function createHarness(): Harness {
  const clock = new ManualClock()
  const ledger = new MemoryLedger(clock.now)
  const jobStore = new MemoryJobStore(clock.now)
  const platform = new FakePlatform()
  const storage = new FakeStorage()
  const processing = new FakeProcessing()
  const recorder = new MemorySentRecorder()
  const alerts = new AlertChannel()
  const alertLog: OperationalAlert[] = []
  alerts.subscribe((alert) => alertLog.push(alert))
  const retry = instantRetry()

  const tracker = new DocumentTracker({
    store: jobStore,
    leaseMs: LEASE_MS,
    retentionMs: RETENTION_MS,
    logger: silentLogger,
    now: clock.now
  })
  const sender = new MessageSender({
    platform,
    ledger,
    retry,
    replyDedupeTtlSec: 60,
    timeoutMs: 1000,
    alerts,
    recorder,
    logger: silentLogger,
    now: clock.now
  })
  const documents = new DocumentProcessor({
    tracker,
    downloader: new DocumentDownloader(platform, silentLogger),
    storage,
    processing,
    sender,
    retry,
    stepTimeoutMs: 1000,
    alerts,
    logger: silentLogger
  })
  const commands = new CommandProcessor({
    ledger,
    sender,
    library: storage,
    answerer: processing,
    retry,
    dedupeTtlSec: 600,
    stepTimeoutMs: 1000,
    logger: silentLogger
  })
  const router = new EventRouter({ commands, documents, ledger, sender, dedupeTtlSec: 600, logger: silentLogger })

  return {
    clock, ledger, jobStore, platform, storage, processing, recorder, alerts, alertLog,
    tracker, sender, documents, commands, router
  }
}

export function documentEvent(
  messageId: string,
  sender: string,
  mediaRef: string,
  filename = 'report.pdf'
): Extract<RoutedEvent, { type: 'document' }> {
  const media = { mediaRef, mediaType: 'document' as const, filename, mimeType: 'application/pdf' }
  const message: InboundMessage = {
    messageId,
    sender,
    kind: 'document',
    payload: { kind: 'document', media },
    receivedAt: 0
  }
  return { type: 'document', message, media }
}

export function commandEvent(messageId: string, sender: string, text: string): Extract<RoutedEvent, { type: 'command' }> {
  const message: InboundMessage = { messageId, sender, kind: 'text', payload: { kind: 'text', text }, receivedAt: 0 }
  return { type: 'command', message, text }
}
