import type { DocumentLibrary, LibraryEntry, QuestionAnswerer } from '../core/interfaces.js'
import type { DeliveryResult, HandledResult, ReplyKind, RoutedEvent } from '../dto/messages.js'
import { errorMessage } from '../errors.js'
import { createLogger, maskPhone, type Logger } from '../utils/logger.js'
import { RetryExhaustedError, withTimeout, type RetryPolicy } from '../utils/retry.js'
import { ledgerKeys, type DeduplicationLedger } from './ledger.js'
import type { MessageSender } from './messageSender.js'

export type CommandEvent = Extract<RoutedEvent, { type: 'command' }>

export type ParsedCommand =
  | { name: 'help' }
  | { name: 'list' }
  | { name: 'find'; query: string }
  | { name: 'ask'; question: string }
  | { name: 'delete'; ref: string }
  | { name: 'describe'; replyTo: string; description: string }
  | { name: 'unknown'; text: string }

// Checked in order when the first word is not a command
const HELP_PHRASES = ['what can you do', 'help me', 'how does this work', 'commands', 'instructions']
const LIST_PHRASES = ['show my documents', 'show documents', 'show my files', 'my documents', 'my files', 'what do i have']
const FIND_PHRASES = ['search for', 'look for', 'where is', 'search']
const ASK_PHRASES = ['tell me about', 'what is', 'how to']

function afterPhrase(text: string, phrases: readonly string[]): string | undefined {
  for (const phrase of phrases) {
    const at = text.indexOf(phrase)
    if (at === -1) continue
    const rest = text.slice(at + phrase.length).trim()
    if (rest) return rest
  }
  return undefined
}

/** Matches natural-language requests such as "show my documents" or "search for lease". */
export function detectIntent(text: string): ParsedCommand | undefined {
  const lower = text.trim().toLowerCase()
  if (HELP_PHRASES.some((phrase) => lower.includes(phrase))) return { name: 'help' }
  if (LIST_PHRASES.some((phrase) => lower.includes(phrase))) return { name: 'list' }
  const query = afterPhrase(lower, FIND_PHRASES)
  if (query) return { name: 'find', query }
  if (ASK_PHRASES.some((phrase) => lower.includes(phrase))) return { name: 'ask', question: text.trim() }
  return undefined
}

/** Parses the command vocabulary; a leading slash is accepted on every command. */
export function parseCommand(text: string): ParsedCommand {
  const trimmed = text.trim()
  const match = /^\/?(\S+)\s*([\s\S]*)$/.exec(trimmed)
  if (!match) return { name: 'unknown', text: trimmed }
  const word = (match[1] ?? '').toLowerCase()
  const rest = (match[2] ?? '').trim()
  switch (word) {
    case 'help':
      return { name: 'help' }
    case 'list':
      return { name: 'list' }
    case 'find':
      return { name: 'find', query: rest }
    case 'ask':
      return { name: 'ask', question: rest }
    case 'delete':
      return { name: 'delete', ref: rest }
    default:
      return detectIntent(trimmed) ?? { name: 'unknown', text: trimmed }
  }
}

export const HELP_TEXT = [
  'Here are the commands you can use:',
  '',
  '• help - show this message',
  '• list - list your documents',
  '• find <query> - search your documents by name or description',
  '• ask <question> - ask a question about your documents',
  '• delete <number or filename> - delete one of your documents',
  '',
  'You can also send me documents, images, audio or video to store them.',
  'Reply to one of your files with a text to add a description.'
].join('\n')

function formatEntries(entries: LibraryEntry[]): string {
  return entries
    .map((entry, i) => `${i + 1}. ${entry.filename}${entry.description ? ` - ${entry.description}` : ''}`)
    .join('\n')
}

/** Picks an entry by its position in `list`, its filename or its job id. */
export function resolveEntry(entries: LibraryEntry[], ref: string): LibraryEntry | undefined {
  const trimmed = ref.trim()
  if (/^\d+$/.test(trimmed)) {
    return entries[Number(trimmed) - 1]
  }
  const lower = trimmed.toLowerCase()
  return entries.find((entry) => entry.filename.toLowerCase() === lower || entry.jobId === trimmed)
}

const REPLY_KIND = {
  list: 'list_command',
  find: 'find_command',
  ask: 'ask_command',
  delete: 'delete_command',
  describe: 'describe_command'
} as const satisfies Record<string, ReplyKind>

export interface CommandProcessorOptions {
  ledger: DeduplicationLedger
  sender: MessageSender
  library: DocumentLibrary
  answerer: QuestionAnswerer
  retry: RetryPolicy
  dedupeTtlSec: number
  stepTimeoutMs: number
  logger?: Logger
}

export class CommandProcessor {
  private readonly ledger: DeduplicationLedger
  private readonly sender: MessageSender
  private readonly library: DocumentLibrary
  private readonly answerer: QuestionAnswerer
  private readonly retry: RetryPolicy
  private readonly dedupeTtlSec: number
  private readonly stepTimeoutMs: number
  private readonly logger: Logger

  constructor(options: CommandProcessorOptions) {
    this.ledger = options.ledger
    this.sender = options.sender
    this.library = options.library
    this.answerer = options.answerer
    this.retry = options.retry
    this.dedupeTtlSec = options.dedupeTtlSec
    this.stepTimeoutMs = options.stepTimeoutMs
    this.logger = options.logger ?? createLogger('command-processor')
  }

  async handleCommand(event: CommandEvent): Promise<HandledResult> {
    const { messageId, sender } = event.message
    const log = this.logger.child({ messageId, sender: maskPhone(sender) })
    const key = ledgerKeys.inbound(sender, messageId)

    let claimed: boolean
    try {
      claimed = await this.ledger.claim(key, this.dedupeTtlSec)
    } catch (err) {
      log.error({ evt: 'ledger_unavailable', err: errorMessage(err) }, 'Inbound ledger unavailable')
      return { status: 'failed', messageId, reason: 'ledger_unavailable', retryable: true }
    }
    if (!claimed) {
      log.info({ evt: 'duplicate_skipped' }, 'Command already handled')
      return { status: 'duplicate_skipped', messageId, reason: 'message_seen' }
    }

    const description = event.text.trim()
    const command: ParsedCommand = event.replyTo && description
      ? { name: 'describe', replyTo: event.replyTo, description }
      : parseCommand(event.text)
    log.info({ evt: 'command_received', command: command.name }, 'Handling command')
    const delivery = await this.execute(command, sender, log)

    if (delivery.status === 'failed') {
      if (!delivery.fatal) {
        // Let the platform redeliver the command
        await this.ledger.release(key).catch((err: unknown) => {
          log.error({ evt: 'ledger_unavailable', err: errorMessage(err) }, 'Could not release inbound claim')
        })
      }
      return { status: 'failed', messageId, reason: `reply_failed:${delivery.reason}`, retryable: !delivery.fatal }
    }
    return { status: 'processed', messageId, detail: command.name }
  }

  private async execute(command: ParsedCommand, sender: string, log: Logger): Promise<DeliveryResult> {
    switch (command.name) {
      case 'help':
        return this.reply(sender, HELP_TEXT, 'help_command')
      case 'list':
        return this.withLibrary(sender, 'list', log, async () => {
          const entries = await this.library.list(sender)
          return entries.length > 0
            ? `Your documents:\n${formatEntries(entries)}`
            : "You don't have any documents yet. Send me a file to get started!"
        })
      case 'find':
        if (!command.query) {
          return this.reply(sender, 'Usage: find <query>', 'find_command')
        }
        return this.withLibrary(sender, 'find', log, async () => {
          const entries = await this.library.find(sender, command.query)
          return entries.length > 0
            ? `Search results for "${command.query}":\n${formatEntries(entries)}`
            : `No documents found matching "${command.query}". Try a different search term.`
        })
      case 'ask':
        return this.ask(sender, command.question, log)
      case 'delete':
        if (!command.ref) {
          return this.reply(sender, 'Usage: delete <number or filename>', 'delete_command')
        }
        return this.withLibrary(sender, 'delete', log, async () => {
          const target = resolveEntry(await this.library.list(sender), command.ref)
          const removed = target ? await this.library.remove(sender, target.jobId) : null
          return removed
            ? `Deleted "${removed.filename}".`
            : `No document matches "${command.ref}". Send "list" to see your documents.`
        })
      case 'describe':
        return this.describe(sender, command, log)
      case 'unknown':
        return this.reply(
          sender,
          `I didn't understand "${command.text.slice(0, 60)}". Send "help" to see what I can do.`,
          'unknown_command'
        )
    }
  }

  // A reply that does not point at a stored document is handled as an ordinary command
  private async describe(
    sender: string,
    command: Extract<ParsedCommand, { name: 'describe' }>,
    log: Logger
  ): Promise<DeliveryResult> {
    let entry: LibraryEntry | null
    try {
      entry = await this.library.describe(sender, command.replyTo, command.description)
    } catch (err) {
      log.error({ evt: 'command_failed', command: 'describe', err: errorMessage(err) }, 'Command failed')
      return this.reply(sender, 'Sorry, something went wrong with "describe". Please try again.', 'command_error')
    }
    if (!entry) {
      return this.execute(parseCommand(command.description), sender, log)
    }
    log.info({ evt: 'document_described', jobId: entry.jobId }, 'Description saved')
    return this.reply(sender, `Description saved for "${entry.filename}".`, 'describe_command')
  }

  private async ask(sender: string, question: string, log: Logger): Promise<DeliveryResult> {
    if (!question) {
      return this.reply(sender, 'Usage: ask <question>', 'ask_command')
    }
    const ack = await this.reply(sender, `Looking into: "${question}". This may take a moment...`, 'ask_command')
    if (ack.status === 'failed') return ack
    return this.withLibrary(sender, 'ask', log, async () => {
      const outcome = await this.retry.execute(() =>
        withTimeout('ask', this.stepTimeoutMs, (signal) => this.answerer.ask(sender, question, signal))
      )
      return outcome.value
    })
  }

  private async withLibrary(
    sender: string,
    name: 'list' | 'find' | 'ask' | 'delete',
    log: Logger,
    build: () => Promise<string>
  ): Promise<DeliveryResult> {
    let body: string
    try {
      body = await build()
    } catch (err) {
      const cause = err instanceof RetryExhaustedError ? err.lastError : err
      log.error({ evt: 'command_failed', command: name, err: errorMessage(cause) }, 'Command failed')
      return this.reply(sender, `Sorry, something went wrong with "${name}". Please try again.`, 'command_error')
    }
    return this.reply(sender, body, REPLY_KIND[name])
  }

  private reply(recipient: string, body: string, replyKind: ReplyKind): Promise<DeliveryResult> {
    return this.sender.send({ recipient, body, replyKind, bypassDedup: true })
  }
}
