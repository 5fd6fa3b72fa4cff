import * as fs from 'fs/promises'
import * as path from 'path'
import { v4 as uuidv4 } from 'uuid'
import { z } from 'zod'
import type { DocumentLibrary, DocumentMetadata, DocumentStorage, LibraryEntry } from '../core/interfaces.js'
import { errorMessage, StorageError } from '../errors.js'
import { createLogger, maskPhone, type Logger } from '../utils/logger.js'

const indexSchema = z.array(z.object({
  jobId: z.string(),
  filename: z.string(),
  mimeType: z.string(),
  location: z.string(),
  storedAt: z.number(),
  messageId: z.string().optional(),
  description: z.string().optional()
}))

function safeSegment(value: string): string {
  const cleaned = value.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^\.+/, '')
  return cleaned.length > 0 ? cleaned.slice(0, 120) : 'file'
}

/**
 * Keeps documents on local disk under `{root}/documents/{sender}/` with a
 * per-sender index.json that backs the library operations.
 */
export class LocalDocumentStorage implements DocumentStorage, DocumentLibrary {
  private readonly root: string
  private readonly logger: Logger
  // Index writes for one sender are serialized within this process
  private readonly indexLocks = new Map<string, Promise<void>>()

  constructor(rootDir: string, logger?: Logger) {
    this.root = path.join(rootDir, 'documents')
    this.logger = logger ?? createLogger('local-storage')
  }

  async store(bytes: Buffer, metadata: DocumentMetadata, signal?: AbortSignal): Promise<string> {
    const dir = this.senderDir(metadata.sender)
    const location = path.join(dir, `${metadata.jobId}-${safeSegment(metadata.filename)}`)
    const entry: LibraryEntry = {
      jobId: metadata.jobId,
      filename: metadata.filename,
      mimeType: metadata.mimeType,
      location,
      storedAt: Date.now(),
      ...(metadata.messageId ? { messageId: metadata.messageId } : {}),
      ...(metadata.description ? { description: metadata.description } : {})
    }
    try {
      signal?.throwIfAborted()
      await fs.mkdir(dir, { recursive: true })
      if (!(await this.exists(location))) {
        // Each attempt writes its own temp file; rename publishes it atomically
        const tmp = `${location}.${uuidv4()}.tmp`
        try {
          await fs.writeFile(tmp, bytes, { signal })
          await fs.rename(tmp, location)
        } finally {
          await fs.rm(tmp, { force: true })
        }
      }
      await this.updateIndex(metadata.sender, (entries) => {
        const previous = entries.find((e) => e.jobId === entry.jobId)
        const description = entry.description ?? previous?.description
        return [
          ...entries.filter((e) => e.jobId !== entry.jobId),
          description ? { ...entry, description } : entry
        ]
      })
    } catch (err) {
      throw new StorageError(`could not store ${metadata.filename}: ${errorMessage(err)}`, { cause: err })
    }
    this.logger.info({ jobId: metadata.jobId, sender: maskPhone(metadata.sender), size: bytes.length }, 'Document stored')
    return location
  }

  async exists(location: string): Promise<boolean> {
    try {
      await fs.access(location)
      return true
    } catch {
      return false
    }
  }

  async list(sender: string): Promise<LibraryEntry[]> {
    const entries = await this.readIndex(sender)
    return entries.sort((a, b) => a.storedAt - b.storedAt)
  }

  async find(sender: string, query: string): Promise<LibraryEntry[]> {
    const needle = query.trim().toLowerCase()
    if (!needle) return []
    const entries = await this.list(sender)
    return entries.filter((entry) =>
      entry.filename.toLowerCase().includes(needle) || (entry.description ?? '').toLowerCase().includes(needle)
    )
  }

  async describe(sender: string, messageId: string, description: string): Promise<LibraryEntry | null> {
    const described: LibraryEntry[] = []
    try {
      await this.updateIndex(sender, (entries) =>
        entries.map((entry) => {
          if (entry.messageId !== messageId) return entry
          const next = { ...entry, description }
          described.push(next)
          return next
        })
      )
    } catch (err) {
      throw new StorageError(`could not describe document: ${errorMessage(err)}`, { cause: err })
    }
    return described[0] ?? null
  }

  async remove(sender: string, jobId: string): Promise<LibraryEntry | null> {
    const removed: LibraryEntry[] = []
    try {
      await this.updateIndex(sender, (entries) =>
        entries.filter((entry) => {
          if (entry.jobId !== jobId) return true
          removed.push(entry)
          return false
        })
      )
      for (const entry of removed) {
        await fs.rm(entry.location, { force: true })
      }
    } catch (err) {
      throw new StorageError(`could not delete document: ${errorMessage(err)}`, { cause: err })
    }
    return removed[0] ?? null
  }

  private senderDir(sender: string): string {
    return path.join(this.root, safeSegment(sender))
  }

  private indexFile(sender: string): string {
    return path.join(this.senderDir(sender), 'index.json')
  }

  private async readIndex(sender: string): Promise<LibraryEntry[]> {
    let raw: string
    try {
      raw = await fs.readFile(this.indexFile(sender), 'utf8')
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return []
      throw new StorageError(`could not read document index: ${errorMessage(err)}`, { cause: err })
    }
    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (err) {
      throw new StorageError('document index is not valid JSON', { cause: err })
    }
    const parsed = indexSchema.safeParse(json)
    if (!parsed.success) {
      throw new StorageError('document index failed validation', { cause: parsed.error })
    }
    return parsed.data
  }

  private async updateIndex(sender: string, update: (entries: LibraryEntry[]) => LibraryEntry[]): Promise<void> {
    const previous = this.indexLocks.get(sender) ?? Promise.resolve()
    const next = previous.then(async () => {
      const entries = update(await this.readIndex(sender))
      const file = this.indexFile(sender)
      await fs.mkdir(path.dirname(file), { recursive: true })
      await fs.writeFile(`${file}.tmp`, JSON.stringify(entries, null, 2))
      await fs.rename(`${file}.tmp`, file)
    })
    // Keep the chain alive after a failed write; the caller still sees the error
    const settled = next.catch((err: unknown) => {
      this.logger.warn({ err: errorMessage(err) }, 'Document index update failed')
    })
    this.indexLocks.set(sender, settled)
    try {
      await next
    } finally {
      if (this.indexLocks.get(sender) === settled) {
        this.indexLocks.delete(sender)
      }
    }
  }
}
