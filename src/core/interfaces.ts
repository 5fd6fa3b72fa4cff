/**
 * Seams to the external collaborators the pipeline drives
 */

export interface DocumentMetadata {
  jobId: string
  sender: string
  filename: string
  mimeType: string
  messageId?: string
  description?: string
}

/**
 * Durable storage for document bytes. Storing the same jobId twice must
 * yield the same location, never a second artifact.
 */
export interface DocumentStorage {
  store(bytes: Buffer, metadata: DocumentMetadata, signal?: AbortSignal): Promise<string>
  exists(location: string): Promise<boolean>
}

export interface LibraryEntry {
  jobId: string
  filename: string
  mimeType: string
  location: string
  storedAt: number
  messageId?: string
  description?: string
}

/** The stored documents of each sender. */
export interface DocumentLibrary {
  list(sender: string): Promise<LibraryEntry[]>
  /** Case-insensitive match on filename or description. */
  find(sender: string, query: string): Promise<LibraryEntry[]>
  /** Sets the description of the document delivered by `messageId`; null when there is none. */
  describe(sender: string, messageId: string, description: string): Promise<LibraryEntry | null>
  /** Deletes the artifact and its entry; null when the sender has no such job. */
  remove(sender: string, jobId: string): Promise<LibraryEntry | null>
}

export interface ProcessingResult {
  summary?: string
  [key: string]: unknown
}

/** Runs downstream processing (indexing, extraction) on a stored artifact. */
export interface Processing {
  run(location: string, metadata: DocumentMetadata, signal?: AbortSignal): Promise<ProcessingResult>
}

export interface QuestionAnswerer {
  ask(sender: string, question: string, signal?: AbortSignal): Promise<string>
}
