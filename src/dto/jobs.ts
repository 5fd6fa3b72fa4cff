import { z } from 'zod'

export const JOB_STATES = [
  'Received',
  'Downloading',
  'Downloaded',
  'Storing',
  'Stored',
  'Processing',
  'Completed',
  'Failed'
] as const

export type JobState = typeof JOB_STATES[number]

export const TERMINAL_STATES: ReadonlySet<JobState> = new Set<JobState>(['Completed', 'Failed'])

export function isTerminal(state: JobState): boolean {
  return TERMINAL_STATES.has(state)
}

export const documentJobSchema = z.object({
  jobId: z.string(),
  sender: z.string(),
  mediaRef: z.string(),
  filename: z.string(),
  mimeType: z.string(),
  messageId: z.string().optional(),
  description: z.string().optional(),
  state: z.enum(JOB_STATES),
  retryCount: z.number().int().min(0),
  lastError: z.string().nullable(),
  failedStage: z.enum(['download', 'store', 'process']).nullable(),
  leaseOwner: z.string().nullable(),
  leaseExpiresAt: z.number().nullable(),
  storageLocation: z.string().nullable(),
  result: z.unknown().optional(),
  createdAt: z.number(),
  updatedAt: z.number()
})

export type DocumentJob = z.infer<typeof documentJobSchema>

export interface VersionedJob {
  job: DocumentJob
  version: number
}

/** Identity of a document event, known before any job exists. */
export interface JobSeed {
  jobId: string
  sender: string
  mediaRef: string
  filename: string
  mimeType: string
  /** Inbound message that carried the document; replies to it describe the document. */
  messageId?: string
  description?: string
}
