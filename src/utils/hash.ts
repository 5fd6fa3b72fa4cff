import { createHash, randomBytes } from 'crypto'

export function hash(value: string | Buffer): string {
  return createHash('sha1').update(value).digest('hex')
}

/** Stable job id for a document event: the same media from the same sender maps to one job. */
export function documentJobId(sender: string, mediaRef: string): string {
  return hash(`${sender}:${mediaRef}`)
}

export function uniquenessToken(now: number = Date.now()): string {
  return `${now.toString(36)}-${randomBytes(3).toString('hex')}`
}
