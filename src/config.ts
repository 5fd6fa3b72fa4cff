import path from 'path'
import { z } from 'zod'

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback)

const optionalString = z.string().trim().optional().transform((value) => (value ? value : undefined))

const envSchema = z.object({
  PORT: intFromEnv(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  REDIS_URL: optionalString.refine(
    (url) => url === undefined || validateRedisUrl(url),
    { message: 'REDIS_URL must use the redis:, rediss: or redis+tls: scheme' }
  ),
  DEDUPE_TTL_SEC: intFromEnv(600),
  REPLY_DEDUPE_TTL_SEC: intFromEnv(60),
  JOB_LEASE_SEC: intFromEnv(300),
  JOB_RETENTION_SEC: intFromEnv(86400),
  STEP_TIMEOUT_MS: intFromEnv(30000),
  HTTP_TIMEOUT_MS: intFromEnv(10000),
  RETRY_MAX_ATTEMPTS: intFromEnv(3),
  RETRY_BASE_DELAY_MS: intFromEnv(500),
  RETRY_MAX_DELAY_MS: intFromEnv(8000),
  WHATSAPP_API_BASE: z.string().url().default('https://graph.facebook.com'),
  WHATSAPP_API_VERSION: z.string().default('v17.0'),
  WHATSAPP_PHONE_NUMBER_ID: optionalString,
  WHATSAPP_ACCESS_TOKEN: optionalString,
  WHATSAPP_VERIFY_TOKEN: optionalString,
  STORAGE_DIR: optionalString,
  PROCESSING_URL: optionalString.refine(
    (url) => url === undefined || /^https?:\/\//.test(url),
    { message: 'PROCESSING_URL must be an http(s) URL' }
  ),
  PROCESSING_API_KEY: optionalString,
  API_TOKENS: z.string().default(''),
  STREAM_SENT: z.string().default('sent_history'),
  ROUTING_MAXLEN: intFromEnv(10000),
  SENT_INDEX_TTL_SEC: intFromEnv(604800)
}).superRefine((e, ctx) => {
  // Leases are renewed on state changes only, so one step must fit in a lease
  const worstStepMs = worstCaseStepMs({
    maxAttempts: e.RETRY_MAX_ATTEMPTS,
    timeoutMs: Math.max(e.STEP_TIMEOUT_MS, e.HTTP_TIMEOUT_MS),
    baseDelayMs: e.RETRY_BASE_DELAY_MS,
    maxDelayMs: e.RETRY_MAX_DELAY_MS
  })
  if (e.JOB_LEASE_SEC * 1000 <= worstStepMs) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['JOB_LEASE_SEC'],
      message: `must be longer than the worst-case step of ${worstStepMs}ms`
    })
  }
})

export interface AppConfig {
  port: number
  logLevel: string
  redisUrl: string | undefined
  dedupeTtlSec: number
  replyDedupeTtlSec: number
  jobLeaseMs: number
  jobRetentionMs: number
  stepTimeoutMs: number
  httpTimeoutMs: number
  retry: {
    maxAttempts: number
    baseDelayMs: number
    maxDelayMs: number
  }
  whatsapp: {
    apiBase: string
    apiVersion: string
    phoneNumberId: string | undefined
    accessToken: string | undefined
    verifyToken: string | undefined
  }
  storageDir: string
  processingUrl: string | undefined
  processingApiKey: string | undefined
  apiTokens: string[]
  streamSent: string
  routingMaxLen: number
  sentIndexTtlSec: number
}

/** Every attempt timing out, plus the backoff between attempts. */
export function worstCaseStepMs(options: {
  maxAttempts: number
  timeoutMs: number
  baseDelayMs: number
  maxDelayMs: number
}): number {
  let total = options.maxAttempts * options.timeoutMs
  for (let attempt = 1; attempt < options.maxAttempts; attempt++) {
    total += Math.min(options.baseDelayMs * Math.pow(2, attempt - 1), options.maxDelayMs)
  }
  return total
}

export function validateRedisUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return ['redis:', 'rediss:', 'redis+tls:'].includes(parsed.protocol)
  } catch {
    return false
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`))
  }
  const e = parsed.data
  return Object.freeze({
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    redisUrl: e.REDIS_URL,
    dedupeTtlSec: e.DEDUPE_TTL_SEC,
    replyDedupeTtlSec: e.REPLY_DEDUPE_TTL_SEC,
    jobLeaseMs: e.JOB_LEASE_SEC * 1000,
    jobRetentionMs: e.JOB_RETENTION_SEC * 1000,
    stepTimeoutMs: e.STEP_TIMEOUT_MS,
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    retry: {
      maxAttempts: e.RETRY_MAX_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS
    },
    whatsapp: {
      apiBase: e.WHATSAPP_API_BASE.replace(/\/+$/, ''),
      apiVersion: e.WHATSAPP_API_VERSION,
      phoneNumberId: e.WHATSAPP_PHONE_NUMBER_ID,
      accessToken: e.WHATSAPP_ACCESS_TOKEN,
      verifyToken: e.WHATSAPP_VERIFY_TOKEN
    },
    storageDir: path.resolve(e.STORAGE_DIR ?? path.join(process.cwd(), 'data')),
    processingUrl: e.PROCESSING_URL?.replace(/\/+$/, ''),
    processingApiKey: e.PROCESSING_API_KEY,
    apiTokens: e.API_TOKENS.split(',').map((s) => s.trim()).filter((s) => s.length > 0),
    streamSent: e.STREAM_SENT,
    routingMaxLen: e.ROUTING_MAXLEN,
    sentIndexTtlSec: e.SENT_INDEX_TTL_SEC
  })
}
