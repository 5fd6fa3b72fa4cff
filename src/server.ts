import express from 'express'
import dotenv from 'dotenv'
import { loadConfig, type AppConfig } from './config.js'
import type { DocumentLibrary, DocumentStorage, Processing, QuestionAnswerer } from './core/interfaces.js'
import { closeRedisClient, createRedisClient, type RedisClient } from './infra/redis.js'
import { apiKeyAuth } from './middleware/auth.js'
import { createHealthRouter } from './routes/health.js'
import { createJobsRouter } from './routes/jobs.js'
import { createWebhookRouter } from './routes/webhook.js'
import { AlertChannel } from './services/alerts.js'
import { CommandProcessor } from './services/commandProcessor.js'
import { DocumentDownloader } from './services/documentDownloader.js'
import { DocumentProcessor } from './services/documentProcessor.js'
import { DocumentTracker } from './services/documentTracker.js'
import { EventRouter } from './services/eventRouter.js'
import { MemoryJobStore, RedisJobStore, type JobStore } from './services/jobStore.js'
import { MemoryLedger, RedisLedger, type DeduplicationLedger } from './services/ledger.js'
import { LocalDocumentStorage } from './services/localStorage.js'
import { MessageSender } from './services/messageSender.js'
import { FileInfoProcessing, RemoteProcessingClient } from './services/remoteProcessing.js'
import { MemorySentRecorder, RedisSentRecorder, type SentMessageRecorder } from './services/sentRecorder.js'
import { EnvCredentialProvider, WhatsAppCloudClient, type MessagingPlatform } from './services/whatsappCloud.js'
import { createLogger, type Logger } from './utils/logger.js'
import { RetryPolicy } from './utils/retry.js'

export interface ServiceOverrides {
  redis?: RedisClient
  platform?: MessagingPlatform
  storage?: DocumentStorage & DocumentLibrary
  processing?: Processing & QuestionAnswerer
  logger?: Logger
}

export interface Services {
  config: AppConfig
  alerts: AlertChannel
  ledger: DeduplicationLedger
  tracker: DocumentTracker
  sender: MessageSender
  documents: DocumentProcessor
  commands: CommandProcessor
  router: EventRouter
  redis: RedisClient | undefined
  /** In-process stores that need periodic expiry; empty when Redis is used. */
  sweepable: Array<{ sweep(): number }>
}

/** Wires every component from configuration. */
export function buildServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const child = (component: string): Logger =>
    overrides.logger ? overrides.logger.child({ component }) : createLogger(component)
  const { redis } = overrides
  const sweepable: Array<{ sweep(): number }> = []

  let ledger: DeduplicationLedger
  let jobStore: JobStore
  let recorder: SentMessageRecorder
  if (redis) {
    ledger = new RedisLedger(redis)
    jobStore = new RedisJobStore(redis)
    recorder = new RedisSentRecorder(redis, config.streamSent, config.routingMaxLen, config.sentIndexTtlSec)
  } else {
    const memoryLedger = new MemoryLedger()
    const memoryJobs = new MemoryJobStore()
    sweepable.push(memoryLedger, memoryJobs)
    ledger = memoryLedger
    jobStore = memoryJobs
    recorder = new MemorySentRecorder(config.routingMaxLen)
  }

  const alerts = new AlertChannel()
  const retry = new RetryPolicy({
    maxAttempts: config.retry.maxAttempts,
    baseDelayMs: config.retry.baseDelayMs,
    maxDelayMs: config.retry.maxDelayMs
  })

  const platform = overrides.platform ?? new WhatsAppCloudClient({
    apiBase: config.whatsapp.apiBase,
    apiVersion: config.whatsapp.apiVersion,
    phoneNumberId: config.whatsapp.phoneNumberId,
    credentials: new EnvCredentialProvider(config.whatsapp.accessToken),
    timeoutMs: config.httpTimeoutMs,
    logger: child('whatsapp-cloud')
  })
  const storage = overrides.storage ?? new LocalDocumentStorage(config.storageDir, child('local-storage'))
  const processing = overrides.processing ?? (config.processingUrl
    ? new RemoteProcessingClient({
        baseUrl: config.processingUrl,
        timeoutMs: config.httpTimeoutMs,
        apiKey: config.processingApiKey,
        logger: child('remote-processing')
      })
    : new FileInfoProcessing())

  const tracker = new DocumentTracker({
    store: jobStore,
    leaseMs: config.jobLeaseMs,
    retentionMs: config.jobRetentionMs,
    logger: child('document-tracker')
  })
  const sender = new MessageSender({
    platform,
    ledger,
    retry,
    replyDedupeTtlSec: config.replyDedupeTtlSec,
    timeoutMs: config.httpTimeoutMs,
    alerts,
    recorder,
    logger: child('message-sender')
  })
  const documents = new DocumentProcessor({
    tracker,
    downloader: new DocumentDownloader(platform, child('document-downloader')),
    storage,
    processing,
    sender,
    retry,
    stepTimeoutMs: config.stepTimeoutMs,
    alerts,
    logger: child('document-processor')
  })
  const commands = new CommandProcessor({
    ledger,
    sender,
    library: storage,
    answerer: processing,
    retry,
    dedupeTtlSec: config.dedupeTtlSec,
    stepTimeoutMs: config.stepTimeoutMs,
    logger: child('command-processor')
  })
  const router = new EventRouter({
    commands,
    documents,
    ledger,
    sender,
    dedupeTtlSec: config.dedupeTtlSec,
    logger: child('event-router')
  })

  return { config, alerts, ledger, tracker, sender, documents, commands, router, redis, sweepable }
}

export function createApp(services: Services, logger: Logger = createLogger('http')): express.Express {
  const app = express()
  app.use(express.json({ limit: '1mb' }))
  app.use(apiKeyAuth(services.config.apiTokens))
  app.use(createHealthRouter({ redis: services.redis }))
  app.use(createWebhookRouter({
    router: services.router,
    verifyToken: services.config.whatsapp.verifyToken,
    logger
  }))
  app.use(createJobsRouter({ tracker: services.tracker, processor: services.documents, logger }))
  return app
}

async function main(): Promise<void> {
  dotenv.config({ path: process.env.ENV_PATH || '.env' })
  const config = loadConfig()
  const logger = createLogger('server')

  let redis: RedisClient | undefined
  if (config.redisUrl) {
    redis = createRedisClient(config.redisUrl, logger)
    await redis.connect()
  } else {
    logger.warn('REDIS_URL not set: using in-process stores, deduplication holds for this instance only')
  }

  const services = buildServices(config, { redis })
  services.alerts.subscribe((alert) => {
    logger.fatal({ evt: alert.kind, component: alert.component, reason: alert.message }, 'Operational alert')
  })

  const sweeper = setInterval(() => {
    for (const store of services.sweepable) store.sweep()
  }, 60_000)
  sweeper.unref()

  const server = createApp(services).listen(config.port, () => {
    logger.info(`Server listening on http://localhost:${config.port}`)
  })

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down')
    clearInterval(sweeper)
    server.close(() => {
      const closing = redis ? closeRedisClient(redis, logger) : Promise.resolve()
      closing.finally(() => process.exit(0)).catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed')
      })
    })
  }
  process.on('SIGTERM', () => shutdown('SIGTERM'))
  process.on('SIGINT', () => shutdown('SIGINT'))
}

if (process.env.NODE_ENV !== 'test') {
  main().catch((err: unknown) => {
    createLogger('server').fatal({ err }, 'Failed to start')
    process.exit(1)
  })
}
