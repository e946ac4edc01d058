#!/usr/bin/env node

/**
 * Collector Worker
 * Starts one BullMQ worker per inventory queue, the scheduler and the
 * metrics server.
 */

// Load environment variables first, before any other imports
import './env'

import { resolve } from 'path'
import { Worker, type ConnectionOptions } from 'bullmq'
import { Registry as PromRegistry, collectDefaultMetrics } from 'prom-client'
import { PgStorage, applySchemaFile, createPool, poolQuery, warmupDatabase } from '@cloudledger/db'
import type { ILogger } from '@cloudledger/logger'
import { createRedisConnection, resolveRedisSettings, warmupRedis } from '@cloudledger/redis'
import { buildHandlerRegistry, buildProviders, createModelRegistry, loadProviderAdapters } from './bootstrap'
import { loadEnv, loadInventoryConfig } from './config/config'
import { loggers } from './config/logger'
import { BullTaskSubmitter, QueueSet, type TaskEnvelope } from './config/queues'
import { createProcessor, type DispatchJob } from './core/dispatch'
import { DynamicMetricsCollector, createTaskMetrics } from './core/metrics'
import { systemClock, type Services } from './core/task'
import { InventoryScheduler } from './scheduler'
import { createMetricsApp, startMetricsServer } from './server/metrics-server'

const log = loggers.worker

export const SCHEMA_PATH = resolve(__dirname, '..', 'schema', '0001_inventory.sql')

export function startQueueWorkers(
  queueNames: readonly string[],
  processor: (job: DispatchJob) => Promise<void>,
  connection: ConnectionOptions,
  concurrency: number,
  workerLog: ILogger
): Worker<TaskEnvelope>[] {
  return queueNames.map((queueName) => {
    const worker = new Worker<TaskEnvelope>(queueName, processor, { connection, concurrency })

    worker.on('failed', (job, error) => {
      workerLog.warn(
        'INVENTORY_WORKER_JOB_FAILED',
        {
          event_name: 'INVENTORY_WORKER_JOB_FAILED',
          queueName,
          jobId: job?.id,
          taskName: job?.name,
          attemptsMade: job?.attemptsMade,
          errorMessage: error.message,
        },
        error
      )
    })

    worker.on('error', (error) => {
      workerLog.error('INVENTORY_WORKER_ERROR', { event_name: 'INVENTORY_WORKER_ERROR', queueName }, error)
    })

    workerLog.info('INVENTORY_WORKER_START', { event_name: 'INVENTORY_WORKER_START', queueName, concurrency })
    return worker
  })
}

async function main(): Promise<void> {
  const env = loadEnv()
  const inventory = await loadInventoryConfig(env.INVENTORY_CONFIG)

  // Database
  const pool = createPool(
    {
      connectionString: env.DATABASE_URL,
      poolMax: env.DB_POOL_MAX,
      poolMin: env.DB_POOL_MIN,
      applicationName: 'collector',
    },
    loggers.db
  )
  if (!(await warmupDatabase(pool, loggers.db))) {
    log.warn('Starting anyway, expect database errors')
  }
  const query = poolQuery(pool)
  if (env.DB_APPLY_SCHEMA) {
    await applySchemaFile(query, SCHEMA_PATH)
    loggers.db.info('Schema applied', { path: SCHEMA_PATH })
  }

  // Queue
  const redisSettings = resolveRedisSettings({
    url: env.REDIS_URL,
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    password: env.REDIS_PASSWORD,
  })
  await warmupRedis(redisSettings, loggers.redis)
  const connection = createRedisConnection(redisSettings, loggers.redis)
  const queues = new QueueSet(connection)

  // Metrics
  const promRegistry = new PromRegistry()
  collectDefaultMetrics({ register: promRegistry })

  const services: Services = {
    storage: new PgStorage(query),
    submitter: new BullTaskSubmitter(queues),
    metrics: new DynamicMetricsCollector(promRegistry),
    models: createModelRegistry(),
    clock: systemClock,
  }

  const adapters = await loadProviderAdapters(inventory)
  const providers = await buildProviders(inventory, adapters, loggers.bootstrap)
  const handlers = buildHandlerRegistry(services, providers, inventory.housekeeper.retention)
  loggers.bootstrap.info('Registration complete', {
    event_name: 'INVENTORY_BOOTSTRAP_DONE',
    providers: providers.map((provider) => provider.provider),
    handlers: handlers.size(),
    models: services.models.size(),
  })

  const shutdownController = new AbortController()
  const processor = createProcessor({
    handlers,
    log: loggers.tasks,
    metrics: createTaskMetrics(promRegistry),
    signal: shutdownController.signal,
  })
  const workers = startQueueWorkers(inventory.queues, processor, connection, env.WORKER_CONCURRENCY, log)

  const scheduler = new InventoryScheduler(queues, inventory.schedules, inventory.queues[0], loggers.scheduler)
  await scheduler.start()

  const server = await startMetricsServer(
    createMetricsApp({
      registry: promRegistry,
      checks: {
        db: async () => {
          await query('SELECT 1')
          return true
        },
        redis: async () => {
          const client = await queues.get(inventory.queues[0]).client
          return (await client.ping()) === 'PONG'
        },
      },
    }),
    env.METRICS_PORT,
    loggers.metrics
  )

  // Track if shutdown is in progress to prevent double-shutdown
  let isShuttingDown = false

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      log.info('Shutdown already in progress')
      return
    }
    isShuttingDown = true

    log.info('Received signal, starting graceful shutdown', { signal })
    const shutdownStart = Date.now()

    try {
      // 1. Stop scheduling new jobs
      await scheduler.stop()

      // 2. Tell running handlers to stop between pages, then wait for them
      shutdownController.abort()
      await Promise.all(workers.map((worker) => worker.close()))
      log.info('All workers closed')

      // 3. Release connections
      await queues.close()
      await new Promise<void>((resolveClose) => server.close(() => resolveClose()))
      await pool.end()

      log.info('Graceful shutdown complete', { durationMs: Date.now() - shutdownStart })
      process.exit(0)
    } catch (error) {
      log.error('Error during shutdown', {}, error)
      process.exit(1)
    }
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'))
  process.on('SIGINT', () => void shutdown('SIGINT'))
}

if (require.main === module) {
  main().catch((error: unknown) => {
    log.fatal('Collector failed to start', {}, error)
    process.exit(1)
  })
}
