/**
 * @cloudledger/redis - Shared Redis connection utilities
 *
 * Single source of connection options for the task queue. BullMQ queues and
 * workers receive the options object and open their own connections.
 */

import Redis, { RedisOptions } from 'ioredis'
import type { ILogger } from '@cloudledger/logger'

export interface RedisSettings {
  host: string
  port: number
  password?: string
  db?: number
}

/**
 * Resolve settings from either a redis:// URL or discrete host/port/password.
 * The URL wins when both are present.
 */
export function resolveRedisSettings(input: {
  url?: string
  host: string
  port: number
  password?: string
}): RedisSettings {
  if (input.url) {
    const url = new URL(input.url)
    const db = url.pathname.length > 1 ? parseInt(url.pathname.slice(1), 10) : undefined
    return {
      host: url.hostname,
      port: parseInt(url.port || '6379', 10),
      password: url.password ? decodeURIComponent(url.password) : undefined,
      db: db !== undefined && Number.isFinite(db) ? db : undefined,
    }
  }
  return { host: input.host, port: input.port, password: input.password }
}

/**
 * Connection info for logging (never includes the password).
 */
export function describeRedis(settings: RedisSettings): string {
  return `${settings.host}:${settings.port}${settings.db !== undefined ? `/${settings.db}` : ''}`
}

const RECONNECT_ERRORS = [
  'READONLY',
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
]

/**
 * Redis connection options with retry and keepalive settings.
 *
 * - TCP keepalive to prevent idle connection drops (ECONNRESET)
 * - Linear backoff capped at 30s, with a circuit breaker on log volume
 * - Reconnection on common network errors
 */
export function createRedisConnection(settings: RedisSettings, log: ILogger): RedisOptions {
  const connection = describeRedis(settings)
  let consecutiveFailures = 0
  let lastCircuitBreakerLog = 0

  return {
    host: settings.host,
    port: settings.port,
    password: settings.password,
    db: settings.db,

    // BullMQ compatibility - must be null for worker queues
    maxRetriesPerRequest: null,

    keepAlive: 10000,
    connectTimeout: 10000,
    enableOfflineQueue: true,

    retryStrategy(times: number) {
      consecutiveFailures = times

      // After 20 attempts log at most once per minute
      if (times > 20) {
        const now = Date.now()
        if (now - lastCircuitBreakerLog > 60000) {
          lastCircuitBreakerLog = now
          log.error('Redis circuit breaker: prolonged outage', { attempts: times, connection })
        }
        return 30000
      }

      const delay = Math.min(times * 500, 30000)
      log.info('Reconnecting', { attempt: times, delayMs: delay })
      return delay
    },

    reconnectOnError(err: Error) {
      if (RECONNECT_ERRORS.some((e) => err.message.includes(e))) {
        if (consecutiveFailures <= 20) {
          log.warn('Reconnecting due to error', { error: err.message })
        }
        return true
      }
      return false
    },
  }
}

/**
 * Warm up Redis connection with retries.
 *
 * Used at start-up so that workers are not created against an unreachable
 * broker.
 */
export async function warmupRedis(
  settings: RedisSettings,
  log: ILogger,
  maxAttempts = 5
): Promise<boolean> {
  const connection = describeRedis(settings)

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const client = new Redis({
      host: settings.host,
      port: settings.port,
      password: settings.password,
      db: settings.db,
      maxRetriesPerRequest: 1,
      retryStrategy: () => null,
      connectTimeout: 5000,
      lazyConnect: true,
    })

    try {
      log.info('Connection attempt', { attempt, maxAttempts, connection })
      await client.connect()
      await client.ping()
      log.info('Connection established successfully', { connection })
      return true
    } catch (error) {
      log.error('Connection failed', { attempt, connection }, error)

      if (attempt < maxAttempts) {
        const delayMs = Math.min(2000 * Math.pow(2, attempt - 1), 30000)
        log.info('Retrying', { delayMs })
        await new Promise((resolve) => setTimeout(resolve, delayMs))
      }
    } finally {
      client.disconnect()
    }
  }

  log.error('Failed to establish connection after all attempts', { maxAttempts, connection })
  return false
}

export type { RedisOptions }
