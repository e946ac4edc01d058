import { Pool, PoolConfig } from 'pg'
import type { ILogger } from '@cloudledger/logger'

export interface DatabaseSettings {
  connectionString: string
  poolMax: number
  poolMin: number
  applicationName: string
}

/**
 * Connection pool configuration
 *
 * Pool sizes come from DB_POOL_MAX / DB_POOL_MIN through the collector config.
 */
export function getPoolConfig(settings: DatabaseSettings): PoolConfig {
  return {
    connectionString: settings.connectionString,

    // === Pool Size ===
    max: settings.poolMax,
    min: settings.poolMin,

    // === Timeouts ===
    idleTimeoutMillis: 30000,       // Close idle clients after 30s
    connectionTimeoutMillis: 5000,   // Error if can't connect within 5s

    // === Connection Recycling ===
    maxUses: 7500,
    maxLifetimeSeconds: 1800,        // Hard limit: recycle after 30 min (stale DNS, credential rotation)

    // === Keep-Alive ===
    keepAlive: true,
    keepAliveInitialDelayMillis: 10000,

    // === Application Identification ===
    application_name: settings.applicationName,
  }
}

/**
 * Create the process-wide pool. Callers own it and must end() it on shutdown.
 */
export function createPool(settings: DatabaseSettings, log: ILogger): Pool {
  const pool = new Pool(getPoolConfig(settings))
  pool.on('error', (error) => {
    log.error('Idle client error', {}, error)
  })
  return pool
}

/**
 * Warm up database connection with retries
 */
export async function warmupDatabase(
  pool: Pick<Pool, 'query'>,
  log: ILogger,
  maxAttempts = 5
): Promise<boolean> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      log.info('Connection attempt', { attempt, maxAttempts })
      await pool.query('SELECT 1')
      log.info('Connection established successfully')
      return true
    } catch (error) {
      log.error('Connection failed', { attempt }, error)

      if (attempt < maxAttempts) {
        const delayMs = Math.min(2000 * Math.pow(2, attempt - 1), 30000)
        log.info('Retrying', { delayMs })
        await new Promise((resolve) => setTimeout(resolve, delayMs))
      }
    }
  }

  log.error('Failed to establish connection after all attempts', { maxAttempts })
  return false
}
