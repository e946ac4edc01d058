import express, { type Express } from 'express'
import type { Server } from 'http'
import type { Registry } from 'prom-client'
import type { ILogger } from '@cloudledger/logger'

export type HealthCheck = () => Promise<boolean>

export interface MetricsAppOptions {
  registry: Registry
  checks: Record<string, HealthCheck>
  /** Per-check timeout in milliseconds */
  timeoutMs?: number
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  return Promise.race([
    promise,
    new Promise<never>((_, reject) => setTimeout(() => reject(new Error('timeout')), ms).unref()),
  ])
}

export function createMetricsApp(options: MetricsAppOptions): Express {
  const app = express()
  const timeoutMs = options.timeoutMs ?? 3000

  app.get('/metrics', async (_req, res) => {
    try {
      const body = await options.registry.metrics()
      res.set('Content-Type', options.registry.contentType).send(body)
    } catch (error) {
      res.status(500).send(error instanceof Error ? error.message : String(error))
    }
  })

  app.get('/health', async (_req, res) => {
    const names = Object.keys(options.checks)
    const results = await Promise.all(
      names.map((name) => withTimeout(options.checks[name](), timeoutMs).catch(() => false))
    )

    const dependencies: Record<string, boolean> = {}
    names.forEach((name, index) => {
      dependencies[name] = results[index]
    })
    const healthy = results.every(Boolean)

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      dependencies,
    })
  })

  return app
}

export function startMetricsServer(app: Express, port: number, log: ILogger): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      log.info('Metrics server listening', { event_name: 'METRICS_SERVER_START', port })
      resolve(server)
    })
    server.once('error', reject)
  })
}
