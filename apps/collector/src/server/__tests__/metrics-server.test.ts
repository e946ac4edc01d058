import { describe, expect, it } from 'vitest'
import request from 'supertest'
import { Gauge, Registry } from 'prom-client'
import { createMetricsApp } from '../metrics-server'

function registryWithGauge(): Registry {
  const registry = new Registry()
  const gauge = new Gauge({
    name: 'inventory_gcp_vpc_rows',
    help: 'VPC networks upserted by the last run per project',
    labelNames: ['credentials', 'project'],
    registers: [registry],
  })
  gauge.set({ credentials: 'c1', project: 'p1' }, 4)
  return registry
}

describe('GET /metrics', () => {
  it('serves the registry in the exposition format', async () => {
    const app = createMetricsApp({ registry: registryWithGauge(), checks: {} })

    const res = await request(app).get('/metrics')

    expect(res.status).toBe(200)
    expect(res.headers['content-type']).toContain('text/plain')
    expect(res.text).toContain('inventory_gcp_vpc_rows{credentials="c1",project="p1"} 4')
  })
})

describe('GET /health', () => {
  it('reports ok when every dependency responds', async () => {
    const app = createMetricsApp({
      registry: new Registry(),
      checks: { db: async () => true, redis: async () => true },
    })

    const res = await request(app).get('/health')

    expect(res.status).toBe(200)
    expect(res.body).toMatchObject({ status: 'ok', dependencies: { db: true, redis: true } })
  })

  it('reports degraded when a check fails or hangs', async () => {
    const app = createMetricsApp({
      registry: new Registry(),
      checks: {
        db: async () => {
          throw new Error('ECONNREFUSED')
        },
        redis: () => new Promise<boolean>(() => undefined),
      },
      timeoutMs: 20,
    })

    const res = await request(app).get('/health')

    expect(res.status).toBe(503)
    expect(res.body).toMatchObject({ status: 'degraded', dependencies: { db: false, redis: false } })
  })
})
