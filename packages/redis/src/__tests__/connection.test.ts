import { describe, expect, it, vi } from 'vitest'
import type { ILogger } from '@cloudledger/logger'
import { createRedisConnection, describeRedis, resolveRedisSettings } from '../index'

function createLog(): ILogger {
  const log: ILogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: () => log,
  }
  return log
}

describe('resolveRedisSettings', () => {
  it('parses host, port, password and db from a URL', () => {
    const settings = resolveRedisSettings({
      url: 'redis://:test%40secret@cache.internal:6380/2',
      host: 'localhost',
      port: 6379,
    })

    expect(settings).toEqual({ host: 'cache.internal', port: 6380, password: 'test@secret', db: 2 })
  })

  it('falls back to discrete settings without a URL', () => {
    expect(resolveRedisSettings({ host: 'redis', port: 6379 })).toEqual({
      host: 'redis',
      port: 6379,
      password: undefined,
    })
  })

  it('describes the connection without the password', () => {
    expect(describeRedis({ host: 'redis', port: 6379, password: 'test-secret', db: 1 })).toBe('redis:6379/1')
  })
})

describe('createRedisConnection', () => {
  it('is BullMQ compatible and backs off linearly up to the cap', () => {
    const options = createRedisConnection({ host: 'redis', port: 6379 }, createLog())

    expect(options.maxRetriesPerRequest).toBeNull()
    expect(options.retryStrategy?.(3)).toBe(1500)
    expect(options.retryStrategy?.(25)).toBe(30000)
  })

  it('reconnects only on network-level errors', () => {
    const options = createRedisConnection({ host: 'redis', port: 6379 }, createLog())

    expect(options.reconnectOnError?.(new Error('read ECONNRESET'))).toBe(true)
    expect(options.reconnectOnError?.(new Error('WRONGTYPE Operation'))).toBe(false)
  })
})
