import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest'
import { UnrecoverableError } from 'bullmq'
import { Registry as PromRegistry } from 'prom-client'
import { createTestLogger, type TestLogger } from '../../__tests__/helpers/fakes'
import { createProcessor, type DispatchJob } from '../dispatch'
import { ProviderApiError, ok, permanent, retryable } from '../errors'
import { createTaskMetrics, type TaskMetrics } from '../metrics'
import { Registry } from '../registry'
import type { TaskHandler } from '../task'

const LABELS = { task_name: 'gcp:task:collect-vpcs', task_queue: 'inventory' }

function job(overrides: Partial<DispatchJob> = {}): DispatchJob {
  return { id: '42', name: 'gcp:task:collect-vpcs', queueName: 'inventory', data: {}, ...overrides }
}

async function counterValue(metrics: TaskMetrics, name: 'successful' | 'failed' | 'skipped'): Promise<number> {
  const metric = await metrics[name].get()
  return metric.values.find((value) => value.labels.task_name === LABELS.task_name)?.value ?? 0
}

describe('createProcessor', () => {
  let handlers: Registry<string, TaskHandler>
  let handle: Mock<TaskHandler['handle']>
  let log: TestLogger
  let metrics: TaskMetrics
  let controller: AbortController

  beforeEach(() => {
    handle = vi.fn<TaskHandler['handle']>(async () => ok())
    handlers = Registry.named<TaskHandler>('handlers')
    handlers.mustRegister('gcp:task:collect-vpcs', { taskType: 'gcp:task:collect-vpcs', handle })
    log = createTestLogger()
    metrics = createTaskMetrics(new PromRegistry())
    controller = new AbortController()
  })

  function processor() {
    let clock = 1_000
    return createProcessor({
      handlers,
      log,
      metrics,
      signal: controller.signal,
      now: () => (clock += 250),
    })
  }

  it('unwraps the envelope and passes the task context', async () => {
    const payload = { scope: { credentials: 'c1', project: 'p1' } }

    await processor()(job({ data: { payload } }))

    expect(handle).toHaveBeenCalledWith(
      { queue: 'inventory', taskId: '42', taskName: 'gcp:task:collect-vpcs', signal: controller.signal, log },
      payload
    )
    expect(log.child).toHaveBeenCalledWith({
      task_id: '42',
      task_queue: 'inventory',
      task_name: 'gcp:task:collect-vpcs',
    })
    expect(await counterValue(metrics, 'successful')).toBe(1)
  })

  it('passes an undefined payload for the fan-out form', async () => {
    await processor()(job({ data: {} }))
    await processor()(job({ data: null }))

    expect(handle.mock.calls.map((call) => call[1])).toEqual([undefined, undefined])
  })

  it('logs the outcome with the measured duration', async () => {
    await processor()(job())

    expect(log.info).toHaveBeenCalledWith('Task finished', {
      event_name: 'TASK_FINISHED',
      outcome: 'ok',
      durationMs: 250,
    })
  })

  it('rethrows the cause of a retryable result', async () => {
    const cause = new ProviderApiError('gcp', 503, 'backend error')
    handle.mockResolvedValueOnce(retryable(cause))

    await expect(processor()(job())).rejects.toBe(cause)
    expect(await counterValue(metrics, 'failed')).toBe(1)
    expect(await counterValue(metrics, 'skipped')).toBe(0)
  })

  it('retries a handler that throws', async () => {
    handle.mockRejectedValueOnce(new Error('socket hang up'))

    await expect(processor()(job())).rejects.toThrow('socket hang up')
    expect(await counterValue(metrics, 'failed')).toBe(1)
  })

  it('turns a permanent result into an UnrecoverableError', async () => {
    handle.mockResolvedValueOnce(permanent(new ProviderApiError('gcp', 404, 'project p1 not found')))

    const run = processor()(job())

    await expect(run).rejects.toBeInstanceOf(UnrecoverableError)
    await expect(run).rejects.toThrow('project p1 not found')
    expect(await counterValue(metrics, 'skipped')).toBe(1)
    expect(await counterValue(metrics, 'failed')).toBe(0)
  })

  it('fails permanently when no handler is registered', async () => {
    await expect(processor()(job({ name: 'gcp:task:collect-disks' }))).rejects.toThrow(
      'No handler registered for task type: gcp:task:collect-disks'
    )
    expect(handle).not.toHaveBeenCalled()
  })

  it('fails permanently on a malformed envelope', async () => {
    await expect(processor()(job({ data: 'not an object' }))).rejects.toBeInstanceOf(UnrecoverableError)
    expect(handle).not.toHaveBeenCalled()
  })
})
