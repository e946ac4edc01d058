/**
 * Queue dispatch.
 *
 * Turns a BullMQ job into a handler call: resolves the handler by job name,
 * unwraps the `{ payload? }` envelope, and maps the TaskResult back onto the
 * queue. Permanent results become an UnrecoverableError so BullMQ records the
 * failure without retrying; retryable results rethrow their cause.
 */

import { UnrecoverableError } from 'bullmq'
import { z } from 'zod'
import type { ILogger } from '@cloudledger/logger'
import { HandlerNotFoundError, PayloadValidationError, permanent, retryable, toError, type TaskResult } from './errors'
import type { TaskMetrics } from './metrics'
import type { Registry } from './registry'
import type { TaskHandler } from './task'

export interface DispatchJob {
  id?: string
  name: string
  queueName: string
  data: unknown
}

export interface DispatchOptions {
  handlers: Registry<string, TaskHandler>
  log: ILogger
  metrics: TaskMetrics
  signal: AbortSignal
  now?: () => number
}

const envelopeSchema = z.object({ payload: z.unknown().optional() })

async function runJob(job: DispatchJob, options: DispatchOptions, log: ILogger): Promise<TaskResult> {
  const handler = options.handlers.get(job.name)
  if (!handler) {
    return permanent(new HandlerNotFoundError(job.name))
  }

  const envelope = envelopeSchema.safeParse(job.data ?? {})
  if (!envelope.success) {
    return permanent(PayloadValidationError.fromZod(job.name, envelope.error))
  }

  return handler.handle(
    {
      queue: job.queueName,
      taskId: job.id ?? '',
      taskName: job.name,
      signal: options.signal,
      log,
    },
    envelope.data.payload
  )
}

export function createProcessor(options: DispatchOptions): (job: DispatchJob) => Promise<void> {
  const now = options.now ?? Date.now

  return async (job) => {
    const log = options.log.child({
      task_id: job.id,
      task_queue: job.queueName,
      task_name: job.name,
    })
    const labels = { task_name: job.name, task_queue: job.queueName }
    const startedAt = now()

    log.info('Received task', { event_name: 'TASK_RECEIVED' })

    let result: TaskResult
    try {
      result = await runJob(job, options, log)
    } catch (error) {
      // Handlers that throw instead of returning a result are retried
      result = retryable(toError(error))
    }

    const durationMs = now() - startedAt
    options.metrics.duration.observe(labels, durationMs / 1000)
    log.info('Task finished', { event_name: 'TASK_FINISHED', outcome: result.kind, durationMs })

    switch (result.kind) {
      case 'ok':
        options.metrics.successful.inc(labels)
        return
      case 'retryable':
        options.metrics.failed.inc(labels)
        log.warn('Task failed, will retry', { event_name: 'TASK_FAILED_RETRYABLE' }, result.cause)
        throw result.cause
      case 'permanent':
        options.metrics.skipped.inc(labels)
        log.error('Task failed permanently', { event_name: 'TASK_FAILED_PERMANENT' }, result.cause)
        throw new UnrecoverableError(result.cause.message)
    }
  }
}
