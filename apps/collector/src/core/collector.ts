/**
 * Collector tasks.
 *
 * A collector is dual-mode. Without a payload it fans out: it enumerates its
 * targets (scopes from a client directory, or parent rows already persisted)
 * and submits one concrete task per target. With a payload it executes: it
 * validates the payload, resolves the scoped client, drains every page of the
 * provider listing and upserts the mapped records in one batch.
 */

import { z } from 'zod'
import type { ModelDescriptor, Row, Storage } from '@cloudledger/db'
import type { ILogger } from '@cloudledger/logger'
import {
  DEFAULT_PERMANENT_STATUS_CODES,
  PayloadValidationError,
  TaskCancelledError,
  classifyError,
  ok,
  permanent,
  retryable,
  toError,
  type TaskResult,
} from './errors'
import type { MetricDescriptor } from './metrics'
import { CONTINUE } from './registry'
import { requireClient, type ClientDirectory } from './scope'
import type { Services, TaskContext, TaskFactory, TaskHandler } from './task'

export interface CollectorDefinition<P, C, K, I, R extends Row> {
  taskType: string
  model: ModelDescriptor<R>
  metric: MetricDescriptor
  payloadSchema: z.ZodType<P>
  directory: ClientDirectory<C, K>
  /** Directory key for a concrete payload */
  scopeOf(payload: P): K
  describeScope(key: K): string
  /** Fan-out targets, one payload per concrete task */
  targets(services: Services, log: ILogger): Promise<P[]>
  list(client: C, payload: P): AsyncIterable<readonly I[]>
  toRecord(item: I, payload: P): R
  /** Metric label values in descriptor order */
  labelValues(payload: P): string[]
  permanentStatusCodes?: readonly number[]
}

export interface CollectorFactory extends TaskFactory {
  readonly model: ModelDescriptor
  readonly metric: MetricDescriptor
}

/**
 * Read every page before returning. The abort signal is checked between
 * pages; a cancelled drain returns nothing.
 */
export async function drainPages<I>(pages: AsyncIterable<readonly I[]>, signal: AbortSignal): Promise<I[]> {
  const items: I[] = []
  if (signal.aborted) throw new TaskCancelledError()
  for await (const page of pages) {
    if (signal.aborted) throw new TaskCancelledError()
    for (const item of page) items.push(item)
  }
  return items
}

export function defineCollector<P, C, K, I, R extends Row>(
  definition: CollectorDefinition<P, C, K, I, R>
): CollectorFactory {
  const permanentStatusCodes = definition.permanentStatusCodes ?? DEFAULT_PERMANENT_STATUS_CODES

  const fanOut = async (ctx: TaskContext, services: Services): Promise<TaskResult> => {
    let targets: P[]
    try {
      targets = await definition.targets(services, ctx.log)
    } catch (error) {
      return classifyError(error, permanentStatusCodes)
    }

    let submitted = 0
    for (const target of targets) {
      try {
        await services.submitter.submit(definition.taskType, target, ctx.queue)
        submitted++
      } catch (error) {
        ctx.log.warn('Failed to submit task', { event_name: 'COLLECTOR_SUBMIT_FAILED', target }, error)
      }
    }

    ctx.log.info('Fan-out complete', {
      event_name: 'COLLECTOR_FANOUT_DONE',
      targets: targets.length,
      submitted,
    })
    return ok()
  }

  const execute = async (ctx: TaskContext, services: Services, payload: P): Promise<TaskResult> => {
    let count = 0
    try {
      const lookup = requireClient(definition.directory, definition.scopeOf(payload), definition.describeScope)
      if (!lookup.ok) {
        ctx.log.warn('No client for scope', { event_name: 'COLLECTOR_CLIENT_NOT_FOUND', key: lookup.error.key })
        return permanent(lookup.error)
      }

      const items = await drainPages(definition.list(lookup.entry.client, payload), ctx.signal)
      const records = items.map((item) => definition.toRecord(item, payload))
      count = await services.storage.upsert(definition.model, records)

      ctx.log.info('Collected resources', {
        event_name: 'COLLECTOR_UPSERT_DONE',
        model: definition.model.name,
        count,
        ...lookup.entry.labels,
      })
      return ok()
    } catch (error) {
      return classifyError(error, permanentStatusCodes)
    } finally {
      services.metrics.record(definition.taskType, definition.labelValues(payload), count)
    }
  }

  return {
    taskType: definition.taskType,
    model: definition.model,
    metric: definition.metric,
    create(services: Services): TaskHandler {
      return {
        taskType: definition.taskType,
        async handle(ctx, payload) {
          if (payload === undefined) {
            return fanOut(ctx, services)
          }
          const parsed = definition.payloadSchema.safeParse(payload)
          if (!parsed.success) {
            return permanent(PayloadValidationError.fromZod(definition.taskType, parsed.error))
          }
          return execute(ctx, services, parsed.data)
        },
      }
    },
  }
}

// ---------------------------------------------------------------------------
// Fan-out target sources
// ---------------------------------------------------------------------------

/**
 * One payload per directory entry. Entries mapping to an undefined payload,
 * or to a payload whose identity was already produced, are skipped.
 */
export async function scopesFromDirectory<C, K, P>(
  directory: ClientDirectory<C, K>,
  toPayload: (key: K) => P | undefined,
  identityOf: (payload: P) => string = (payload) => JSON.stringify(payload)
): Promise<P[]> {
  const seen = new Set<string>()
  const payloads: P[] = []
  await directory.range((key) => {
    const payload = toPayload(key)
    if (payload === undefined) return CONTINUE
    const identity = identityOf(payload)
    if (seen.has(identity)) return CONTINUE
    seen.add(identity)
    payloads.push(payload)
  })
  return payloads
}

/**
 * Payloads derived from persisted parent rows. Rows are validated with
 * `rowSchema`, whose keys name the selected columns. Each row yields zero or
 * more payloads.
 */
export async function parentsFromStorage<T extends z.ZodRawShape, P>(
  storage: Storage,
  table: string,
  rowSchema: z.ZodObject<T>,
  toPayloads: (row: z.infer<z.ZodObject<T>>) => readonly P[]
): Promise<P[]> {
  const rows = await storage.select(table, Object.keys(rowSchema.shape))
  return rows.flatMap((row) => toPayloads(rowSchema.parse(row)))
}

// ---------------------------------------------------------------------------
// Collect-all
// ---------------------------------------------------------------------------

/**
 * Submit every collector in its fan-out form. Stops at the first submit
 * failure and reports it as retryable.
 */
export function createCollectAllTask(taskType: string, collectorTaskTypes: readonly string[]): TaskFactory {
  return {
    taskType,
    create(services) {
      return {
        taskType,
        async handle(ctx) {
          for (const collectorTaskType of collectorTaskTypes) {
            try {
              const taskId = await services.submitter.submit(collectorTaskType, undefined, ctx.queue)
              ctx.log.debug('Submitted collector', { collector: collectorTaskType, submittedTaskId: taskId })
            } catch (error) {
              ctx.log.error('Failed to submit collector', { collector: collectorTaskType }, error)
              return retryable(toError(error))
            }
          }
          ctx.log.info('Submitted collectors', {
            event_name: 'COLLECT_ALL_DONE',
            collectors: collectorTaskTypes.length,
          })
          return ok()
        },
      }
    },
  }
}
