/**
 * Housekeeper
 *
 * Deletes rows that have not been refreshed within their retention window.
 * Collectors never delete, so this is the only place stale inventory goes
 * away. Each processed entry leaves an audit row in aux_housekeeper_run.
 */

import { z } from 'zod'
import type { ModelDescriptor } from '@cloudledger/db'
import {
  ModelNotFoundError,
  PayloadValidationError,
  classifyErrors,
  permanent,
  type TaskResult,
} from '../core/errors'
import type { MetricDescriptor } from '../core/metrics'
import type { Services, TaskContext, TaskFactory } from '../core/task'

export const HOUSEKEEPER_TASK = 'aux:task:housekeeper'

export type HousekeeperRunRow = {
  model_name: string
  started_at: Date
  completed_at: Date
  count: number
}

export const HOUSEKEEPER_RUN_MODEL: ModelDescriptor<HousekeeperRunRow> = {
  name: 'aux:model:housekeeper_run',
  table: 'aux_housekeeper_run',
  conflictColumns: [],
  updateColumns: [],
}

export const HOUSEKEEPER_METRIC: MetricDescriptor = {
  name: 'inventory_housekeeper_deleted_rows',
  help: 'Rows deleted by the last housekeeper run per model',
  labelNames: ['model'],
}

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
}

const DURATION_PART = /(\d+(?:\.\d+)?)(ms|d|h|m|s)/y

/**
 * Parse a retention duration into milliseconds. Accepts unit sequences such
 * as `72h`, `30m`, `1h30m` or `7d`, and plain numbers of seconds.
 */
export function parseDuration(input: string | number): number {
  if (typeof input === 'number') {
    if (!Number.isFinite(input) || input <= 0) {
      throw new Error(`Invalid duration: ${input}`)
    }
    return input * 1000
  }

  const text = input.trim()
  if (/^\d+(\.\d+)?$/.test(text)) {
    return parseDuration(Number(text))
  }

  let total = 0
  DURATION_PART.lastIndex = 0
  while (DURATION_PART.lastIndex < text.length) {
    const start = DURATION_PART.lastIndex
    const match = DURATION_PART.exec(text)
    if (!match || match.index !== start) {
      throw new Error(`Invalid duration: '${input}'`)
    }
    total += Number(match[1]) * UNIT_MS[match[2]]
  }

  if (total <= 0) {
    throw new Error(`Invalid duration: '${input}'`)
  }
  return total
}

export const retentionEntrySchema = z.object({
  name: z.string().min(1),
  duration: z.union([z.string().min(1), z.number()]),
})

export const housekeeperPayloadSchema = z.object({
  retention: z.array(retentionEntrySchema),
})

export type RetentionEntry = z.infer<typeof retentionEntrySchema>
export type HousekeeperPayload = z.infer<typeof housekeeperPayloadSchema>

async function sweepEntry(
  ctx: TaskContext,
  services: Services,
  entry: RetentionEntry
): Promise<void> {
  const model = services.models.get(entry.name)
  if (!model) {
    ctx.log.warn('Model not registered, skipping', {
      event_name: 'HOUSEKEEPER_MODEL_NOT_FOUND',
      model: entry.name,
    })
    throw new ModelNotFoundError(entry.name)
  }

  let retentionMs: number
  try {
    retentionMs = parseDuration(entry.duration)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new PayloadValidationError(HOUSEKEEPER_TASK, [`${entry.name}: ${message}`], { cause: error })
  }

  const startedAt = services.clock.now()
  const cutoff = new Date(startedAt.getTime() - retentionMs)
  const count = await services.storage.deleteStale(model.table, cutoff)
  const completedAt = services.clock.now()

  await services.storage.insert(HOUSEKEEPER_RUN_MODEL, [
    { model_name: entry.name, started_at: startedAt, completed_at: completedAt, count },
  ])
  services.metrics.record(HOUSEKEEPER_TASK, [entry.name], count)

  ctx.log.info('Removed stale rows', {
    event_name: 'HOUSEKEEPER_ENTRY_DONE',
    model: entry.name,
    cutoff: cutoff.toISOString(),
    count,
  })
}

/**
 * @param defaultRetention - used when the task carries no payload
 */
export function createHousekeeperTask(defaultRetention: readonly RetentionEntry[]): TaskFactory {
  return {
    taskType: HOUSEKEEPER_TASK,
    create(services) {
      return {
        taskType: HOUSEKEEPER_TASK,
        async handle(ctx, payload): Promise<TaskResult> {
          let retention: readonly RetentionEntry[] = defaultRetention
          if (payload !== undefined) {
            const parsed = housekeeperPayloadSchema.safeParse(payload)
            if (!parsed.success) {
              return permanent(PayloadValidationError.fromZod(HOUSEKEEPER_TASK, parsed.error))
            }
            retention = parsed.data.retention
          }

          const errors: unknown[] = []
          for (const entry of retention) {
            try {
              await sweepEntry(ctx, services, entry)
            } catch (error) {
              if (!(error instanceof ModelNotFoundError)) {
                ctx.log.error('Retention entry failed', { event_name: 'HOUSEKEEPER_ENTRY_FAILED', model: entry.name }, error)
              }
              errors.push(error)
            }
          }

          return classifyErrors(errors, 'housekeeper failed')
        },
      }
    },
  }
}
