/**
 * Collector configuration.
 *
 * Process settings come from the environment; the inventory itself (queues,
 * scopes, adapters, retention, schedules) comes from the JSON file named by
 * INVENTORY_CONFIG. Both are validated once at start-up.
 */

import { readFile } from 'fs/promises'
import { resolve } from 'path'
import { z } from 'zod'
import { retentionEntrySchema } from '../auxiliary/housekeeper'
import { clientScopeSchema } from '../providers/gcp/collectors'
import { DEFAULT_QUEUE } from './queues'

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined))

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATABASE_URL: z.string().min(1),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(2),
  DB_APPLY_SCHEMA: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  REDIS_URL: optionalString,
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: optionalString,
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(5),
  METRICS_PORT: z.coerce.number().int().min(0).default(9464),
  INVENTORY_CONFIG: z.string().min(1).default('config/inventory.json'),
})

export type CollectorEnv = z.infer<typeof envSchema>

export class ConfigError extends Error {
  constructor(
    readonly source: string,
    readonly issues: string[]
  ) {
    super(`Invalid ${source}: ${issues.join('; ')}`)
    this.name = 'ConfigError'
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  )
}

export function loadEnv(env: NodeJS.ProcessEnv = process.env): CollectorEnv {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError('environment', formatIssues(parsed.error))
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Inventory file
// ---------------------------------------------------------------------------

const subscriptionSchema = z.object({
  credentials: z.string().min(1),
  subscriptionId: z.string().min(1),
})

export const scheduleSchema = z.object({
  name: z.string().min(1),
  task: z.string().min(1),
  cron: z.string().min(1),
  queue: z.string().min(1).optional(),
  payload: z.unknown().optional(),
})

export type ScheduleConfig = z.infer<typeof scheduleSchema>

const inventorySchema = z
  .object({
    queues: z.array(z.string().min(1)).min(1).default([DEFAULT_QUEUE]),
    adapters: z
      .object({
        gcp: z.string().min(1).optional(),
        azure: z.string().min(1).optional(),
      })
      .default({}),
    gcp: z.object({ scopes: z.array(clientScopeSchema).default([]) }).default({}),
    azure: z.object({ subscriptions: z.array(subscriptionSchema).default([]) }).default({}),
    housekeeper: z.object({ retention: z.array(retentionEntrySchema).default([]) }).default({}),
    schedules: z.array(scheduleSchema).default([]),
  })
  .superRefine((inventory, ctx) => {
    if (inventory.gcp.scopes.length > 0 && !inventory.adapters.gcp) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['adapters', 'gcp'],
        message: 'required when gcp scopes are configured',
      })
    }
    if (inventory.azure.subscriptions.length > 0 && !inventory.adapters.azure) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['adapters', 'azure'],
        message: 'required when azure subscriptions are configured',
      })
    }
    inventory.schedules.forEach((schedule, index) => {
      if (schedule.queue && !inventory.queues.includes(schedule.queue)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['schedules', index, 'queue'],
          message: `unknown queue '${schedule.queue}'`,
        })
      }
    })
  })

export type InventoryConfig = z.infer<typeof inventorySchema>

export function parseInventoryConfig(value: unknown): InventoryConfig {
  const parsed = inventorySchema.safeParse(value)
  if (!parsed.success) {
    throw new ConfigError('inventory config', formatIssues(parsed.error))
  }
  return parsed.data
}

/** Paths are resolved against the working directory. */
export async function loadInventoryConfig(path: string): Promise<InventoryConfig> {
  const text = await readFile(resolve(process.cwd(), path), 'utf8')
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch {
    throw new ConfigError('inventory config', [`${path} is not valid JSON`])
  }
  return parseInventoryConfig(json)
}
