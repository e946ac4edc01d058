/**
 * Link tables.
 *
 * A link derives (child id, parent id) rows from already-collected tables
 * through an inner join, so only pairs whose parent exists are written.
 * Link rows are only ever upserted; the housekeeper removes the ones that
 * stop being refreshed.
 */

import type { JoinSpec, ModelDescriptor, Storage } from '@cloudledger/db'
import type { ILogger } from '@cloudledger/logger'
import { DEFAULT_PERMANENT_STATUS_CODES, classifyErrors } from './errors'
import type { MetricDescriptor } from './metrics'
import type { TaskFactory } from './task'

export interface LinkDefinition {
  name: string
  model: ModelDescriptor
  join: JoinSpec
  /** Link table column receiving the child id */
  childColumn: string
  /** Link table column receiving the parent id */
  parentColumn: string
}

export function defineLink(definition: LinkDefinition): LinkDefinition {
  if (definition.model.updateColumns.length > 0) {
    throw new Error(`Link model '${definition.model.name}' must not declare update columns`)
  }
  const expected = [definition.childColumn, definition.parentColumn].sort().join(',')
  const declared = [...definition.model.conflictColumns].sort().join(',')
  if (expected !== declared) {
    throw new Error(`Link model '${definition.model.name}' must conflict on (${expected}), got (${declared})`)
  }
  return definition
}

/** Join, project and upsert one link. Resolves to the affected-row count. */
export async function runLink(storage: Storage, link: LinkDefinition): Promise<number> {
  const pairs = await storage.join(link.join)
  const rows = pairs.map((pair) => ({
    [link.childColumn]: pair.childId,
    [link.parentColumn]: pair.parentId,
  }))
  return storage.upsert(link.model, rows)
}

export interface LinkOutcome {
  name: string
  count: number
  error?: unknown
}

/**
 * Run every link in order. A failing link does not stop the ones after it.
 */
export async function linkObjects(
  storage: Storage,
  links: readonly LinkDefinition[],
  log: ILogger
): Promise<LinkOutcome[]> {
  const outcomes: LinkOutcome[] = []
  for (const link of links) {
    try {
      const count = await runLink(storage, link)
      log.info('Linked objects', { event_name: 'LINK_DONE', link: link.name, count })
      outcomes.push({ name: link.name, count })
    } catch (error) {
      log.error('Link failed', { event_name: 'LINK_FAILED', link: link.name }, error)
      outcomes.push({ name: link.name, count: 0, error })
    }
  }
  return outcomes
}

export function linkMetric(provider: string): MetricDescriptor {
  return {
    name: `inventory_${provider}_link_rows`,
    help: `Link rows upserted by the last ${provider} link run`,
    labelNames: ['link'],
  }
}

export interface LinkAllFactory extends TaskFactory {
  readonly links: readonly LinkDefinition[]
  readonly metric: MetricDescriptor
}

/**
 * The provider's link-all task. Errors from individual links are joined and
 * returned once every link has run.
 */
export function createLinkAllTask(
  taskType: string,
  links: readonly LinkDefinition[],
  metric: MetricDescriptor,
  permanentStatusCodes: readonly number[] = DEFAULT_PERMANENT_STATUS_CODES
): LinkAllFactory {
  return {
    taskType,
    links,
    metric,
    create(services) {
      return {
        taskType,
        async handle(ctx) {
          const outcomes = await linkObjects(services.storage, links, ctx.log)
          for (const outcome of outcomes) {
            services.metrics.record(taskType, [outcome.name], outcome.count)
          }
          const errors = outcomes.flatMap((outcome) => (outcome.error === undefined ? [] : [outcome.error]))
          return classifyErrors(errors, 'link-all failed', permanentStatusCodes)
        },
      }
    },
  }
}
