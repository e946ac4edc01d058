import type { ModelDescriptor, Storage } from '@cloudledger/db'
import type { ILogger } from '@cloudledger/logger'
import type { TaskResult } from './errors'
import type { DynamicMetricsCollector } from './metrics'
import type { Registry } from './registry'

export interface TaskContext {
  queue: string
  taskId: string
  taskName: string
  /** Aborted when the worker shuts down */
  signal: AbortSignal
  log: ILogger
}

export interface TaskSubmitter {
  /**
   * Enqueue `taskType`. An undefined payload submits the fan-out form of the
   * task. Resolves to the queue's task id.
   */
  submit(taskType: string, payload: unknown, queueName: string): Promise<string>
}

export interface Clock {
  now(): Date
}

export const systemClock: Clock = {
  now: () => new Date(),
}

/**
 * Shared handles built once at start-up and handed to every task factory.
 */
export interface Services {
  storage: Storage
  submitter: TaskSubmitter
  metrics: DynamicMetricsCollector
  models: Registry<string, ModelDescriptor>
  clock: Clock
}

export interface TaskHandler {
  readonly taskType: string
  /** `payload` is undefined when the job carried none. */
  handle(ctx: TaskContext, payload: unknown): Promise<TaskResult>
}

export interface TaskFactory {
  readonly taskType: string
  create(services: Services): TaskHandler
}
