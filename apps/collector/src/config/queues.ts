import { Queue, type ConnectionOptions, type DefaultJobOptions } from 'bullmq'
import type { TaskSubmitter } from '../core/task'

/** Job data on every inventory queue. A missing payload requests fan-out. */
export interface TaskEnvelope {
  payload?: unknown
}

export const DEFAULT_QUEUE = 'inventory'

export const DEFAULT_JOB_OPTIONS: DefaultJobOptions = {
  attempts: 5,
  backoff: {
    type: 'exponential',
    delay: 2000,
  },
  removeOnComplete: 1000,
  removeOnFail: 5000,
}

export function toEnvelope(payload: unknown): TaskEnvelope {
  return payload === undefined ? {} : { payload }
}

/**
 * Queue handles by name, created on first use.
 */
export class QueueSet {
  private readonly queues = new Map<string, Queue<TaskEnvelope>>()

  constructor(private readonly connection: ConnectionOptions) {}

  get(name: string): Queue<TaskEnvelope> {
    let queue = this.queues.get(name)
    if (!queue) {
      queue = new Queue<TaskEnvelope>(name, {
        connection: this.connection,
        defaultJobOptions: DEFAULT_JOB_OPTIONS,
      })
      this.queues.set(name, queue)
    }
    return queue
  }

  async close(): Promise<void> {
    await Promise.all(Array.from(this.queues.values(), (queue) => queue.close()))
    this.queues.clear()
  }
}

/** The part of a BullMQ queue the submitter uses. */
export interface TaskQueues {
  get(name: string): { add(taskType: string, data: TaskEnvelope): Promise<{ id?: string }> }
}

export class BullTaskSubmitter implements TaskSubmitter {
  constructor(private readonly queues: TaskQueues) {}

  async submit(taskType: string, payload: unknown, queueName: string): Promise<string> {
    const job = await this.queues.get(queueName).add(taskType, toEnvelope(payload))
    if (!job.id) {
      throw new Error(`Queue ${queueName} returned no id for ${taskType}`)
    }
    return job.id
  }
}
