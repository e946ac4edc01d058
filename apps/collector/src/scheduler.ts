/**
 * Inventory Scheduler
 *
 * Registers the configured periodic tasks (collect-all, link-all,
 * housekeeper) as BullMQ repeatable jobs. Only one scheduler instance should
 * run per deployment.
 */

import type { JobsOptions } from 'bullmq'
import type { ILogger } from '@cloudledger/logger'
import type { ScheduleConfig } from './config/config'
import { toEnvelope, type TaskEnvelope } from './config/queues'

/** The repeatable-job operations of a BullMQ queue. */
export interface ScheduleQueue {
  add(taskType: string, data: TaskEnvelope, opts: JobsOptions): Promise<unknown>
  getRepeatableJobs(): Promise<{ key: string; name: string }[]>
  removeRepeatableByKey(key: string): Promise<boolean>
}

export interface ScheduleQueues {
  get(name: string): ScheduleQueue
}

export function scheduleJobId(schedule: ScheduleConfig): string {
  return `schedule:${schedule.name}`
}

export class InventoryScheduler {
  private enabled = false

  constructor(
    private readonly queues: ScheduleQueues,
    private readonly schedules: readonly ScheduleConfig[],
    private readonly defaultQueue: string,
    private readonly log: ILogger
  ) {}

  isRunning(): boolean {
    return this.enabled
  }

  /**
   * Remove the existing repeatable jobs of every scheduled task, then add
   * each schedule with its configured pattern.
   */
  async start(): Promise<void> {
    if (this.enabled) {
      this.log.warn('INVENTORY_SCHEDULER_ALREADY_RUNNING', { event_name: 'INVENTORY_SCHEDULER_ALREADY_RUNNING' })
      return
    }

    this.log.info('INVENTORY_SCHEDULER_START', {
      event_name: 'INVENTORY_SCHEDULER_START',
      schedules: this.schedules.length,
    })

    for (const schedule of this.schedules) {
      await this.removeRepeatable(schedule)
    }

    for (const schedule of this.schedules) {
      const queue = this.queues.get(schedule.queue ?? this.defaultQueue)
      await queue.add(schedule.task, toEnvelope(schedule.payload), {
        repeat: { pattern: schedule.cron },
        jobId: scheduleJobId(schedule),
      })

      this.log.info('INVENTORY_SCHEDULER_REPEATABLE_JOB_CONFIGURED', {
        event_name: 'INVENTORY_SCHEDULER_REPEATABLE_JOB_CONFIGURED',
        schedule: schedule.name,
        task: schedule.task,
        cronPattern: schedule.cron,
      })
    }

    this.enabled = true
  }

  async stop(): Promise<void> {
    if (!this.enabled) return

    this.log.info('INVENTORY_SCHEDULER_STOP', { event_name: 'INVENTORY_SCHEDULER_STOP' })

    try {
      let removedRepeatableJobs = 0
      for (const schedule of this.schedules) {
        removedRepeatableJobs += await this.removeRepeatable(schedule)
      }
      this.log.info('INVENTORY_SCHEDULER_REPEATABLE_JOBS_REMOVED', {
        event_name: 'INVENTORY_SCHEDULER_REPEATABLE_JOBS_REMOVED',
        removedRepeatableJobs,
      })
    } finally {
      this.enabled = false
    }
  }

  private async removeRepeatable(schedule: ScheduleConfig): Promise<number> {
    const queue = this.queues.get(schedule.queue ?? this.defaultQueue)
    const repeatableJobs = await queue.getRepeatableJobs()
    let removedCount = 0

    for (const job of repeatableJobs) {
      if (job.name === schedule.task) {
        await queue.removeRepeatableByKey(job.key)
        removedCount += 1
      }
    }

    return removedCount
  }
}
