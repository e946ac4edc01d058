/**
 * Dynamic per-run metrics.
 *
 * Descriptors are registered once at start-up, one per task type. Every run
 * replaces the sample keyed by the JSON array of its task type and label
 * values; the Prometheus gauges read the current samples on scrape. Samples
 * never expire.
 */

import { Counter, Gauge, Histogram, Registry as PromRegistry } from 'prom-client'
import { Registry } from './registry'

export interface MetricDescriptor {
  /** Prometheus metric name */
  name: string
  help: string
  labelNames: readonly string[]
}

export interface MetricSample {
  taskType: string
  labels: readonly string[]
  value: number
  recordedAt: Date
}

export function sampleKey(taskType: string, labels: readonly string[]): string {
  return JSON.stringify([taskType, ...labels])
}

export class DynamicMetricsCollector {
  readonly descriptors = Registry.named<MetricDescriptor>('metric descriptors')
  private readonly samples = new Map<string, MetricSample>()

  constructor(
    private readonly registry: PromRegistry,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Register the descriptor for a task type and expose it as a gauge.
   * Throws on a duplicate task type.
   */
  registerDescriptor(taskType: string, descriptor: MetricDescriptor): void {
    this.descriptors.mustRegister(taskType, descriptor)

    const gauge: Gauge<string> = new Gauge({
      name: descriptor.name,
      help: descriptor.help,
      labelNames: [...descriptor.labelNames],
      registers: [this.registry],
      collect: () => {
        gauge.reset()
        for (const sample of this.samples.values()) {
          if (sample.taskType === taskType) {
            gauge.set(labelObject(descriptor, sample.labels), sample.value)
          }
        }
      },
    })
  }

  /**
   * Replace the sample for `taskType` and `labels`. Returns false when no
   * descriptor is registered for the task type.
   */
  record(taskType: string, labels: readonly string[], value: number): boolean {
    const descriptor = this.descriptors.get(taskType)
    if (!descriptor) return false
    if (labels.length !== descriptor.labelNames.length) {
      throw new Error(
        `Metric ${descriptor.name} expects ${descriptor.labelNames.length} labels, got ${labels.length}`
      )
    }

    this.samples.set(sampleKey(taskType, labels), {
      taskType,
      labels: [...labels],
      value,
      recordedAt: this.now(),
    })
    return true
  }

  get(key: string): MetricSample | undefined {
    return this.samples.get(key)
  }

  snapshot(): Record<string, number> {
    const out: Record<string, number> = {}
    for (const [key, sample] of this.samples) {
      out[key] = sample.value
    }
    return out
  }
}

function labelObject(descriptor: MetricDescriptor, values: readonly string[]): Record<string, string> {
  const labels: Record<string, string> = {}
  descriptor.labelNames.forEach((name, index) => {
    labels[name] = values[index] ?? ''
  })
  return labels
}

// ---------------------------------------------------------------------------
// Task outcome metrics
// ---------------------------------------------------------------------------

type TaskLabel = 'task_name' | 'task_queue'

export interface TaskMetrics {
  successful: Counter<TaskLabel>
  failed: Counter<TaskLabel>
  skipped: Counter<TaskLabel>
  duration: Histogram<TaskLabel>
}

export function createTaskMetrics(registry: PromRegistry): TaskMetrics {
  const labelNames: TaskLabel[] = ['task_name', 'task_queue']
  return {
    successful: new Counter({
      name: 'inventory_task_successful_total',
      help: 'Tasks that completed successfully',
      labelNames,
      registers: [registry],
    }),
    failed: new Counter({
      name: 'inventory_task_failed_total',
      help: 'Tasks that failed and will be retried',
      labelNames,
      registers: [registry],
    }),
    skipped: new Counter({
      name: 'inventory_task_skipped_total',
      help: 'Tasks that failed permanently and will not be retried',
      labelNames,
      registers: [registry],
    }),
    duration: new Histogram({
      name: 'inventory_task_duration_seconds',
      help: 'Task processing time',
      labelNames,
      buckets: [0.1, 0.5, 1, 5, 15, 60, 300],
      registers: [registry],
    }),
  }
}
