/**
 * Generic write-once/read-many registry.
 *
 * Registries are populated during bootstrap and only read afterwards, so no
 * synchronization is done here. Code that mutates a registry after start-up
 * has to bring its own.
 */

/** Returned from a range callback to skip the entry. */
export const CONTINUE = Symbol('registry.continue')

/** Returned from a range callback to end the iteration early without error. */
export const STOP = Symbol('registry.stop')

export type RangeSignal = typeof CONTINUE | typeof STOP | void

export type RangeFn<K, V> = (key: K, value: V) => RangeSignal | Promise<RangeSignal>

export interface RangeSummary {
  visited: number
  skipped: number
}

export class RegistryConflictError extends Error {
  constructor(
    readonly registry: string,
    readonly key: string
  ) {
    super(`Key '${key}' is already registered in ${registry}`)
    this.name = 'RegistryConflictError'
  }
}

export type RegisterResult = { ok: true } | { ok: false; error: RegistryConflictError }

export class Registry<K, V> {
  private readonly items = new Map<string, { key: K; value: V }>()

  /**
   * @param name - used in error messages and logs
   * @param identity - maps a key to its identity; structurally equal keys must
   *   map to the same string
   */
  constructor(
    readonly name: string,
    private readonly identity: (key: K) => string
  ) {}

  /** Registry keyed by plain strings. */
  static named<V>(name: string): Registry<string, V> {
    return new Registry<string, V>(name, (key) => key)
  }

  register(key: K, value: V): RegisterResult {
    const id = this.identity(key)
    if (this.items.has(id)) {
      return { ok: false, error: new RegistryConflictError(this.name, id) }
    }
    this.items.set(id, { key, value })
    return { ok: true }
  }

  /**
   * Register or throw. Only for start-up: a conflict means two components
   * claim the same key and the process must not start.
   */
  mustRegister(key: K, value: V): void {
    const result = this.register(key, value)
    if (!result.ok) {
      throw result.error
    }
  }

  get(key: K): V | undefined {
    return this.items.get(this.identity(key))?.value
  }

  has(key: K): boolean {
    return this.items.has(this.identity(key))
  }

  size(): number {
    return this.items.size
  }

  keys(): K[] {
    return Array.from(this.items.values(), (entry) => entry.key)
  }

  /**
   * Call `fn` for every entry. `CONTINUE` counts the entry as skipped, `STOP`
   * ends the iteration, a thrown error aborts it and propagates.
   */
  async range(fn: RangeFn<K, V>): Promise<RangeSummary> {
    const summary: RangeSummary = { visited: 0, skipped: 0 }
    for (const { key, value } of Array.from(this.items.values())) {
      summary.visited++
      const signal = await fn(key, value)
      if (signal === CONTINUE) {
        summary.skipped++
      } else if (signal === STOP) {
        break
      }
    }
    return summary
  }
}
