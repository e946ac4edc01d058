/**
 * Storage contracts shared by the collectors, linkers and the housekeeper.
 *
 * Column and constraint mapping is declared per model with a ModelDescriptor;
 * the SQL itself lives in PgStorage.
 */

export type ColumnValue = string | number | boolean | Date | null

export type Row = Record<string, ColumnValue>

/**
 * Declarative description of one persisted model.
 *
 * `conflictColumns` is the natural uniqueness constraint used by upserts;
 * `updateColumns` are the mutable columns refreshed on conflict. `updated_at`
 * is always refreshed and must not be listed.
 */
export interface ModelDescriptor<R extends Row = Row> {
  name: string
  table: string
  conflictColumns: readonly (keyof R & string)[]
  updateColumns: readonly (keyof R & string)[]
}

/**
 * An inner join between a child table and its parent table, restricted to
 * pairs where every `on` condition matches.
 */
export interface JoinSpec {
  child: string
  parent: string
  /** [child column, parent column] equality pairs */
  on: readonly (readonly [string, string])[]
}

export interface JoinedPair {
  childId: number
  parentId: number
}

export interface Storage {
  /**
   * Insert rows, updating `model.updateColumns` and `updated_at` on conflict
   * with `model.conflictColumns`. Resolves to the affected-row count.
   */
  upsert<R extends Row>(model: ModelDescriptor<R>, rows: readonly R[]): Promise<number>

  /** Plain inserts with no conflict handling. */
  insert<R extends Row>(model: ModelDescriptor<R>, rows: readonly R[]): Promise<number>

  /** Read the given columns of every row in `table`. */
  select(table: string, columns: readonly string[]): Promise<Row[]>

  /** Surrogate id pairs of child rows whose parent row resolves. */
  join(spec: JoinSpec): Promise<JoinedPair[]>

  /** Delete rows whose `updated_at` is strictly earlier than `cutoff`. */
  deleteStale(table: string, cutoff: Date): Promise<number>
}
