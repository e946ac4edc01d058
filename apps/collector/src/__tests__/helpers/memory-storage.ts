import type { ColumnValue, JoinSpec, JoinedPair, ModelDescriptor, Row, Storage } from '@cloudledger/db'

/**
 * In-process Storage with the same semantics as PgStorage: upserts keyed on
 * the model's conflict columns, inner joins, and strict `updated_at < cutoff`
 * deletes. Every stored row gets an `id` and audit timestamps.
 */
export class MemoryStorage implements Storage {
  private readonly tables = new Map<string, Row[]>()
  private nextId = 1

  constructor(private readonly now: () => Date) {}

  rows(table: string): Row[] {
    return this.tables.get(table) ?? []
  }

  /** Store rows as-is, filling id and audit timestamps when missing. */
  seed(table: string, rows: readonly Row[]): Row[] {
    const stored = rows.map((row) => this.stamp(row))
    this.table(table).push(...stored)
    return stored
  }

  async upsert<R extends Row>(model: ModelDescriptor<R>, rows: readonly R[]): Promise<number> {
    const table = this.table(model.table)
    let affected = 0
    for (const row of rows) {
      const existing = table.find((candidate) =>
        model.conflictColumns.every((column) => sameValue(candidate[column], row[column]))
      )
      if (existing) {
        for (const column of model.updateColumns) {
          existing[column] = row[column] ?? null
        }
        existing.updated_at = this.now()
      } else {
        table.push(this.stamp(row))
      }
      affected++
    }
    return affected
  }

  async insert<R extends Row>(model: ModelDescriptor<R>, rows: readonly R[]): Promise<number> {
    this.seed(model.table, rows)
    return rows.length
  }

  async select(table: string, columns: readonly string[]): Promise<Row[]> {
    return this.rows(table).map((row) => {
      const projected: Row = {}
      for (const column of columns) {
        projected[column] = row[column] ?? null
      }
      return projected
    })
  }

  async join(spec: JoinSpec): Promise<JoinedPair[]> {
    const pairs: JoinedPair[] = []
    for (const child of this.rows(spec.child)) {
      for (const parent of this.rows(spec.parent)) {
        const matches = spec.on.every(
          ([childColumn, parentColumn]) =>
            child[childColumn] != null && sameValue(child[childColumn], parent[parentColumn])
        )
        if (matches) {
          pairs.push({ childId: idOf(child), parentId: idOf(parent) })
        }
      }
    }
    return pairs
  }

  async deleteStale(table: string, cutoff: Date): Promise<number> {
    const rows = this.rows(table)
    const kept = rows.filter((row) => {
      const updatedAt = row.updated_at
      return !(updatedAt instanceof Date && updatedAt.getTime() < cutoff.getTime())
    })
    this.tables.set(table, kept)
    return rows.length - kept.length
  }

  private table(name: string): Row[] {
    let rows = this.tables.get(name)
    if (!rows) {
      rows = []
      this.tables.set(name, rows)
    }
    return rows
  }

  private stamp(row: Row): Row {
    const now = this.now()
    return {
      ...row,
      id: row.id ?? this.nextId++,
      created_at: row.created_at ?? now,
      updated_at: row.updated_at ?? now,
    }
  }
}

function sameValue(a: ColumnValue | undefined, b: ColumnValue | undefined): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime()
  return a === b
}

function idOf(row: Row): number {
  const id = row.id
  if (typeof id !== 'number') {
    throw new Error(`Row has no numeric id: ${JSON.stringify(row)}`)
  }
  return id
}
