import type { Pool } from 'pg'
import type { ColumnValue, JoinSpec, JoinedPair, ModelDescriptor, Row, Storage } from './storage'

export interface QueryResultLike {
  rows: Row[]
  rowCount: number | null
}

export type QueryFn = (text: string, values?: readonly ColumnValue[]) => Promise<QueryResultLike>

// PostgreSQL caps bind parameters per statement at 65535
const MAX_PARAMETERS = 65535
const MAX_ROWS_PER_STATEMENT = 1000

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/i

export function quoteIdent(name: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new Error(`Invalid SQL identifier: '${name}'`)
  }
  return `"${name}"`
}

/**
 * Adapt a pg Pool (or Client) to the QueryFn used by PgStorage.
 */
export function poolQuery(pool: Pick<Pool, 'query'>): QueryFn {
  return async (text, values) => {
    const result = await pool.query<Row>(text, values ? [...values] : [])
    return { rows: result.rows, rowCount: result.rowCount }
  }
}

export interface Statement {
  text: string
  values: ColumnValue[]
}

function columnsOf<R extends Row>(rows: readonly R[]): string[] {
  const columns = new Set<string>()
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key)
  }
  return [...columns]
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size))
  }
  return out
}

/**
 * Keep the last row per conflict key. A single INSERT ... ON CONFLICT
 * statement cannot touch the same row twice.
 */
export function dedupeByKey<R extends Row>(rows: readonly R[], keyColumns: readonly string[]): R[] {
  const byKey = new Map<string, R>()
  for (const row of rows) {
    const key = JSON.stringify(keyColumns.map((column) => row[column] ?? null))
    byKey.delete(key)
    byKey.set(key, row)
  }
  return [...byKey.values()]
}

function buildInsert(
  table: string,
  columns: readonly string[],
  rows: readonly Row[],
  suffix: string
): Statement {
  const values: ColumnValue[] = []
  const tuples = rows.map((row) => {
    const placeholders = columns.map((column) => {
      values.push(row[column] ?? null)
      return `$${values.length}`
    })
    return `(${placeholders.join(', ')})`
  })

  const text =
    `INSERT INTO ${quoteIdent(table)} (${columns.map(quoteIdent).join(', ')}) ` +
    `VALUES ${tuples.join(', ')}${suffix}`
  return { text, values }
}

/**
 * Build the upsert statements for `rows`, split so that no statement exceeds
 * the bind parameter limit.
 */
export function buildUpsertStatements<R extends Row>(
  model: ModelDescriptor<R>,
  rows: readonly R[]
): Statement[] {
  if (rows.length === 0) return []
  if (model.conflictColumns.length === 0) {
    throw new Error(`Model '${model.name}' declares no conflict columns`)
  }

  const unique = dedupeByKey(rows, model.conflictColumns)
  const columns = columnsOf(unique)
  const assignments = [...model.updateColumns, 'updated_at'].map(
    (column) => `${quoteIdent(column)} = EXCLUDED.${quoteIdent(column)}`
  )
  const suffix =
    ` ON CONFLICT (${model.conflictColumns.map(quoteIdent).join(', ')})` +
    ` DO UPDATE SET ${assignments.join(', ')}`

  const perStatement = Math.max(1, Math.min(MAX_ROWS_PER_STATEMENT, Math.floor(MAX_PARAMETERS / columns.length)))
  return chunk(unique, perStatement).map((batch) => buildInsert(model.table, columns, batch, suffix))
}

export function buildInsertStatements<R extends Row>(
  model: ModelDescriptor<R>,
  rows: readonly R[]
): Statement[] {
  if (rows.length === 0) return []
  const columns = columnsOf(rows)
  const perStatement = Math.max(1, Math.min(MAX_ROWS_PER_STATEMENT, Math.floor(MAX_PARAMETERS / columns.length)))
  return chunk(rows, perStatement).map((batch) => buildInsert(model.table, columns, batch, ''))
}

export function buildJoinQuery(spec: JoinSpec): string {
  if (spec.on.length === 0) {
    throw new Error(`Join of '${spec.child}' with '${spec.parent}' declares no conditions`)
  }
  const conditions = spec.on
    .map(([childColumn, parentColumn]) => `c.${quoteIdent(childColumn)} = p.${quoteIdent(parentColumn)}`)
    .join(' AND ')

  return (
    `SELECT c."id" AS child_id, p."id" AS parent_id ` +
    `FROM ${quoteIdent(spec.child)} AS c ` +
    `INNER JOIN ${quoteIdent(spec.parent)} AS p ON ${conditions}`
  )
}

function toId(value: ColumnValue | undefined, column: string): number {
  const id = typeof value === 'string' ? Number(value) : value
  if (typeof id !== 'number' || !Number.isSafeInteger(id)) {
    throw new Error(`Unexpected ${column} value: ${String(value)}`)
  }
  return id
}

/**
 * Storage backed by PostgreSQL.
 *
 * Every write is a single statement per batch; nothing here opens a
 * transaction.
 */
export class PgStorage implements Storage {
  constructor(private readonly query: QueryFn) {}

  async upsert<R extends Row>(model: ModelDescriptor<R>, rows: readonly R[]): Promise<number> {
    return this.execute(buildUpsertStatements(model, rows))
  }

  async insert<R extends Row>(model: ModelDescriptor<R>, rows: readonly R[]): Promise<number> {
    return this.execute(buildInsertStatements(model, rows))
  }

  async select(table: string, columns: readonly string[]): Promise<Row[]> {
    const result = await this.query(`SELECT ${columns.map(quoteIdent).join(', ')} FROM ${quoteIdent(table)}`)
    return result.rows
  }

  async join(spec: JoinSpec): Promise<JoinedPair[]> {
    const result = await this.query(buildJoinQuery(spec))
    return result.rows.map((row) => ({
      childId: toId(row.child_id, 'child_id'),
      parentId: toId(row.parent_id, 'parent_id'),
    }))
  }

  async deleteStale(table: string, cutoff: Date): Promise<number> {
    const result = await this.query(`DELETE FROM ${quoteIdent(table)} WHERE "updated_at" < $1`, [cutoff])
    return result.rowCount ?? 0
  }

  private async execute(statements: readonly Statement[]): Promise<number> {
    let affected = 0
    for (const statement of statements) {
      const result = await this.query(statement.text, statement.values)
      affected += result.rowCount ?? 0
    }
    return affected
  }
}
