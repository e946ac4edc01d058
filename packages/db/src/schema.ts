import { readFile } from 'fs/promises'
import type { QueryFn } from './pg-storage'

/**
 * Execute a declarative schema file. The file must be idempotent
 * (CREATE ... IF NOT EXISTS) since it runs on every start with DB_APPLY_SCHEMA.
 */
export async function applySchemaFile(query: QueryFn, path: string): Promise<void> {
  const sql = await readFile(path, 'utf8')
  await query(sql)
}
