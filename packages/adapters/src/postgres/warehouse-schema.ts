import { readFile } from 'fs/promises';
import { withTransaction } from './pool.js';

export interface SqlExecutor {
  query(sql: string): Promise<unknown>;
}

/**
 * Split a schema file into statements on `;`, dropping `--` comments
 * and blank statements. The schema files carry no string literals containing `;`.
 */
export function splitSqlStatements(sql: string): string[] {
  return sql
    .split(';')
    .map((s) => s.replace(/--.*$/gm, '').trim())
    .filter((s) => s.length > 0);
}

export async function applyStatements(
  executor: SqlExecutor,
  statements: readonly string[],
): Promise<void> {
  for (const stmt of statements) {
    await executor.query(stmt);
  }
}

/** Apply the analytics table definition. Idempotent: statements use IF NOT EXISTS. */
export async function applyWarehouseSchema(schemaPath: string): Promise<number> {
  const statements = splitSqlStatements(await readFile(schemaPath, 'utf-8'));
  await withTransaction((client) => applyStatements(client, statements));
  console.log(`[warehouse] schema applied (${statements.length} statements)`);
  return statements.length;
}
