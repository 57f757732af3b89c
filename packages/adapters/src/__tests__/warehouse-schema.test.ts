import { describe, it, expect } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';

import { splitSqlStatements, applyStatements } from '../postgres/warehouse-schema.js';
import type { SqlExecutor } from '../postgres/warehouse-schema.js';

const SCHEMA_PATH = path.resolve(__dirname, '../../../../db/redshift/enriched_trip_data.sql');

describe('splitSqlStatements', () => {
  it('drops comments and blank statements', () => {
    const sql = '-- header\nCREATE TABLE a (id INT);\n\n-- second\nCREATE TABLE b (id INT);\n;';
    expect(splitSqlStatements(sql)).toEqual(['CREATE TABLE a (id INT)', 'CREATE TABLE b (id INT)']);
  });

  it('yields a single statement for the warehouse schema', () => {
    const statements = splitSqlStatements(fs.readFileSync(SCHEMA_PATH, 'utf-8'));
    expect(statements).toHaveLength(1);
    expect(statements[0]?.startsWith('CREATE TABLE IF NOT EXISTS enriched_trip_data')).toBe(true);
    expect(statements[0]).toContain('SORTKEY(pickup_datetime)');
  });
});

describe('applyStatements', () => {
  it('runs statements in order', async () => {
    const executed: string[] = [];
    const executor: SqlExecutor = {
      async query(sql) {
        executed.push(sql);
        return { rowCount: 0 };
      },
    };
    await applyStatements(executor, ['SELECT 1', 'SELECT 2']);
    expect(executed).toEqual(['SELECT 1', 'SELECT 2']);
  });

  it('stops at the first failing statement', async () => {
    const executed: string[] = [];
    const executor: SqlExecutor = {
      async query(sql) {
        executed.push(sql);
        if (sql === 'BAD') throw new Error('syntax error');
        return {};
      },
    };
    await expect(applyStatements(executor, ['SELECT 1', 'BAD', 'SELECT 3'])).rejects.toThrow(
      'syntax error',
    );
    expect(executed).toEqual(['SELECT 1', 'BAD']);
  });
});
