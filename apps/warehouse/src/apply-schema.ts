#!/usr/bin/env node
import 'dotenv/config';
import { ConfigurationError } from '@taxi-stream/domain';
import { applyWarehouseSchema, closePool, getPool } from '@taxi-stream/adapters';
import { loadWarehouseConfig } from './config.js';

/**
 * Creates the analytics table if it does not exist.
 *
 * Env vars:
 *   WAREHOUSE_DATABASE_URL: postgres:// connection string of the warehouse
 *   WAREHOUSE_SCHEMA_PATH:  DDL file (default: db/redshift/enriched_trip_data.sql)
 */
async function main(): Promise<void> {
  const config = loadWarehouseConfig();
  getPool(config.databaseUrl);
  try {
    await applyWarehouseSchema(config.schemaPath);
  } finally {
    await closePool();
  }
}

main().catch((err) => {
  if (err instanceof ConfigurationError) {
    console.error(`[warehouse] configuration error: ${err.message}`);
  } else {
    console.error('[warehouse] schema apply failed', err);
  }
  process.exit(1);
});
