import { z } from 'zod';
import { loadEnv } from '@taxi-stream/adapters';
import type { Env } from '@taxi-stream/adapters';

export const DEFAULT_SCHEMA_PATH = 'db/redshift/enriched_trip_data.sql';

const warehouseEnvSchema = z.object({
  WAREHOUSE_DATABASE_URL: z.string().trim().min(1, 'must not be blank'),
  WAREHOUSE_SCHEMA_PATH: z.string().trim().min(1, 'must not be blank').default(DEFAULT_SCHEMA_PATH),
});

export interface WarehouseConfig {
  databaseUrl: string;
  schemaPath: string;
}

export function loadWarehouseConfig(env: Env = process.env): WarehouseConfig {
  const parsed = loadEnv(warehouseEnvSchema, env);
  return { databaseUrl: parsed.WAREHOUSE_DATABASE_URL, schemaPath: parsed.WAREHOUSE_SCHEMA_PATH };
}
