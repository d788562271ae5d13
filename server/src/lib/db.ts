import { sql, type SQL } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from '../schema';

export interface DatabaseOptions {
  url: string;
  maxConnections?: number;
}

const DEFAULT_MAX_CONNECTIONS = 10;

// Idempotent; run once at start-up so a fresh database needs no migration step.
const CREATE_STATEMENTS = [
  sql`CREATE SCHEMA IF NOT EXISTS app`,
  sql`CREATE TABLE IF NOT EXISTS app.knowledge_bases (
    name text PRIMARY KEY,
    description text NOT NULL DEFAULT '',
    path text NOT NULL,
    created_at timestamptz NOT NULL DEFAULT now()
  )`,
  sql`CREATE TABLE IF NOT EXISTS app.file_records (
    safe_key text PRIMARY KEY,
    seq serial NOT NULL,
    original_name text NOT NULL,
    knowledge_base text NOT NULL,
    stored_path text NOT NULL,
    mime_type text NOT NULL,
    size_bytes bigint NOT NULL,
    status text NOT NULL DEFAULT 'uploaded',
    progress integer NOT NULL DEFAULT 0,
    message text,
    error text,
    upload_time timestamptz NOT NULL DEFAULT now(),
    updated_at timestamptz NOT NULL DEFAULT now()
  )`,
  // Tables created before uploads could exceed 2 GiB.
  sql`ALTER TABLE app.file_records ALTER COLUMN size_bytes TYPE bigint`,
  sql`CREATE INDEX IF NOT EXISTS file_records_knowledge_base_idx ON app.file_records (knowledge_base)`,
  sql`CREATE INDEX IF NOT EXISTS file_records_original_name_idx ON app.file_records (original_name)`,
];

export function createDatabase(options: DatabaseOptions) {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? DEFAULT_MAX_CONNECTIONS,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  return {
    db: drizzle(connection, { schema }),
    close: () => connection.end(),
  };
}

export type Database = ReturnType<typeof createDatabase>['db'];

export async function testDatabaseConnection(db: Database): Promise<boolean> {
  try {
    await db.execute(sql`SELECT 1`);
    return true;
  } catch (error) {
    console.error('[db] connection check failed:', error);
    return false;
  }
}

export interface SqlExecutor {
  execute(query: SQL): Promise<unknown>;
}

export async function ensureTables(db: SqlExecutor): Promise<void> {
  for (const statement of CREATE_STATEMENTS) {
    await db.execute(statement);
  }
}
