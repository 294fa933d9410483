/**
 * Database Service
 *
 * PostgreSQL access through postgres.js with Drizzle ORM.
 *
 * - Connection pooling with a server-side statement_timeout so no query
 *   holds a pet lock indefinitely
 * - SQL migrations applied in file-name order at startup
 * - Graceful shutdown support
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import postgres from 'postgres';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import type { Logger } from 'pino';
import type { Config } from '../config.js';
import * as schema from './schema.js';

export type Database = PostgresJsDatabase<typeof schema>;

let dbInstance: Database | null = null;
let sqlClient: postgres.Sql | null = null;

/**
 * Initialize database connection
 */
export function initDatabase(config: Config, logger: Logger): Database {
  if (dbInstance) {
    return dbInstance;
  }

  logger.info('Initializing database connection...');

  sqlClient = postgres(config.databaseUrl, {
    max: 10, // Max connections in pool
    idle_timeout: 30, // Close idle connections after 30s
    connect_timeout: 10, // Connection timeout
    connection: {
      statement_timeout: config.statementTimeoutMs,
    },
    onnotice: () => {}, // Suppress notices
  });

  dbInstance = drizzle(sqlClient, { schema });

  logger.info('Database connection initialized');
  return dbInstance;
}

/**
 * Get database instance (throws if not initialized)
 */
export function getDatabase(): Database {
  if (!dbInstance) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return dbInstance;
}

/**
 * Close database connection
 */
export async function closeDatabase(logger: Logger): Promise<void> {
  if (sqlClient) {
    logger.info('Closing database connection...');
    await sqlClient.end();
    sqlClient = null;
    dbInstance = null;
    logger.info('Database connection closed');
  }
}

// =============================================================================
// Migrations
// =============================================================================

/**
 * `migrations/` sits at the project root, two levels above this file in
 * source and three levels above it once compiled into dist/.
 */
function findMigrationsDir(): string {
  const here = fileURLToPath(new URL('.', import.meta.url));
  const candidates = [join(here, '..', '..', 'migrations'), join(here, '..', '..', '..', 'migrations')];
  const found = candidates.find((dir) => existsSync(dir));
  if (!found) {
    throw new Error(`Migrations directory not found (looked in ${candidates.join(', ')})`);
  }
  return found;
}

/**
 * Apply every .sql file in the migrations directory. Statements are written
 * to be re-runnable, so no bookkeeping table is kept.
 */
export async function migrate(logger: Logger): Promise<void> {
  if (!sqlClient) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }

  const dir = findMigrationsDir();
  const files = readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  for (const file of files) {
    logger.info({ file }, 'Applying migration');
    await sqlClient.unsafe(readFileSync(join(dir, file), 'utf8'));
  }

  logger.info({ count: files.length }, 'Migrations applied');
}
