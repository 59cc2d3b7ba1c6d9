/**
 * Applies schema.sql to the configured database.
 *
 * Run with `npm run db:setup` after a build. The schema is idempotent.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import pg from 'pg';

import { parseEnv, createConfig } from '../config/env.js';
import { createLogger } from '../logger/index.js';

const SCHEMA_PATH = fileURLToPath(new URL('../../../src/infra/database/schema.sql', import.meta.url));

export async function setupDatabase(connectionString: string, schemaPath = SCHEMA_PATH): Promise<void> {
  const schemaSql = await readFile(schemaPath, 'utf8');
  const client = new pg.Client({ connectionString });

  await client.connect();
  try {
    await client.query('BEGIN');
    await client.query(schemaSql);
    await client.query('COMMIT');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    await client.end();
  }
}

const isEntryPoint =
  process.argv[1] !== undefined && fileURLToPath(import.meta.url) === process.argv[1];

if (isEntryPoint) {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ level: config.logger.level, pretty: config.logger.pretty });

  setupDatabase(config.database.url)
    .then(() => {
      logger.info('Database schema applied');
      process.exit(0);
    })
    .catch((error: unknown) => {
      logger.fatal({ err: error }, 'Failed to apply database schema');
      process.exit(1);
    });
}
