import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { GameDatabase } from './game/types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type GameDbClient = Kysely<GameDatabase>;

export interface DatabaseClientOptions {
  connectionString: string;
  /** Server-side statement timeout applied to every pooled connection */
  statementTimeoutMs: number;
  /** Pool size (default: 10) */
  maxConnections?: number;
}

/**
 * Create a Kysely instance backed by a pg pool
 */
export const createDbClient = (options: DatabaseClientOptions): GameDbClient => {
  return new Kysely<GameDatabase>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString: options.connectionString,
        max: options.maxConnections ?? 10,
        statement_timeout: options.statementTimeoutMs,
      }),
    }),
  });
};

/**
 * Initialize the game database client from configuration
 */
export const initDatabase = (config: AppConfig): GameDbClient => {
  const { database } = config;

  if (database.url === '') {
    throw new Error('Missing configuration for the game database (DATABASE_URL)');
  }

  return createDbClient({
    connectionString: database.url,
    statementTimeoutMs: database.statementTimeoutMs,
  });
};

// Re-export types
export type {
  GameDatabase,
  Users,
  LeaderboardEntries,
  Referrals,
  UserEvents,
  AnalyticsDaily,
  ScamReports,
} from './game/types.js';
