import { Logger } from '@nestjs/common';
import { Pool, type PoolConfig } from 'pg';
import type { AppConfig } from '../config/app-config';
import type { ConnectionConfig } from '../connection/connection.types';

export const PG_POOL = Symbol('PG_POOL');

/** The slice of `pg.PoolClient` the repository relies on. */
export interface DbClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  release(): void;
}

/** The slice of `pg.Pool` the repository relies on. */
export interface DbPool {
  connect(): Promise<DbClient>;
  end(): Promise<void>;
}

const logger = new Logger('Database');

const POSTGRES_PORT = 5432;

/**
 * Every connection field is set explicitly: `pg` fills anything left
 * `undefined` from `PG*` variables and `~/.pgpass`.
 */
export function poolOptions(
  conn: ConnectionConfig,
  config: AppConfig,
): PoolConfig {
  return {
    host: conn.host,
    port: conn.port ?? POSTGRES_PORT,
    database: conn.database,
    user: conn.user,
    password: conn.password ?? '',
    max: config.database.poolMax,
    connectionTimeoutMillis: config.database.connectTimeoutMs,
    idleTimeoutMillis: 10_000,
    application_name: 'contracts_dashboard',
  };
}

export function createPool(conn: ConnectionConfig, config: AppConfig): Pool {
  const pool = new Pool(poolOptions(conn, config));

  // An idle client losing its connection emits here; unhandled, it kills
  // the process.
  pool.on('error', (err) => {
    logger.warn(`Idle database client error: ${err.message}`);
  });

  return pool;
}
