/**
 * PostgreSQL Database Client
 *
 * Wraps a pg Pool in a small query API (any / one / oneOrNone / none / tx).
 * Repositories depend on the Queryable interface so that a transaction
 * handle can be passed wherever the pool is accepted.
 */

import { Pool, type PoolClient, type QueryResult } from 'pg';
import { config } from '../config';
import { logger } from '../config/logger';

export interface Queryable {
  /** All rows */
  any<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<T[]>;
  /** Exactly one row, throws otherwise */
  one<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<T>;
  /** First row or null */
  oneOrNone<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<T | null>;
  /** Statements without a result */
  none(sql: string, params?: unknown[]): Promise<void>;
}

export interface Database extends Queryable {
  /** Runs callback inside BEGIN/COMMIT, rolling back when it throws */
  tx<T>(callback: (t: Queryable) => Promise<T>): Promise<T>;
}

type RunQuery = (sql: string, params?: unknown[]) => Promise<QueryResult>;

function createQueryable(run: RunQuery): Queryable {
  return {
    async any<T>(sql: string, params?: unknown[]): Promise<T[]> {
      const result = await run(sql, params);
      return result.rows;
    },

    async one<T>(sql: string, params?: unknown[]): Promise<T> {
      const result = await run(sql, params);
      if (result.rows.length !== 1) {
        throw new Error(`Expected exactly one row, got ${result.rows.length}`);
      }
      return result.rows[0];
    },

    async oneOrNone<T>(sql: string, params?: unknown[]): Promise<T | null> {
      const result = await run(sql, params);
      return result.rows[0] ?? null;
    },

    async none(sql: string, params?: unknown[]): Promise<void> {
      await run(sql, params);
    },
  };
}

const pool = new Pool({
  host: config.database.host,
  port: config.database.port,
  database: config.database.database,
  user: config.database.user,
  password: config.database.password,
  ssl: config.database.ssl,
  max: config.database.maxConnections,
  application_name: config.service.name,
});

pool.on('error', (error) => {
  logger.error('Database: Idle client error', {
    error: error.message,
    stack: error.stack,
  });
});

/**
 * Database client for the gc-policy-service
 */
export const db = {
  ...createQueryable((sql, params) => pool.query(sql, params)),

  async tx<T>(callback: (t: Queryable) => Promise<T>): Promise<T> {
    const client: PoolClient = await pool.connect();
    try {
      await client.query('BEGIN');
      const result = await callback(createQueryable((sql, params) => client.query(sql, params)));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  },

  /**
   * Close all connections
   */
  async close(): Promise<void> {
    await pool.end();
  },
} satisfies Database & { close(): Promise<void> };
