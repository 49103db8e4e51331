/**
 * Configuration Loader
 *
 * Loads environment variables and provides typed configuration for the service.
 * Uses dotenv for local development.
 *
 * All config is externalized via environment variables.
 */

import dotenv from 'dotenv';

dotenv.config();

export interface Config {
  // Server
  port: number;
  nodeEnv: string;

  // Database (managed column family records, history, outbox)
  database: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    maxConnections: number;
    ssl: boolean;
  };

  // Bigtable admin API
  bigtable: {
    projectId?: string;
    keyFilename?: string;
    apiEndpoint?: string;
  };

  // Store calls
  store: {
    timeoutMs: number;
  };

  // Service
  service: {
    name: string;
    version: string;
  };
}

export const config: Config = {
  port: parseInt(process.env.PORT || '3000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',

  database: {
    host: process.env.PGHOST || 'localhost',
    port: parseInt(process.env.PGPORT || '5432', 10),
    database: process.env.PGDATABASE || 'gc_policy',
    user: process.env.PGUSER || 'postgres',
    password: process.env.PGPASSWORD || 'postgres',
    maxConnections: parseInt(process.env.PG_MAX_CONNECTIONS || '20', 10),
    ssl: process.env.PGSSLMODE === 'require',
  },

  bigtable: {
    projectId: process.env.BIGTABLE_PROJECT_ID,
    keyFilename: process.env.BIGTABLE_KEY_FILENAME,
    // e.g. localhost:8086 for the Bigtable emulator
    apiEndpoint: process.env.BIGTABLE_API_ENDPOINT,
  },

  store: {
    timeoutMs: parseInt(process.env.STORE_TIMEOUT_MS || '30000', 10),
  },

  service: {
    name: process.env.SERVICE_NAME || 'gc-policy-service',
    version: process.env.npm_package_version || '1.0.0',
  },
};
