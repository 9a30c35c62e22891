import path from "path";
import type { Knex } from "knex";

// Beside this file: dist/knex-migrations once compiled
const migrations = {
  directory: path.join(__dirname, 'knex-migrations'),
  tableName: 'knex_migrations'
};

const config: { [key: string]: Knex.Config } = {
  development: {
    client: 'postgresql',
    connection: {
      host: process.env.POSTGRES_HOST || 'localhost',
      port: parseInt(process.env.POSTGRES_PORT || '5432'),
      user: process.env.POSTGRES_USER || 'postgres',
      password: process.env.POSTGRES_PASSWORD || 'password',
      database: process.env.POSTGRES_DB || 'phasegen_dev',
      ssl: false
    },
    pool: {
      min: 2,
      max: 10
    },
    migrations,
    debug: process.env.KNEX_DEBUG === 'true'
  },

  production: {
    client: 'postgresql',
    connection: {
      connectionString: process.env.DATABASE_URL || process.env.POSTGRES_URL,
      ssl: process.env.DATABASE_URL ? { rejectUnauthorized: false } : false
    },
    pool: {
      min: 0,
      max: 3,
      acquireTimeoutMillis: 180000,
      idleTimeoutMillis: 60000
    },
    migrations,
    acquireConnectionTimeout: 180000,
    asyncStackTraces: true
  },

  // Test environment: in-memory SQLite, one connection so every query sees the same database
  test: {
    client: 'better-sqlite3',
    connection: {
      filename: ':memory:'
    },
    pool: {
      min: 1,
      max: 1
    },
    useNullAsDefault: true,
    migrations
  }
};

export default config;
