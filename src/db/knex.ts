import knex, { Knex } from 'knex';
import config from '../../knexfile';

export function createDatabase(environment = process.env.NODE_ENV || 'development'): Knex {
  const dbConfig = config[environment];
  if (!dbConfig) {
    throw new Error(`No database configuration for environment: ${environment}`);
  }

  console.log(`🗄️  Initializing database connection for environment: ${environment}`);
  return knex(dbConfig);
}
