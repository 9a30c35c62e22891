import type { Knex } from 'knex';

export interface DatabaseHealth {
  status: 'healthy' | 'unhealthy';
  connection: boolean;
  migrations?: { currentVersion: string; pendingMigrations: number };
  error?: string;
  timestamp: string;
}

export class DatabaseManager {
  constructor(private readonly db: Knex) {}

  /**
   * Test the database connection
   */
  async testConnection(): Promise<boolean> {
    try {
      await this.db.raw('SELECT 1+1 as result');
      console.log('✅ Database connection test passed');
      return true;
    } catch (error) {
      console.error('❌ Database connection test failed:', error);
      return false;
    }
  }

  /**
   * Run pending migrations
   */
  async runMigrations(): Promise<{ batchNo: number; migrations: string[] }> {
    try {
      const [batchNo, log]: [number, string[]] = await this.db.migrate.latest();

      if (log.length === 0) {
        console.log('✅ Database is already up to date');
      } else {
        console.log(`✅ Ran ${log.length} migrations:`);
        log.forEach((migration) => console.log(`  - ${migration}`));
      }

      return { batchNo, migrations: log };
    } catch (error) {
      console.error('❌ Migration failed:', error);
      throw error;
    }
  }

  /**
   * Check database health
   */
  async healthCheck(): Promise<DatabaseHealth> {
    try {
      const connection = await this.testConnection();
      const currentVersion = await this.db.migrate.currentVersion();
      const [, pending]: [unknown[], unknown[]] = await this.db.migrate.list();

      return {
        status: connection ? 'healthy' : 'unhealthy',
        connection,
        migrations: { currentVersion, pendingMigrations: pending.length },
        timestamp: new Date().toISOString()
      };
    } catch (error) {
      return {
        status: 'unhealthy',
        connection: false,
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString()
      };
    }
  }

  /**
   * Gracefully close database connection
   */
  async closeConnection(): Promise<void> {
    try {
      await this.db.destroy();
      console.log('✅ Database connection closed gracefully');
    } catch (error) {
      console.error('❌ Error closing database connection:', error);
      throw error;
    }
  }
}
