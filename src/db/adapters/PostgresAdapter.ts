import knex, { Knex } from 'knex';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';

export class PostgresAdapter {
  private knex: Knex;

  constructor(connectionString: string) {
    this.knex = knex({
      client: 'pg',
      connection: {
        connectionString,
        ssl: config.nodeEnv === 'production' ? { rejectUnauthorized: false } : false,
      },
      pool: {
        min: 2,
        max: 10,
      },
    });
  }

  getKnex(): Knex {
    return this.knex;
  }

  async initialize(): Promise<void> {
    try {
      await this.knex.raw('SELECT 1');
      logger.debug('PostgreSQL connection established');
      // Table creation is handled by migrations
    } catch (error) {
      logger.error({ err: error }, 'Failed to connect to PostgreSQL');
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.knex.destroy();
  }

  /**
   * Runs the callback in one transaction; a rejection rolls everything back
   */
  async transaction<T>(callback: (trx: Knex.Transaction) => Promise<T>): Promise<T> {
    return await this.knex.transaction(callback);
  }
}
