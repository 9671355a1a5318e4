import PgBoss from 'pg-boss';
import { config } from './config/index.js';
import { PostgresAdapter } from './db/adapters/PostgresAdapter.js';
import { ChallengesRepository } from './db/repositories/challenges.repository.js';
import { NotificationsRepository } from './db/repositories/notifications.repository.js';
import { ParticipationsRepository } from './db/repositories/participations.repository.js';
import { PENDING_PARTICIPATION_QUEUE } from './services/queue/jobQueue.service.js';
import {
  PendingNotificationProcessor,
  PendingNotificationWorker,
} from './workers/pendingNotificationWorker.js';
import { logger } from './utils/logger.js';

async function startNotificationWorker() {
  logger.info('Starting Pending Notification Worker...');

  let boss: PgBoss | null = null;
  let adapter: PostgresAdapter | null = null;

  try {
    logger.info('Initializing database connection...');
    adapter = new PostgresAdapter(config.databaseUrl);
    await adapter.initialize();

    const processor = new PendingNotificationProcessor(
      new ParticipationsRepository(adapter),
      new ChallengesRepository(adapter),
      new NotificationsRepository(adapter)
    );

    logger.info('Initializing pg-boss...');
    boss = new PgBoss(config.databaseUrl);
    await boss.start();
    await boss.createQueue(PENDING_PARTICIPATION_QUEUE);

    const worker = new PendingNotificationWorker(boss, processor);
    await worker.start();

    const shutdown = async (signal: string) => {
      logger.info(`Received ${signal}, starting graceful shutdown...`);

      await worker.stop();

      if (boss) {
        await boss.stop();
        logger.info('Job queue stopped');
      }

      if (adapter) {
        await adapter.close();
        logger.info('Database connection closed');
      }

      logger.info('Notification worker shutdown complete');
      process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start notification worker');

    if (boss) {
      await boss.stop();
    }
    if (adapter) {
      await adapter.close();
    }

    process.exit(1);
  }
}

process.on('uncaughtException', (error) => {
  logger.fatal({ err: error }, 'Uncaught Exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  logger.fatal({ reason, promise }, 'Unhandled Rejection');
  process.exit(1);
});

startNotificationWorker().catch((error) => {
  logger.fatal({ err: error }, 'Failed to start notification worker');
  process.exit(1);
});
