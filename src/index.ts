import { config } from './config/index.js';
import { createServer } from './api/server.js';
import { PostgresAdapter } from './db/adapters/PostgresAdapter.js';
import { ChallengesRepository } from './db/repositories/challenges.repository.js';
import { ParticipationsRepository } from './db/repositories/participations.repository.js';
import { NotificationsRepository } from './db/repositories/notifications.repository.js';
import { JobQueueService } from './services/queue/jobQueue.service.js';
import { ChallengeStatusService } from './services/challenge/challengeStatus.service.js';
import { ParticipationAcceptanceService } from './services/participation/acceptance.service.js';
import { ParticipationEnrollmentService } from './services/participation/enrollment.service.js';
import { QueuedPendingParticipationNotifier } from './services/notification/pendingParticipationNotifier.js';
import { ChallengesHandler } from './handlers/challenges.handler.js';
import { ParticipationsHandler } from './handlers/participations.handler.js';
import { NotificationsHandler } from './handlers/notifications.handler.js';
import { logger } from './utils/logger.js';

async function main() {
  logger.info('Starting Challenge Participation Backend...');

  try {
    logger.info('Initializing database...');
    const adapter = new PostgresAdapter(config.databaseUrl);
    await adapter.initialize();
    const challengesRepository = new ChallengesRepository(adapter);
    const participationsRepository = new ParticipationsRepository(adapter);
    const notificationsRepository = new NotificationsRepository(adapter);

    logger.info('Initializing services...');
    const jobQueue = new JobQueueService(config.databaseUrl, config.notificationRetryLimit);
    await jobQueue.start();

    const statusService = new ChallengeStatusService(challengesRepository, participationsRepository);
    const acceptanceService = new ParticipationAcceptanceService(
      participationsRepository,
      adapter,
      statusService
    );
    const enrollmentService = new ParticipationEnrollmentService({
      challenges: challengesRepository,
      participations: participationsRepository,
      acceptor: acceptanceService,
      unitOfWork: adapter,
      statusRecomputer: statusService,
      notifier: new QueuedPendingParticipationNotifier(jobQueue),
    });

    const app = createServer({
      challengesHandler: new ChallengesHandler(challengesRepository),
      participationsHandler: new ParticipationsHandler(
        enrollmentService,
        acceptanceService,
        participationsRepository,
        challengesRepository
      ),
      notificationsHandler: new NotificationsHandler(notificationsRepository),
    });

    const port = config.port;

    const server = app.listen(port, () => {
      logger.info(`Server running on port ${port}`);
      logger.info(`Health check: http://localhost:${port}/health`);
    });

    const shutdown = async (signal: string) => {
      logger.info(`Received ${signal}, starting graceful shutdown...`);

      // Stop accepting new connections
      server.close(() => {
        logger.info('HTTP server closed');
      });

      await jobQueue.stop();
      await adapter.close();

      logger.info('Graceful shutdown complete');
      process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
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

main().catch((error) => {
  logger.fatal({ err: error }, 'Failed to start application');
  process.exit(1);
});
