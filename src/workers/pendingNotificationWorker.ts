import PgBoss from 'pg-boss';
import { ChallengesRepository } from '../db/repositories/challenges.repository.js';
import { NotificationsRepository } from '../db/repositories/notifications.repository.js';
import { ParticipationsRepository } from '../db/repositories/participations.repository.js';
import {
  PENDING_PARTICIPATION_QUEUE,
  PendingParticipationJobData,
} from '../services/queue/jobQueue.service.js';
import { logger, withContext } from '../utils/logger.js';
import { PerformanceTracker } from '../utils/performance.js';

export type NotificationOutcome = 'created' | 'duplicate' | 'skipped';

export class PendingNotificationWorker {
  constructor(
    private readonly boss: PgBoss,
    private readonly processor: PendingNotificationProcessor
  ) {}

  async start(): Promise<void> {
    logger.info('Pending notification worker starting');

    await this.boss.work<PendingParticipationJobData>(
      PENDING_PARTICIPATION_QUEUE,
      async (jobs: PgBoss.Job<PendingParticipationJobData>[]) => {
        for (const job of jobs) {
          await withContext({ jobId: job.id, correlationId: job.data.correlationId }, () =>
            this.processor.processJob(job.data)
          );
        }
      }
    );

    logger.info('Pending notification worker started');
  }

  async stop(): Promise<void> {
    logger.info('Stopping pending notification worker...');
    await this.boss.offWork(PENDING_PARTICIPATION_QUEUE);
  }
}

export class PendingNotificationProcessor {
  constructor(
    private readonly participationsRepository: Pick<ParticipationsRepository, 'findById'>,
    private readonly challengesRepository: Pick<ChallengesRepository, 'findById'>,
    private readonly notificationsRepository: Pick<
      NotificationsRepository,
      'createPendingParticipation'
    >
  ) {}

  /**
   * Writes the creator's notification. Safe to run more than once per job.
   */
  async processJob(data: PendingParticipationJobData): Promise<NotificationOutcome> {
    const { participationId } = data;
    const tracker = new PerformanceTracker('job.pendingNotification', { participationId });

    try {
      const participation = await this.participationsRepository.findById(participationId);
      if (!participation) {
        logger.info({ participationId }, 'Participation gone, skipping notification');
        tracker.end('success', { outcome: 'skipped' });
        return 'skipped';
      }

      if (participation.acceptation_status !== 'pending') {
        logger.info(
          { participationId, acceptationStatus: participation.acceptation_status },
          'Participation no longer pending, skipping notification'
        );
        tracker.end('success', { outcome: 'skipped' });
        return 'skipped';
      }

      const challenge = await this.challengesRepository.findById(participation.challenge_id);
      if (!challenge) {
        logger.info({ participationId }, 'Challenge gone, skipping notification');
        tracker.end('success', { outcome: 'skipped' });
        return 'skipped';
      }

      const notification = await this.notificationsRepository.createPendingParticipation({
        recipientId: challenge.creator_id,
        challengeId: challenge.id,
        participationId: participation.id,
      });

      const outcome: NotificationOutcome = notification ? 'created' : 'duplicate';
      tracker.end('success', { outcome });
      logger.info({ participationId, recipientId: challenge.creator_id, outcome }, 'Creator notified');
      return outcome;
    } catch (error) {
      tracker.end('error');
      logger.error({ err: error, participationId }, 'Pending notification job failed');
      throw error; // Let pg-boss handle retries
    }
  }
}
