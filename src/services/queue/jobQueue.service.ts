import PgBoss from 'pg-boss';
import { logger } from '../../utils/logger.js';

export const PENDING_PARTICIPATION_QUEUE = 'pending-participation-notification';

export interface PendingParticipationJobData {
  participationId: number;
  challengeId: number;
  correlationId?: string;
}

export class JobQueueService {
  private boss: PgBoss;

  constructor(
    connectionString: string,
    private readonly retryLimit = 3
  ) {
    this.boss = new PgBoss(connectionString);
  }

  async start(): Promise<void> {
    await this.boss.start();

    // Create queues if they don't exist
    await this.boss.createQueue(PENDING_PARTICIPATION_QUEUE);
    logger.info('Job queue started');
  }

  async stop(): Promise<void> {
    await this.boss.stop();
    logger.info('Job queue stopped');
  }

  async enqueuePendingParticipationNotification(
    data: PendingParticipationJobData
  ): Promise<string | null> {
    try {
      const jobId = await this.boss.send(PENDING_PARTICIPATION_QUEUE, data, {
        retryLimit: this.retryLimit,
        retryDelay: 30,
        retryBackoff: true,
      });

      logger.debug(
        { jobId, participationId: data.participationId, correlationId: data.correlationId },
        'Pending participation notification job enqueued'
      );
      return jobId;
    } catch (error) {
      logger.error(
        { err: error, participationId: data.participationId },
        'Failed to enqueue pending participation notification job'
      );
      throw error;
    }
  }
}
