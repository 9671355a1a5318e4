import { Participation } from '../../db/types/participation.types.js';
import { currentContext } from '../../utils/logger.js';
import type { PendingParticipationNotifier } from '../participation/enrollment.service.js';
import { JobQueueService } from '../queue/jobQueue.service.js';

/**
 * Hands the notification to the job queue; delivery and retries happen in the worker
 */
export class QueuedPendingParticipationNotifier implements PendingParticipationNotifier {
  constructor(
    private readonly jobQueue: Pick<JobQueueService, 'enqueuePendingParticipationNotification'>
  ) {}

  async notify(participation: Participation): Promise<void> {
    const { correlationId } = currentContext();

    await this.jobQueue.enqueuePendingParticipationNotification({
      participationId: participation.id,
      challengeId: participation.challenge_id,
      correlationId: typeof correlationId === 'string' ? correlationId : undefined,
    });
  }
}
