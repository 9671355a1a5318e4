import { ChallengesRepository } from '../../db/repositories/challenges.repository.js';
import { ParticipationsRepository } from '../../db/repositories/participations.repository.js';
import { Challenge, ChallengeStatus } from '../../db/types/participation.types.js';
import { logger } from '../../utils/logger.js';
import { hasDeadlinePassed, isAtCapacity } from '../participation/eligibility.js';

/**
 * A passed deadline wins over a full challenge
 */
export function deriveChallengeStatus(
  challenge: Pick<Challenge, 'sponsored' | 'submission_ends_at'>,
  activeParticipations: number,
  now: Date
): ChallengeStatus {
  if (hasDeadlinePassed(challenge, now)) return 'closed';
  return isAtCapacity(challenge, activeParticipations) ? 'full' : 'open';
}

export class ChallengeStatusService {
  constructor(
    private readonly challengesRepo: Pick<ChallengesRepository, 'findById' | 'updateAggregate'>,
    private readonly participationsRepo: Pick<ParticipationsRepository, 'countActiveByChallenge'>,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Refreshes participations_count and status from the participations table
   */
  async recompute(challengeId: number): Promise<void> {
    const challenge = await this.challengesRepo.findById(challengeId);
    if (!challenge) {
      logger.warn({ challengeId }, 'Challenge vanished before status recomputation');
      return;
    }

    const count = await this.participationsRepo.countActiveByChallenge(challengeId);
    const status = deriveChallengeStatus(challenge, count, this.now());

    await this.challengesRepo.updateAggregate(challengeId, {
      participations_count: count,
      status,
    });

    logger.debug({ challengeId, participationsCount: count, status }, 'Challenge status recomputed');
  }
}
