import { Participation } from '../../db/types/participation.types.js';
import { logger } from '../../utils/logger.js';
import { Result, err, ok } from '../../utils/result.js';
import type {
  ChallengeStatusRecomputer,
  ParticipationAcceptor,
  UnitOfWork,
} from './enrollment.service.js';

export type AcceptByIdError = { kind: 'ParticipationNotFound' } | { kind: 'NotPending' };

export interface AcceptanceStore<Tx> {
  findById(id: number): Promise<Participation | null>;
  markAccepted(trx: Tx, challengeId: number, userId: number): Promise<Participation | null>;
}

export class ParticipationAcceptanceService<Tx> implements ParticipationAcceptor<Tx> {
  constructor(
    private readonly participationsRepo: AcceptanceStore<Tx>,
    private readonly unitOfWork: UnitOfWork<Tx>,
    private readonly statusRecomputer: ChallengeStatusRecomputer
  ) {}

  /**
   * Upgrades the participation of userId in challengeId to accepted inside the
   * caller's transaction. Throws when there is nothing to accept so the caller's
   * transaction rolls back.
   */
  async accept(trx: Tx, challengeId: number, userId: number): Promise<Participation> {
    const participation = await this.participationsRepo.markAccepted(trx, challengeId, userId);
    if (!participation) {
      throw new Error(`No participation of user ${userId} in challenge ${challengeId} to accept`);
    }

    logger.debug({ participationId: participation.id, challengeId }, 'Participation accepted');
    return participation;
  }

  /**
   * Accepts a pending participation on behalf of the challenge owner
   */
  async acceptById(participationId: number): Promise<Result<Participation, AcceptByIdError>> {
    const existing = await this.participationsRepo.findById(participationId);
    if (!existing) {
      return err<AcceptByIdError>({ kind: 'ParticipationNotFound' });
    }
    if (existing.acceptation_status !== 'pending') {
      return err<AcceptByIdError>({ kind: 'NotPending' });
    }

    const accepted = await this.unitOfWork.transaction((trx) =>
      this.accept(trx, existing.challenge_id, existing.user_id)
    );

    try {
      await this.statusRecomputer.recompute(accepted.challenge_id);
    } catch (error) {
      logger.warn(
        { err: error, challengeId: accepted.challenge_id },
        'Challenge status recomputation failed after acceptance'
      );
    }

    return ok(accepted);
  }
}
