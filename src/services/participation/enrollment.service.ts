import {
  AcceptationStatus,
  Challenge,
  NewParticipation,
  Participation,
} from '../../db/types/participation.types.js';
import { isUniqueViolation } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { trackAsync } from '../../utils/performance.js';
import { Result, err, ok } from '../../utils/result.js';
import { JoiningBlockedReason, joiningBlockedReason } from './eligibility.js';

// Collaborators. Tx is the transaction handle shared by the insert and the accept call.

export interface ChallengeLookup {
  findById(id: number): Promise<Challenge | null>;
  findByInvitationToken(token: string): Promise<Challenge | null>;
}

export interface ParticipationStore<Tx> {
  exists(userId: number, challengeId: number): Promise<boolean>;
  insert(fields: NewParticipation, trx: Tx): Promise<Participation>;
}

export interface ParticipationAcceptor<Tx> {
  accept(trx: Tx, challengeId: number, userId: number): Promise<Participation>;
}

export interface UnitOfWork<Tx> {
  transaction<T>(callback: (trx: Tx) => Promise<T>): Promise<T>;
}

export interface ChallengeStatusRecomputer {
  recompute(challengeId: number): Promise<void>;
}

export interface PendingParticipationNotifier {
  notify(participation: Participation): Promise<void>;
}

export type ChallengeReference = { challengeId: number } | { invitationToken: string };

export type EnrollmentRequest = ChallengeReference & {
  userId: number;
  acceptationStatus: AcceptationStatus;
};

export type EnrollmentError =
  | { kind: 'ChallengeNotFound' }
  | { kind: 'JoiningBlocked'; reason: JoiningBlockedReason }
  | { kind: 'DuplicateParticipation' };

export type EnrollmentResult = Result<Participation, EnrollmentError>;

export interface EnrollmentDependencies<Tx> {
  challenges: ChallengeLookup;
  participations: ParticipationStore<Tx>;
  acceptor: ParticipationAcceptor<Tx>;
  unitOfWork: UnitOfWork<Tx>;
  statusRecomputer: ChallengeStatusRecomputer;
  notifier: PendingParticipationNotifier;
  now?: () => Date;
}

/**
 * Joins a user to a challenge.
 *
 * Validation failures come back as values before anything is written. The insert
 * and the optional auto-accept share one transaction; status recomputation and the
 * creator notification run after commit and never undo a successful enrollment.
 */
export class ParticipationEnrollmentService<Tx> implements ParticipationEnroller {
  private readonly now: () => Date;

  constructor(private readonly deps: EnrollmentDependencies<Tx>) {
    this.now = deps.now ?? (() => new Date());
  }

  async enroll(request: EnrollmentRequest): Promise<EnrollmentResult> {
    return trackAsync('participation.enroll', () => this.run(request), {
      userId: request.userId,
    });
  }

  private async run(request: EnrollmentRequest): Promise<EnrollmentResult> {
    const resolved = await this.resolveChallenge(request);
    if (!resolved.ok) return resolved;
    const challenge = resolved.value;

    const eligible = this.checkEligibility(challenge);
    if (!eligible.ok) return eligible;

    const unique = await this.checkNotParticipating(request.userId, challenge);
    if (!unique.ok) return unique;

    const created = await this.createParticipation(request, challenge);
    if (!created.ok) return created;
    const participation = created.value;

    logger.info(
      {
        participationId: participation.id,
        challengeId: challenge.id,
        acceptationStatus: participation.acceptation_status,
      },
      'Participation created'
    );

    await this.recomputeStatus(challenge.id);
    await this.notifyCreator(participation, challenge);

    return ok(participation);
  }

  private async resolveChallenge(
    reference: ChallengeReference
  ): Promise<Result<Challenge, EnrollmentError>> {
    const challenge =
      'invitationToken' in reference
        ? await this.deps.challenges.findByInvitationToken(reference.invitationToken)
        : await this.deps.challenges.findById(reference.challengeId);

    return challenge ? ok(challenge) : err<EnrollmentError>({ kind: 'ChallengeNotFound' });
  }

  private checkEligibility(challenge: Challenge): Result<Challenge, EnrollmentError> {
    const reason = joiningBlockedReason(challenge, this.now());
    if (reason) {
      logger.debug({ challengeId: challenge.id, reason }, 'Joining blocked');
      return err<EnrollmentError>({ kind: 'JoiningBlocked', reason });
    }
    return ok(challenge);
  }

  private async checkNotParticipating(
    userId: number,
    challenge: Challenge
  ): Promise<Result<Challenge, EnrollmentError>> {
    const exists = await this.deps.participations.exists(userId, challenge.id);
    return exists ? err<EnrollmentError>({ kind: 'DuplicateParticipation' }) : ok(challenge);
  }

  private async createParticipation(
    request: EnrollmentRequest,
    challenge: Challenge
  ): Promise<Result<Participation, EnrollmentError>> {
    try {
      const participation = await this.deps.unitOfWork.transaction(async (trx) => {
        const inserted = await this.deps.participations.insert(
          {
            user_id: request.userId,
            acceptation_status: request.acceptationStatus,
            challenge_id: challenge.id,
          },
          trx
        );

        if (challenge.open || challenge.sponsored) {
          return this.deps.acceptor.accept(trx, challenge.id, request.userId);
        }
        return inserted;
      });

      return ok(participation);
    } catch (error) {
      // A concurrent request inserted the same pair between the check and the insert
      if (isUniqueViolation(error)) {
        return err<EnrollmentError>({ kind: 'DuplicateParticipation' });
      }
      throw error;
    }
  }

  private async recomputeStatus(challengeId: number): Promise<void> {
    try {
      await this.deps.statusRecomputer.recompute(challengeId);
    } catch (error) {
      logger.warn({ err: error, challengeId }, 'Challenge status recomputation failed');
    }
  }

  private async notifyCreator(participation: Participation, challenge: Challenge): Promise<void> {
    if (participation.acceptation_status !== 'pending') return;
    if (participation.user_id === challenge.creator_id) return;

    try {
      await this.deps.notifier.notify(participation);
    } catch (error) {
      logger.warn(
        { err: error, participationId: participation.id },
        'Pending participation notification failed'
      );
    }
  }
}

export interface ParticipationEnroller {
  enroll(request: EnrollmentRequest): Promise<EnrollmentResult>;
}
