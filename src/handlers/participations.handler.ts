import { Request, Response, NextFunction } from 'express';
import { ParticipationsRepository } from '../db/repositories/participations.repository.js';
import { ChallengesRepository } from '../db/repositories/challenges.repository.js';
import {
  AcceptationStatus,
  Participation,
  isAcceptationStatus,
} from '../db/types/participation.types.js';
import { ParticipationAcceptanceService } from '../services/participation/acceptance.service.js';
import {
  EnrollmentError,
  EnrollmentRequest,
  ParticipationEnroller,
} from '../services/participation/enrollment.service.js';
import { ApiError, Errors } from '../utils/errors.js';
import { isRecord, parsePositiveInt } from '../api/middleware/validation.middleware.js';

export interface ParticipationResponse {
  id: number;
  userId: number;
  challengeId: number;
  acceptationStatus: AcceptationStatus;
  acceptedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export function toEnrollmentApiError(error: EnrollmentError): ApiError {
  switch (error.kind) {
    case 'ChallengeNotFound':
      return Errors.notFound('Challenge', 'CHALLENGE_NOT_FOUND');
    case 'JoiningBlocked':
      return Errors.joiningBlocked(
        error.reason === 'capacity'
          ? 'Challenge is not accepting more participants'
          : 'Challenge submissions have ended'
      );
    case 'DuplicateParticipation':
      return Errors.duplicateParticipation();
  }
}

export class ParticipationsHandler {
  constructor(
    private readonly enroller: ParticipationEnroller,
    private readonly acceptanceService: Pick<ParticipationAcceptanceService<unknown>, 'acceptById'>,
    private readonly participationsRepo: Pick<
      ParticipationsRepository,
      'findById' | 'findByChallenge'
    >,
    private readonly challengesRepo: Pick<ChallengesRepository, 'findById'>
  ) {}

  private toResponse(participation: Participation): ParticipationResponse {
    return {
      id: participation.id,
      userId: participation.user_id,
      challengeId: participation.challenge_id,
      acceptationStatus: participation.acceptation_status,
      acceptedAt: participation.accepted_at ? new Date(participation.accepted_at) : undefined,
      createdAt: new Date(participation.created_at),
      updatedAt: new Date(participation.updated_at),
    };
  }

  /**
   * An invitation token takes precedence over a challenge id when both are sent
   */
  private parseEnrollmentRequest(body: unknown): EnrollmentRequest {
    if (!isRecord(body)) {
      throw Errors.badRequest('Request body must be a JSON object');
    }

    const { userId: rawUserId, acceptationStatus: rawStatus, invitationToken, challengeId } = body;

    if (rawUserId === undefined || rawUserId === null) {
      throw Errors.badRequest('userId is required', 'userId');
    }
    const userId = parsePositiveInt(rawUserId);
    if (userId === null) {
      throw Errors.badRequest('userId must be a positive integer', 'userId');
    }

    let acceptationStatus: AcceptationStatus = 'pending';
    if (rawStatus !== undefined) {
      if (!isAcceptationStatus(rawStatus)) {
        throw Errors.badRequest(
          'acceptationStatus must be one of pending, accepted, rejected',
          'acceptationStatus'
        );
      }
      acceptationStatus = rawStatus;
    }

    if (invitationToken !== undefined) {
      if (typeof invitationToken !== 'string' || invitationToken.trim() === '') {
        throw Errors.badRequest('invitationToken must be a non-empty string', 'invitationToken');
      }
      return { userId, acceptationStatus, invitationToken };
    }

    if (challengeId === undefined) {
      throw Errors.badRequest('challengeId or invitationToken is required', 'challengeId');
    }
    const parsedChallengeId = parsePositiveInt(challengeId);
    if (parsedChallengeId === null) {
      throw Errors.badRequest('challengeId must be a positive integer', 'challengeId');
    }
    return { userId, acceptationStatus, challengeId: parsedChallengeId };
  }

  async createParticipation(
    req: Request,
    res: Response<ParticipationResponse>,
    next: NextFunction
  ): Promise<void> {
    try {
      const request = this.parseEnrollmentRequest(req.body);

      const result = await this.enroller.enroll(request);
      if (!result.ok) {
        throw toEnrollmentApiError(result.error);
      }

      res.status(201).json(this.toResponse(result.value));
    } catch (error) {
      next(error);
    }
  }

  async getParticipation(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const id = parsePositiveInt(req.params.id);
      const participation = id === null ? null : await this.participationsRepo.findById(id);
      if (!participation) {
        throw Errors.notFound('Participation');
      }

      res.json(this.toResponse(participation));
    } catch (error) {
      next(error);
    }
  }

  async acceptParticipation(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const id = parsePositiveInt(req.params.id);
      if (id === null) {
        throw Errors.notFound('Participation');
      }

      const result = await this.acceptanceService.acceptById(id);
      if (!result.ok) {
        throw result.error.kind === 'ParticipationNotFound'
          ? Errors.notFound('Participation')
          : Errors.conflict('Only pending participations can be accepted');
      }

      res.json(this.toResponse(result.value));
    } catch (error) {
      next(error);
    }
  }

  async getChallengeParticipations(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const challengeId = parsePositiveInt(req.params.challengeId);
      const challenge =
        challengeId === null ? null : await this.challengesRepo.findById(challengeId);
      if (!challenge) {
        throw Errors.notFound('Challenge', 'CHALLENGE_NOT_FOUND');
      }

      const participations = await this.participationsRepo.findByChallenge(challenge.id);
      res.json(participations.map((p) => this.toResponse(p)));
    } catch (error) {
      next(error);
    }
  }
}
