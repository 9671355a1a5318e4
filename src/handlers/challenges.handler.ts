import { Request, Response, NextFunction } from 'express';
import { randomBytes } from 'crypto';
import { ChallengesRepository } from '../db/repositories/challenges.repository.js';
import { Challenge, ChallengeStatus } from '../db/types/participation.types.js';
import { Errors } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { isRecord, parsePositiveInt } from '../api/middleware/validation.middleware.js';

export interface ChallengeResponse {
  id: number;
  title: string;
  description: string;
  creatorId: number;
  open: boolean;
  sponsored: boolean;
  participationsCount: number;
  submissionEndsAt?: Date;
  invitationToken: string;
  status: ChallengeStatus;
  createdAt: Date;
  updatedAt: Date;
}

export function generateInvitationToken(): string {
  return randomBytes(16).toString('hex');
}

export class ChallengesHandler {
  constructor(
    private readonly challengesRepo: Pick<
      ChallengesRepository,
      'findAll' | 'findById' | 'create' | 'delete'
    >
  ) {}

  private toResponse(challenge: Challenge): ChallengeResponse {
    return {
      id: challenge.id,
      title: challenge.title,
      description: challenge.description,
      creatorId: challenge.creator_id,
      open: challenge.open,
      sponsored: challenge.sponsored,
      participationsCount: challenge.participations_count,
      submissionEndsAt: challenge.submission_ends_at
        ? new Date(challenge.submission_ends_at)
        : undefined,
      invitationToken: challenge.invitation_token,
      status: challenge.status,
      createdAt: new Date(challenge.created_at),
      updatedAt: new Date(challenge.updated_at),
    };
  }

  async getAllChallenges(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const challenges = await this.challengesRepo.findAll();
      res.json(challenges.map((c) => this.toResponse(c)));
    } catch (error) {
      next(error);
    }
  }

  async getChallenge(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const id = parsePositiveInt(req.params.id);
      const challenge = id === null ? null : await this.challengesRepo.findById(id);
      if (!challenge) {
        throw Errors.notFound('Challenge', 'CHALLENGE_NOT_FOUND');
      }

      res.json(this.toResponse(challenge));
    } catch (error) {
      next(error);
    }
  }

  async createChallenge(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        throw Errors.badRequest('Request body must be a JSON object');
      }
      const { title, description, creatorId, open, sponsored, submissionEndsAt } = body;

      if (typeof title !== 'string' || title.trim() === '') {
        throw Errors.badRequest('title is required', 'title');
      }
      if (description !== undefined && typeof description !== 'string') {
        throw Errors.badRequest('description must be a string', 'description');
      }
      const creator = parsePositiveInt(creatorId);
      if (creator === null) {
        throw Errors.badRequest('creatorId must be a positive integer', 'creatorId');
      }
      if (open !== undefined && typeof open !== 'boolean') {
        throw Errors.badRequest('open must be a boolean', 'open');
      }
      if (sponsored !== undefined && typeof sponsored !== 'boolean') {
        throw Errors.badRequest('sponsored must be a boolean', 'sponsored');
      }

      let endsAt: Date | null = null;
      if (submissionEndsAt !== undefined && submissionEndsAt !== null) {
        endsAt = typeof submissionEndsAt === 'string' ? new Date(submissionEndsAt) : null;
        if (endsAt === null || isNaN(endsAt.getTime())) {
          throw Errors.badRequest('submissionEndsAt must be an ISO date', 'submissionEndsAt');
        }
      }

      const challenge = await this.challengesRepo.create({
        title: title.trim(),
        description: description ?? '',
        creator_id: creator,
        open: open ?? false,
        sponsored: sponsored ?? false,
        submission_ends_at: endsAt,
        invitation_token: generateInvitationToken(),
      });

      logger.info({ challengeId: challenge.id, creatorId: creator }, 'Challenge created');

      res.status(201).json(this.toResponse(challenge));
    } catch (error) {
      next(error);
    }
  }

  async deleteChallenge(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const id = parsePositiveInt(req.params.id);
      const deleted = id === null ? false : await this.challengesRepo.delete(id);
      if (!deleted) {
        throw Errors.notFound('Challenge', 'CHALLENGE_NOT_FOUND');
      }

      res.status(204).send();
    } catch (error) {
      next(error);
    }
  }
}
