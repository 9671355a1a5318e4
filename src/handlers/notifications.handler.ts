import { Request, Response, NextFunction } from 'express';
import { NotificationsRepository } from '../db/repositories/notifications.repository.js';
import { Notification, NotificationKind } from '../db/types/participation.types.js';
import { Errors } from '../utils/errors.js';
import { parsePositiveInt } from '../api/middleware/validation.middleware.js';

export interface NotificationResponse {
  id: number;
  recipientId: number;
  kind: NotificationKind;
  challengeId: number;
  participationId: number;
  readAt?: Date;
  createdAt: Date;
}

export class NotificationsHandler {
  constructor(private readonly notificationsRepo: Pick<NotificationsRepository, 'findByRecipient'>) {}

  private toResponse(notification: Notification): NotificationResponse {
    return {
      id: notification.id,
      recipientId: notification.recipient_id,
      kind: notification.kind,
      challengeId: notification.challenge_id,
      participationId: notification.participation_id,
      readAt: notification.read_at ? new Date(notification.read_at) : undefined,
      createdAt: new Date(notification.created_at),
    };
  }

  async getUserNotifications(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const userId = parsePositiveInt(req.params.userId);
      if (userId === null) {
        throw Errors.badRequest('userId must be a positive integer', 'userId');
      }

      const notifications = await this.notificationsRepo.findByRecipient(userId);
      res.json(notifications.map((n) => this.toResponse(n)));
    } catch (error) {
      next(error);
    }
  }
}
