import { Router } from 'express';
import { NotificationsHandler } from '../../handlers/notifications.handler.js';
import { validateIdParam } from '../middleware/validation.middleware.js';

export function createUsersRoutes(handler: NotificationsHandler): Router {
  const router = Router();

  router.get(
    '/:userId/notifications',
    validateIdParam('userId'),
    handler.getUserNotifications.bind(handler)
  );

  return router;
}
