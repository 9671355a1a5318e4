import { Router } from 'express';
import { ParticipationsHandler } from '../../handlers/participations.handler.js';
import { requireAdmin } from '../middleware/adminAuth.js';
import { validateIdParam } from '../middleware/validation.middleware.js';

export function createParticipationsRoutes(handler: ParticipationsHandler): Router {
  const router = Router();

  router.post('/', handler.createParticipation.bind(handler));
  router.get('/:id', validateIdParam('id'), handler.getParticipation.bind(handler));

  // Admin-only endpoint
  router.post(
    '/:id/accept',
    requireAdmin,
    validateIdParam('id'),
    handler.acceptParticipation.bind(handler)
  );

  return router;
}

/**
 * Mounted under /api/challenges/:challengeId/participations
 */
export function createChallengeParticipationsRoutes(handler: ParticipationsHandler): Router {
  const router = Router({ mergeParams: true }); // exposes :challengeId from the parent route

  router.get(
    '/',
    validateIdParam('challengeId'),
    handler.getChallengeParticipations.bind(handler)
  );

  return router;
}
