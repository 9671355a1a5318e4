import { Router } from 'express';
import { ChallengesHandler } from '../../handlers/challenges.handler.js';
import { requireAdmin } from '../middleware/adminAuth.js';
import { validateIdParam } from '../middleware/validation.middleware.js';

export function createChallengesRoutes(handler: ChallengesHandler): Router {
  const router = Router();

  // Public endpoints
  router.get('/:id', validateIdParam('id'), handler.getChallenge.bind(handler));
  router.get('/', handler.getAllChallenges.bind(handler));

  // Admin-only endpoints
  router.post('/', requireAdmin, handler.createChallenge.bind(handler));
  router.delete('/:id', requireAdmin, validateIdParam('id'), handler.deleteChallenge.bind(handler));

  return router;
}
