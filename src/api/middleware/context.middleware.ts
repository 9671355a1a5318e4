import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { withContext } from '../../utils/logger.js';
import '../../types/index.js';

/**
 * Attaches a correlation id to the request and to every log line written while
 * handling it. Jobs enqueued during the request carry the same id.
 */
export const contextMiddleware = (req: Request, res: Response, next: NextFunction) => {
  const header = req.headers['x-correlation-id'];
  const correlationId = typeof header === 'string' && header !== '' ? header : randomUUID();

  req.correlationId = correlationId;
  res.setHeader('x-correlation-id', correlationId);

  withContext({ correlationId }, () => next());
};
