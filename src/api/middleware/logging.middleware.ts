import { randomUUID } from 'crypto';
import { Request, Response } from 'express';
import { pinoHttp } from 'pino-http';
import { logger } from '../../utils/logger.js';

/**
 * HTTP request/response logging middleware
 */
export const loggingMiddleware = pinoHttp<Request, Response>({
  logger,

  // Reuse the id set by the context middleware so request and workflow logs line up
  genReqId: (req) => req.correlationId ?? randomUUID(),

  autoLogging: {
    ignore: (req) => req.url === '/health',
  },

  customLogLevel: (req, res, err) => {
    if (err || res.statusCode >= 500) return 'error';
    if (res.statusCode >= 400) return 'warn';
    return 'info';
  },

  serializers: {
    req: (req) => ({
      method: req.method,
      url: req.url,
      headers: {
        'user-agent': req.headers['user-agent'],
        'content-type': req.headers['content-type'],
      },
    }),
    res: (res) => ({
      statusCode: res.statusCode,
    }),
  },

  redact: ['req.headers.authorization', 'req.headers.cookie'],
});
