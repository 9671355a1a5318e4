import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yamljs';
import path from 'path';
import { config } from '../config/index.js';
import { createChallengesRoutes } from './routes/challenges.routes.js';
import {
  createChallengeParticipationsRoutes,
  createParticipationsRoutes,
} from './routes/participations.routes.js';
import { createUsersRoutes } from './routes/users.routes.js';
import { errorMiddleware } from './middleware/error.middleware.js';
import { loggingMiddleware } from './middleware/logging.middleware.js';
import { contextMiddleware } from './middleware/context.middleware.js';
import { ChallengesHandler } from '../handlers/challenges.handler.js';
import { ParticipationsHandler } from '../handlers/participations.handler.js';
import { NotificationsHandler } from '../handlers/notifications.handler.js';

export interface ServerDependencies {
  challengesHandler: ChallengesHandler;
  participationsHandler: ParticipationsHandler;
  notificationsHandler: NotificationsHandler;
}

export function createServer(dependencies: ServerDependencies): Express {
  const app = express();

  // Security middleware
  app.use(helmet());

  app.use(
    cors({
      origin: config.corsOrigin,
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Correlation-Id'],
      credentials: true,
    })
  );

  app.use(compression());

  app.use(express.json({ limit: '100kb' }));

  // Context middleware (must be before logging)
  app.use(contextMiddleware);

  app.use(loggingMiddleware);

  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
    });
  });

  app.get('/api/version', (req, res) => {
    res.json({
      version: '1.0.0',
      api: 'Challenge Participation API',
    });
  });

  // Resolved from the working directory so source and build runs find the same file
  const swaggerDocument = YAML.load(path.join(process.cwd(), 'swagger', 'swagger.yaml'));
  swaggerDocument.servers = [
    {
      url: `http://localhost:${config.port}/api`,
      description: `${config.nodeEnv} server`,
    },
  ];
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerDocument));

  // Mount API routes
  app.use(
    '/api/challenges/:challengeId/participations',
    createChallengeParticipationsRoutes(dependencies.participationsHandler)
  );
  app.use('/api/challenges', createChallengesRoutes(dependencies.challengesHandler));
  app.use('/api/participations', createParticipationsRoutes(dependencies.participationsHandler));
  app.use('/api/users', createUsersRoutes(dependencies.notificationsHandler));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: {
        code: 'NOT_FOUND',
        message: `Cannot ${req.method} ${req.path}`,
      },
    });
  });

  // Error handling middleware (must be last)
  app.use(errorMiddleware);

  return app;
}
