import express, { Express, RequestHandler } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import cookieParser from 'cookie-parser';
import { requestLogger } from './middleware/logger';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { HealthController } from './controllers/health.controller';
import { IntegrationController } from './controllers/integration.controller';
import { createRoutes } from './routes';

export interface AppDeps {
  healthController: HealthController;
  integrationController: IntegrationController;
  requireAuth: RequestHandler;
  corsOrigins: string[];
}

export function createApp(deps: AppDeps): Express {
  const app: Express = express();

  // Security middleware
  app.use(helmet());
  app.use(
    cors({
      origin: deps.corsOrigins.length > 0 ? deps.corsOrigins : false,
      credentials: true,
    })
  );
  app.use(cookieParser());

  // Body parsing
  app.use(express.json({ limit: '100kb' }));

  // Request logging
  app.use(requestLogger);

  // Routes
  app.use(
    '/',
    createRoutes({
      healthController: deps.healthController,
      integrationController: deps.integrationController,
      requireAuth: deps.requireAuth,
    })
  );

  // 404 handler
  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
