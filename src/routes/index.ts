import { RequestHandler, Router } from 'express';
import { HealthController } from '../controllers/health.controller';
import { IntegrationController } from '../controllers/integration.controller';
import { createHealthRouter } from './health.routes';
import { createIntegrationRouter } from './integration.routes';

export interface RouteDeps {
  healthController: HealthController;
  integrationController: IntegrationController;
  requireAuth: RequestHandler;
}

export function createRoutes(deps: RouteDeps): Router {
  const router = Router();

  // Mount routes
  router.use('/health', createHealthRouter(deps.healthController));
  router.use('/api/v1/integrations', createIntegrationRouter(deps.integrationController, deps.requireAuth));

  return router;
}
