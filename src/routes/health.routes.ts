import { Router } from 'express';
import { HealthController } from '../controllers/health.controller';

export function createHealthRouter(healthController: HealthController): Router {
  const router = Router();

  router.get('/', (req, res) => healthController.check(req, res));
  router.get('/dependencies', (req, res) => healthController.checkDependencies(req, res));

  return router;
}
