import { RequestHandler, Router } from 'express';
import { IntegrationController } from '../controllers/integration.controller';

export function createIntegrationRouter(
  integrationController: IntegrationController,
  requireAuth: RequestHandler
): Router {
  const router = Router();

  // Public: provider catalogue and the provider's redirect back to us
  router.get('/available', (req, res) => integrationController.listAvailable(req, res));
  router.get('/callback', (req, res) => integrationController.callback(req, res));

  router.get('/', requireAuth, (req, res) => integrationController.list(req, res));
  router.post('/:provider/connect', requireAuth, (req, res) => integrationController.connect(req, res));
  router.get('/:id/emails', requireAuth, (req, res) => integrationController.listEmails(req, res));
  router.post('/:id/execute', requireAuth, (req, res) => integrationController.execute(req, res));
  router.patch('/:id', requireAuth, (req, res) => integrationController.update(req, res));
  router.delete('/:id', requireAuth, (req, res) => integrationController.disconnect(req, res));

  return router;
}
