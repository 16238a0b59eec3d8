import { Router } from 'express';
import { Services } from '../container';
import { createWebhookRouter } from '../modules/webhook/webhook.routes';
import { createFilesRouter } from '../modules/files/files.routes';
import { createReportsRouter } from '../modules/reports/reports.routes';

export function createApiRouter(services: Services): Router {
  const router = Router();

  router.use(createWebhookRouter(services));
  router.use(createFilesRouter(services));
  router.use(createReportsRouter(services));

  return router;
}
