import { Router } from 'express';
import { Services } from '../../container';
import { asyncHandler } from '../../middleware/asyncHandler';
import { createWebhookController } from './webhook.controller';

export function createWebhookRouter(services: Services): Router {
  const router = Router();
  const controller = createWebhookController(services);

  router.post('/webhook', asyncHandler(controller.receive));
  router.post('/webhook-to-pdf', asyncHandler(controller.receiveToPdf));
  router.post('/webhook-to-email', asyncHandler(controller.receiveToEmail));

  return router;
}
