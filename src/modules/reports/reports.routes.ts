import { Router } from 'express';
import { Services } from '../../container';
import { asyncHandler } from '../../middleware/asyncHandler';
import { createReportsController } from './reports.controller';

export function createReportsRouter(services: Services): Router {
  const router = Router();
  const controller = createReportsController(services);

  router.get('/download-pdf', asyncHandler(controller.downloadPdf));
  router.get('/view-chart', asyncHandler(controller.viewChart));

  return router;
}
