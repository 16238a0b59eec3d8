import { Router } from 'express';
import { Services } from '../../container';
import { asyncHandler } from '../../middleware/asyncHandler';
import { createFilesController } from './files.controller';

export function createFilesRouter(services: Services): Router {
  const router = Router();
  const controller = createFilesController(services);

  router.get('/files', asyncHandler(controller.list));
  router.get('/files/:filename', asyncHandler(controller.get));
  router.post('/files/:filename/process', asyncHandler(controller.processFile));
  router.post('/files/:filename/email', asyncHandler(controller.emailFile));

  return router;
}
