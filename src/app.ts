import cors from 'cors';
import express from 'express';
import morgan from 'morgan';
import helmet from 'helmet';
import { Services } from './container';
import { createApiRouter } from './routes';
import errorHandler from './middleware/error.middleware';

export function createApp(services: Services) {
  const app = express();

  app.use(
    cors({
      origin: services.config.corsOrigins,
      credentials: true,
    })
  );
  app.use(helmet());
  app.use(express.json({ limit: '1mb' }));
  app.use(morgan('dev'));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'health-score-service', timestamp: new Date().toISOString() });
  });

  app.use('/api', createApiRouter(services));

  app.use((req, res) => {
    res.status(404).json({ success: false, error: `Not found: ${req.path}` });
  });

  app.use(errorHandler);

  return app;
}
