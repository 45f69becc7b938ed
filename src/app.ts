import express, { Express } from 'express';
import errorHandler from './middlewares/errorHandler';
import requestLogger from './middlewares/requestLogger';
import { createHealthRouter, type HealthDependencies } from './routes/health.routes';
import { createTrafficRouter } from './routes/traffic.routes';
import type { TrafficHandlers } from './messaging/TrafficPublisher';

export interface AppDependencies extends HealthDependencies {
  handlers: TrafficHandlers;
}

export function createApp({ handlers, isPublisherRunning }: AppDependencies): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestLogger);

  app.use('/', createHealthRouter({ isPublisherRunning }));
  app.use('/api/traffic', createTrafficRouter(handlers));

  app.use(errorHandler);

  return app;
}

export default createApp;
