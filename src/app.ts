import express, { Express } from 'express';
import cors from 'cors';
import { ServiceConfig } from './config';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createHealthRouter, EngineStatus } from './routes/health';
import { createPdfRouter } from './routes/pdf';
import { RenderLifecycleManager } from './services/RenderLifecycleManager';

export interface AppDependencies {
  manager: RenderLifecycleManager;
  engine: EngineStatus;
  config: Pick<ServiceConfig, 'serviceName' | 'maxHtmlBytes'>;
}

export function createApp({ manager, engine, config }: AppDependencies): Express {
  const app = express();
  app.disable('x-powered-by');

  // Middleware
  app.use(cors());
  // JSON escaping can double the size of the html field; the html limit itself is enforced per request
  app.use(express.json({ limit: config.maxHtmlBytes * 2 }));

  // Routes
  app.use('/', createHealthRouter(config.serviceName, engine));
  app.use('/', createPdfRouter(manager));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
