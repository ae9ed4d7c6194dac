import express, { type Express } from 'express';
import { errorHandler } from './middleware/errorHandler';
import { performanceMonitor } from './middleware/performanceMonitor';
import { requestLogger } from './middleware/requestLogger';
import { registerRoutes } from './routes';
import type { SettlementDataSource } from './services/elexon';

export function createApp(dataSource: SettlementDataSource): Express {
  const app = express();
  app.use(express.json());

  // Request logging first so every request is captured
  app.use(requestLogger);
  app.use(performanceMonitor);

  registerRoutes(app, dataSource);

  // Must come after the routes
  app.use(errorHandler);

  return app;
}
