import type { Express } from 'express';
import { createAnalysisController } from './controllers/analysisController';
import { createAnalysisRoutes } from './routes/analysisRoutes';
import type { SettlementDataSource } from './services/elexon';

export function registerRoutes(app: Express, dataSource: SettlementDataSource): void {
  // Health check
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', time: new Date().toISOString() });
  });

  // Settlement data, analysis and dashboard endpoints
  app.use('/api', createAnalysisRoutes(createAnalysisController(dataSource)));
}
