import cors from 'cors';
import express, { type Express } from 'express';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestTiming } from './middleware/requestTiming.js';
import { createDashboardRouter } from './routes/dashboard.js';
import { DashboardService } from './services/dashboardService.js';
import { config, type AppConfig } from './shared/config.js';

export const SERVICE_NAME = 'QA Eval Dashboard';
export const SERVICE_VERSION = '1.0.0';

export function createApp(
  service: DashboardService = new DashboardService(),
  dashboard: AppConfig['dashboard'] = config.dashboard
): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(requestTiming);

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
    });
  });

  app.use('/api', createDashboardRouter(service, dashboard));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
