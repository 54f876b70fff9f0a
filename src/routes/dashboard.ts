import express, { type Router } from 'express';
import { sendError } from '../middleware/errorHandler.js';
import type { AppConfig } from '../shared/config.js';
import type { DashboardService } from '../services/dashboardService.js';
import { buildQuerySchemas, parseQuery } from './dashboardQuery.js';

export function createDashboardRouter(
  service: DashboardService,
  defaults: AppConfig['dashboard']
): Router {
  const router = express.Router();
  const schemas = buildQuerySchemas(defaults);

  // KPI summary
  router.get('/metrics', async (req, res) => {
    try {
      const { range } = parseQuery(schemas.range, req.query);
      const data = await service.getMetricsSummary(range);

      res.json({ success: true, data });
    } catch (error) {
      sendError(res, error, 'Metrics summary error');
    }
  });

  // Daily series for the trend charts
  router.get('/daily', async (req, res) => {
    try {
      const { range } = parseQuery(schemas.range, req.query);
      const data = await service.getDailyMetrics(range);

      res.json({ success: true, data });
    } catch (error) {
      sendError(res, error, 'Daily metrics error');
    }
  });

  router.get('/distribution', async (req, res) => {
    try {
      const { range } = parseQuery(schemas.range, req.query);
      const data = await service.getDistributions(range);

      res.json({ success: true, data });
    } catch (error) {
      sendError(res, error, 'Distribution error');
    }
  });

  // Summary, series and distributions in one response
  router.get('/overview', async (req, res) => {
    try {
      const { range } = parseQuery(schemas.range, req.query);
      const data = await service.getMetricsOverview(range);

      res.json({ success: true, data });
    } catch (error) {
      sendError(res, error, 'Metrics overview error');
    }
  });

  // Message browser
  router.get('/messages', async (req, res) => {
    try {
      const query = parseQuery(schemas.messages, req.query);
      const data = await service.browseMessages(
        query.range,
        {
          search: query.search,
          questionType: query.question_type,
          complexity: query.complexity,
          highRiskOnly: query.high_risk,
        },
        query.page,
        query.limit
      );

      res.json({ success: true, data });
    } catch (error) {
      sendError(res, error, 'Message browser error');
    }
  });

  // Flagged issues triage
  router.get('/flagged', async (req, res) => {
    try {
      const { range, threshold, limit } = parseQuery(schemas.flagged, req.query);
      const data = await service.getFlaggedMessages(range, threshold, limit);

      res.json({ success: true, data });
    } catch (error) {
      sendError(res, error, 'Flagged issues error');
    }
  });

  return router;
}
