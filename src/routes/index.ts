import express, { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import type { TelemetryAnalyticsService } from '../analytics';
import type { AnalyticsResult } from '../analytics/types';
import type { Endpoint, ServiceMetrics } from '../services/metrics';

/**
 * Results go out with the field names devices and dashboards already use
 */
export function toWireResult(result: AnalyticsResult) {
  return {
    device_id: result.entityId,
    rolling_average: result.rollingAverage,
    z_score: result.zScore,
    is_anomaly: result.isAnomaly,
    timestamp: result.timestamp,
    value: result.value,
  };
}

/**
 * Counts the request and observes its latency once the response is sent,
 * or once the connection closes when the client aborts first.
 * Mounted ahead of the body parser so malformed bodies are counted too.
 */
export function track(metrics: ServiceMetrics | undefined, endpoint: Endpoint): RequestHandler {
  return (_req: Request, res: Response, next: NextFunction) => {
    if (metrics) {
      const done = metrics.trackRequest(endpoint);
      let observed = false;
      const observe = () => {
        if (!observed) {
          observed = true;
          done();
        }
      };
      res.once('finish', observe);
      res.once('close', observe);
    }
    next();
  };
}

export function createAnalyticsRouter(service: TelemetryAnalyticsService, metrics?: ServiceMetrics): Router {
  const router = Router();

  router.post('/metrics', track(metrics, '/metrics'), express.json(), (req: Request, res: Response) => {
    const outcome = service.ingestPayload(req.body);

    if (outcome.status === 'rejected') {
      return res.status(400).json({ error: outcome.reason });
    }

    res.status(202).json({
      status: 'accepted',
      message: 'Metric received and queued for processing',
    });
  });

  router.get('/analyze', track(metrics, '/analyze'), (req: Request, res: Response) => {
    const deviceId = typeof req.query.device_id === 'string' ? req.query.device_id : '';
    if (!deviceId) {
      return res.status(400).json({ error: 'device_id parameter is required' });
    }

    const report = service.queryRollingAverage(deviceId);
    res.json({
      device_id: report.entityId,
      rolling_average: report.rollingAverage,
      window_size: report.windowSize,
    });
  });

  router.get('/anomalies', track(metrics, '/anomalies'), async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await service.listAnomalies();
      res.json({
        count: report.count,
        anomalies: report.anomalies.map(toWireResult),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}

export default createAnalyticsRouter;
