import { Router, Request, Response } from 'express';
import { MetricsCollector } from '../services/metricsCollector';

const router = Router();

/**
 * GET /api/metrics
 * In-memory detection statistics
 */
router.get('/', (req: Request, res: Response) => {
  res.status(200).json({
    metrics: MetricsCollector.getStats(),
    timestamp: new Date().toISOString(),
  });
});

export const metricsRouter = router;
