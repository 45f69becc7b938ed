import { Router, Request, Response } from 'express';
import redisClientManager from '../lib/redis/RedisClientManager';

export interface HealthDependencies {
  isPublisherRunning: () => boolean;
}

/**
 * Liveness endpoint; reports publisher and Redis state but never fails on them
 */
export function createHealthRouter({ isPublisherRunning }: HealthDependencies): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'airport-traffic-feed',
      publisher: isPublisherRunning() ? 'running' : 'stopped',
      redis: redisClientManager.getHealth(),
    });
  });

  return router;
}

export default createHealthRouter;
