import {
  Router, Request, Response, NextFunction,
} from 'express';
import { trafficParamsSchema } from '../schemas/opensky.schemas';
import type { TrafficHandlers } from '../messaging/TrafficPublisher';
import { buildTopic } from '../messaging/topics';

/**
 * GET /api/traffic/:direction/:airport
 * Same JSON body the publisher sends for `<direction>.<airport>`
 */
export function createTrafficRouter(handlers: TrafficHandlers): Router {
  const router = Router();

  router.get('/:direction/:airport', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { direction, airport } = trafficParamsSchema.parse(req.params);
      const handler = direction === 'arrivals' ? handlers.arrivalsHandler : handlers.departuresHandler;
      const message = await handler(airport, {
        topic: buildTopic(direction, airport),
        requestedAt: new Date(),
      });

      res.type(message.contentType).send(message.body);
    } catch (err) {
      next(err);
    }
  });

  return router;
}

export default createTrafficRouter;
