import { createServer } from 'http';
import config from './config';
import createApp from './app';
import AirTrafficService from './services/AirTrafficService';
import TrafficPublisher from './messaging/TrafficPublisher';
import redisClientManager from './lib/redis/RedisClientManager';
import logger from './utils/logger';
import { getErrorMessage } from './utils/errors';

const airTraffic = new AirTrafficService({
  trafficTimeSpanInDays: config.traffic.timeSpanInDays,
});

const publisher = new TrafficPublisher({ handlers: airTraffic });

const app = createApp({
  handlers: airTraffic,
  isPublisherRunning: () => publisher.isRunning(),
});
const server = createServer(app);

function startServer(): void {
  server.listen(config.server.port, config.server.host, () => {
    logger.info('Server listening', {
      host: config.server.host,
      port: config.server.port,
      env: config.server.env,
      trafficTimeSpanInDays: airTraffic.trafficTimeSpanInDays,
    });
  });

  if (config.publisher.enabled) {
    publisher.start();
  } else {
    logger.info('TrafficPublisher disabled via configuration');
  }
}

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down gracefully`);
  publisher.stop();
  server.close();
  redisClientManager.disconnect()
    .catch((error: unknown) => {
      logger.error('Error disconnecting Redis', { error: getErrorMessage(error) });
    })
    .finally(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Rejection', { reason: getErrorMessage(reason) });
});

startServer();
