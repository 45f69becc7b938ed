import config from '../config';
import logger from '../utils/logger';
import { getErrorMessage } from '../utils/errors';
import redisClientManager from '../lib/redis/RedisClientManager';
import type { DeliveryContext, Message, TrafficHandler } from '../types/airTraffic.types';
import { parseTopic, topicsForAirports } from './topics';

export interface TrafficHandlers {
  arrivalsHandler: TrafficHandler;
  departuresHandler: TrafficHandler;
}

/**
 * Anything that can PUBLISH a string on a channel (an ioredis client in production)
 */
export interface ChannelPublisher {
  publish(channel: string, message: string): Promise<number>;
}

export interface TrafficPublisherOptions {
  handlers: TrafficHandlers;
  airports?: string[];
  channelPrefix?: string;
  intervalSeconds?: number;
  publisher?: ChannelPublisher;
}

/**
 * Routes `arrivals.<ICAO>` / `departures.<ICAO>` topics to the traffic handlers
 * and periodically publishes every configured topic to Redis.
 */
export class TrafficPublisher {
  private readonly handlers: TrafficHandlers;

  private readonly topics: string[];

  private readonly channelPrefix: string;

  private readonly intervalMs: number;

  private readonly publisherOverride?: ChannelPublisher;

  private timer: NodeJS.Timeout | null = null;

  private cycleInProgress = false;

  constructor(options: TrafficPublisherOptions) {
    this.handlers = options.handlers;
    this.topics = topicsForAirports(options.airports ?? config.publisher.airports);
    this.channelPrefix = options.channelPrefix ?? config.publisher.channelPrefix;
    this.intervalMs = (options.intervalSeconds ?? config.publisher.intervalSeconds) * 1000;
    this.publisherOverride = options.publisher;
  }

  getTopics(): string[] {
    return [...this.topics];
  }

  channelFor(topic: string): string {
    return `${this.channelPrefix}:${topic}`;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Invoke the handler for a topic. Unknown topics resolve to null.
   */
  async dispatch(topic: string, context?: DeliveryContext): Promise<Message | null> {
    const parsed = parseTopic(topic);
    if (!parsed) {
      logger.warn('No handler for topic', { topic });
      return null;
    }

    const handler = parsed.direction === 'arrivals'
      ? this.handlers.arrivalsHandler
      : this.handlers.departuresHandler;
    return handler(parsed.airport, context);
  }

  /**
   * Publish every topic once. Returns how many messages went out.
   */
  async publishAll(): Promise<number> {
    const publisher = this.getPublisher();
    let published = 0;

    for (const topic of this.topics) {
      try {
        const message = await this.dispatch(topic, { topic, requestedAt: new Date() });
        if (message) {
          await publisher.publish(this.channelFor(topic), message.body);
          published += 1;
        }
      } catch (error) {
        logger.error('Failed to publish air traffic', { topic, error: getErrorMessage(error) });
      }
    }

    logger.debug('Published air traffic cycle', { published, topics: this.topics.length });
    return published;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    if (this.topics.length === 0) {
      logger.warn('TrafficPublisher not started: no airports configured');
      return;
    }

    this.timer = setInterval(() => this.runCycle(), this.intervalMs);
    this.runCycle();
    logger.info('TrafficPublisher started', {
      topics: this.topics,
      intervalMs: this.intervalMs,
      channelPrefix: this.channelPrefix,
    });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('TrafficPublisher stopped');
    }
  }

  private runCycle(): void {
    // A slow upstream must not stack cycles
    if (this.cycleInProgress) {
      logger.debug('Skipping publish cycle; previous cycle still running');
      return;
    }
    this.cycleInProgress = true;
    this.publishAll()
      .finally(() => {
        this.cycleInProgress = false;
      })
      .catch((error: unknown) => {
        logger.error('Publish cycle failed', { error: getErrorMessage(error) });
      });
  }

  // Without the offline queue a PUBLISH fails fast while Redis is down instead of hanging the cycle
  private getPublisher(): ChannelPublisher {
    return this.publisherOverride
      ?? redisClientManager.getClient('traffic:publisher', config.publisher.redisUrl, {
        enableOfflineQueue: false,
      });
  }
}

export default TrafficPublisher;
