import logger from '../utils/logger';

/**
 * Tracks OpenSky 429 responses and blocks further calls until the backoff expires
 */
export class RateLimitManager {
  private blockedUntil: number | null = null;

  private consecutiveFailures = 0;

  constructor(
    private readonly baseBackoffSeconds = 300,
    private readonly maxBackoffSeconds = 3600,
  ) {}

  isRateLimited(): boolean {
    if (!this.blockedUntil) return false;

    if (Date.now() < this.blockedUntil) {
      return true;
    }

    // Failure count survives until a request succeeds so the next 429 backs off further
    this.blockedUntil = null;
    logger.info('OpenSky rate limit has expired, resuming requests');
    return false;
  }

  getSecondsUntilRetry(): number | null {
    if (!this.blockedUntil) return null;

    const now = Date.now();
    if (now >= this.blockedUntil) return 0;

    return Math.ceil((this.blockedUntil - now) / 1000);
  }

  /**
   * Record a 429. The server's retry-after wins over exponential backoff.
   */
  recordRateLimit(retryAfterSeconds: number | null = null): number {
    this.consecutiveFailures += 1;

    let backoffSeconds: number;
    if (retryAfterSeconds && retryAfterSeconds > 0) {
      backoffSeconds = retryAfterSeconds;
    } else {
      backoffSeconds = Math.min(
        this.baseBackoffSeconds * 2 ** (this.consecutiveFailures - 1),
        this.maxBackoffSeconds,
      );
    }

    this.blockedUntil = Date.now() + backoffSeconds * 1000;
    logger.warn('OpenSky rate limit hit', {
      consecutiveFailures: this.consecutiveFailures,
      backoffSeconds,
      source: retryAfterSeconds ? 'retry-after' : 'exponential',
      retryAt: new Date(this.blockedUntil).toISOString(),
    });
    return backoffSeconds;
  }

  recordSuccess(): void {
    if (this.consecutiveFailures > 0) {
      logger.info('OpenSky request succeeded, resetting failure count', {
        previousFailures: this.consecutiveFailures,
      });
      this.consecutiveFailures = 0;
    }
    this.blockedUntil = null;
  }
}

export default RateLimitManager;
