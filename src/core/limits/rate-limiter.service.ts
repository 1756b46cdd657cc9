import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { logger } from '../logger/logger.config';
import { delay } from '../utils/delay.util';

/**
 * Spaces out request starts to MEMBERFUL_API_REQUESTS_PER_SECOND and pauses
 * after repeated 429 responses.
 */
@Injectable()
export class RateLimiterService {
  private readonly logger = logger();
  private requestQueue: Array<() => void> = [];
  private isProcessing = false;
  private readonly minDelayBetweenRequests: number;
  private lastRequestTime = 0;
  private consecutiveRateLimits = 0;
  private readonly maxConsecutiveRateLimits = 3;
  private pauseUntil = 0;

  constructor(private readonly configService: ConfigService) {
    const requestsPerSecond = this.configService.get<number>(
      'MEMBERFUL_API_REQUESTS_PER_SECOND',
      2,
    );
    this.minDelayBetweenRequests = 1000 / Math.max(1, requestsPerSecond);
  }

  acquire(): Promise<void> {
    return new Promise((resolve) => {
      this.requestQueue.push(resolve);
      this.processQueue().catch((error: unknown) => {
        this.logger.error(
          { error: error instanceof Error ? error.message : String(error) },
          'Rate limiter queue failed',
        );
      });
    });
  }

  private async processQueue(): Promise<void> {
    if (this.isProcessing) {
      return;
    }

    this.isProcessing = true;

    try {
      let release = this.requestQueue.shift();
      while (release) {
        const now = Date.now();
        const waitForBackoff = Math.max(0, this.pauseUntil - now);
        const waitForSpacing = Math.max(
          0,
          this.minDelayBetweenRequests - (now - this.lastRequestTime),
        );
        const delayNeeded = Math.max(waitForBackoff, waitForSpacing);

        if (delayNeeded > 0) {
          await delay(delayNeeded);
        }

        this.lastRequestTime = Date.now();
        this.pauseUntil = 0;
        release();
        release = this.requestQueue.shift();
      }
    } finally {
      this.isProcessing = false;
    }
  }

  onRateLimitDetected(): void {
    this.consecutiveRateLimits++;
    if (this.consecutiveRateLimits >= this.maxConsecutiveRateLimits) {
      const backoffDelay = Math.min(this.minDelayBetweenRequests * 5, 10000);
      this.pauseUntil = Math.max(this.pauseUntil, Date.now() + backoffDelay);
      this.consecutiveRateLimits = 0;
      this.logger.warn({ backoffDelay }, 'Repeated rate limits, pausing requests');
    }
  }

  onSuccess(): void {
    if (this.consecutiveRateLimits > 0) {
      this.consecutiveRateLimits--;
    }
  }
}
