import axios, { AxiosInstance } from 'axios';

import { LastFmConfig } from './config';

/**
 * Token-bucket rate limiter.
 * Allows bursting up to `maxTokens` requests, then throttles to
 * `refillRatePerSecond` requests per second on average.
 */
export class TokenBucket {
  private tokens: number;
  private readonly maxTokens: number;
  private readonly refillRatePerMs: number;
  private lastRefill: number;

  constructor(maxTokens: number, refillRatePerSecond: number) {
    this.maxTokens = maxTokens;
    this.tokens = maxTokens;
    this.refillRatePerMs = refillRatePerSecond / 1000;
    this.lastRefill = Date.now();
  }

  async acquire(): Promise<void> {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return;
    }

    // Wait until a token is available
    const waitMs = Math.ceil((1 - this.tokens) / this.refillRatePerMs);
    await new Promise(resolve => setTimeout(resolve, waitMs));
    this.refill();
    this.tokens -= 1;
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = now - this.lastRefill;
    this.tokens = Math.min(
      this.maxTokens,
      this.tokens + elapsed * this.refillRatePerMs
    );
    this.lastRefill = now;
  }
}

const BURST_SIZE = 5;

/**
 * Axios instance for Last.fm API calls. Every request carries the configured
 * timeout; when `requestsPerSecond` is positive, requests go through a token
 * bucket (burst of 5).
 */
export function createLastFmAxios(config: LastFmConfig): AxiosInstance {
  const instance = axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    headers: {
      'User-Agent': 'ListeningTimeTracker/1.0',
    },
  });

  if (config.requestsPerSecond > 0) {
    const bucket = new TokenBucket(BURST_SIZE, config.requestsPerSecond);
    instance.interceptors.request.use(async requestConfig => {
      await bucket.acquire();
      return requestConfig;
    });
  }

  return instance;
}
