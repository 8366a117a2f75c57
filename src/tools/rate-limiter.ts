import type { AxiosResponse } from 'axios';

export class RateLimiter {
  /** Milliseconds to wait before retrying, from `Retry-After` (seconds or HTTP date) */
  static getWaitTime(response: AxiosResponse, now: number = Date.now()): number | null {
    if (!response || !response.headers) return null;
    const retryAfter: unknown = response.headers['retry-after'];
    if (typeof retryAfter !== 'string' && typeof retryAfter !== 'number') return null;

    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds)) {
      return Math.max(seconds * 1000, 0);
    }

    const date = Date.parse(String(retryAfter));
    if (Number.isFinite(date)) {
      return Math.max(date - now, 0);
    }

    return null;
  }

  static async sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
