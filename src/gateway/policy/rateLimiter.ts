import { nowSeconds } from '../../shared/clock';
import { RateLimitDecision } from '../../shared/types';
import { KeyValueStore } from '../store/keyValueStore';

/**
 * Fixed-window counter. The window opens with the first request for a
 * discriminator and closes when the counter's TTL lapses.
 *
 * Known property of the algorithm: a burst straddling the boundary between
 * two windows can admit up to 2 × limit requests in a short span.
 */
export class RateLimiter {
  constructor(private readonly store: KeyValueStore) {}

  async allow(discriminator: string, limit: number, windowSeconds: number): Promise<RateLimitDecision> {
    const count = await this.store.incrementWithExpiry(`ratelimit:${discriminator}`, windowSeconds);
    // Approximation: the real reset is the counter's TTL, which would cost another round trip
    const resetAt = nowSeconds() + windowSeconds;

    if (count > limit) {
      return { allowed: false, limit, remaining: 0, resetAt };
    }
    return { allowed: true, limit, remaining: limit - count, resetAt };
  }
}
