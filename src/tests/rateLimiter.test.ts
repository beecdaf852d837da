import { setTestNow } from '../shared/clock';
import { RateLimiter } from '../gateway/policy/rateLimiter';
import { InMemoryKeyValueStore } from '../gateway/store/keyValueStore';
import { TEST_NOW, TEST_NOW_SECONDS } from './helpers';

let store: InMemoryKeyValueStore;
let limiter: RateLimiter;

beforeEach(() => {
  setTestNow(TEST_NOW);
  store = new InMemoryKeyValueStore();
  limiter = new RateLimiter(store);
});

afterEach(() => {
  setTestNow(null);
});

describe('RateLimiter', () => {
  test('remaining counts down to zero, then requests are denied', async () => {
    const remaining: number[] = [];
    for (let i = 0; i < 5; i++) {
      const decision = await limiter.allow('user:u1', 5, 60);
      expect(decision.allowed).toBe(true);
      remaining.push(decision.remaining);
    }
    expect(remaining).toEqual([4, 3, 2, 1, 0]);

    await expect(limiter.allow('user:u1', 5, 60)).resolves.toEqual({
      allowed: false,
      limit: 5,
      remaining: 0,
      resetAt: TEST_NOW_SECONDS + 60,
    });
  });

  test('discriminators are counted independently', async () => {
    await limiter.allow('user:u1', 1, 60);
    const other = await limiter.allow('user:u2', 1, 60);

    expect(other.allowed).toBe(true);
    expect((await limiter.allow('user:u1', 1, 60)).allowed).toBe(false);
  });

  test('counter lives under the ratelimit key with the window as TTL', async () => {
    await limiter.allow('ip:10.0.0.1', 10, 60);
    await expect(store.get('ratelimit:ip:10.0.0.1')).resolves.toBe('1');

    setTestNow(new Date(TEST_NOW.getTime() + 59 * 1000));
    await expect(store.get('ratelimit:ip:10.0.0.1')).resolves.toBe('1');

    setTestNow(new Date(TEST_NOW.getTime() + 60 * 1000));
    await expect(store.get('ratelimit:ip:10.0.0.1')).resolves.toBeNull();
  });

  test('a new window starts once the previous one lapses', async () => {
    await limiter.allow('user:u1', 2, 60);
    await limiter.allow('user:u1', 2, 60);
    expect((await limiter.allow('user:u1', 2, 60)).allowed).toBe(false);

    setTestNow(new Date(TEST_NOW.getTime() + 60 * 1000));
    const decision = await limiter.allow('user:u1', 2, 60);

    expect(decision).toEqual({ allowed: true, limit: 2, remaining: 1, resetAt: TEST_NOW_SECONDS + 120 });
  });

  test('concurrent requests never admit more than the limit', async () => {
    const decisions = await Promise.all(Array.from({ length: 10 }, () => limiter.allow('user:burst', 5, 60)));

    expect(decisions.filter((decision) => decision.allowed)).toHaveLength(5);
    expect(decisions.filter((decision) => !decision.allowed)).toHaveLength(5);
  });
});
