import { setTestNow } from '../shared/clock';
import { InMemoryKeyValueStore, reconnectDelay } from '../gateway/store/keyValueStore';
import { TEST_NOW } from './helpers';

let store: InMemoryKeyValueStore;

function advanceSeconds(seconds: number): void {
  setTestNow(new Date(TEST_NOW.getTime() + seconds * 1000));
}

beforeEach(() => {
  setTestNow(TEST_NOW);
  store = new InMemoryKeyValueStore();
});

afterEach(() => {
  setTestNow(null);
});

describe('InMemoryKeyValueStore', () => {
  test('set without TTL keeps the value', async () => {
    await store.set('k', 'v');
    advanceSeconds(365 * 24 * 3600);
    await expect(store.get('k')).resolves.toBe('v');
  });

  test('value disappears once its TTL elapses', async () => {
    await store.set('k', 'v', 10);
    advanceSeconds(9);
    await expect(store.exists('k')).resolves.toBe(true);
    advanceSeconds(10);
    await expect(store.exists('k')).resolves.toBe(false);
  });

  test('setIfAbsent writes only the first time', async () => {
    await expect(store.setIfAbsent('k', 'first')).resolves.toBe(true);
    await expect(store.setIfAbsent('k', 'second')).resolves.toBe(false);
    await expect(store.get('k')).resolves.toBe('first');
  });

  test('setIfAbsent succeeds over an expired entry', async () => {
    await store.set('k', 'old', 5);
    advanceSeconds(5);
    await expect(store.setIfAbsent('k', 'new')).resolves.toBe(true);
    await expect(store.get('k')).resolves.toBe('new');
  });

  test('take hands the value to exactly one caller', async () => {
    await store.set('k', 'v');
    const results = await Promise.all([store.take('k'), store.take('k'), store.take('k')]);

    expect(results.filter((result) => result === 'v')).toHaveLength(1);
    await expect(store.exists('k')).resolves.toBe(false);
  });

  test('delete reports whether a live key was removed', async () => {
    await store.set('k', 'v');
    await expect(store.delete('k')).resolves.toBe(true);
    await expect(store.delete('k')).resolves.toBe(false);
  });

  test('incrementWithExpiry keeps the TTL set by the first increment', async () => {
    await expect(store.incrementWithExpiry('c', 30)).resolves.toBe(1);
    advanceSeconds(20);
    await expect(store.incrementWithExpiry('c', 30)).resolves.toBe(2);
    advanceSeconds(30);
    await expect(store.incrementWithExpiry('c', 30)).resolves.toBe(1);
  });
});

describe('reconnectDelay', () => {
  test('backs off linearly up to a two second cap', () => {
    expect([1, 3, 4, 10, 20, 1000].map(reconnectDelay)).toEqual([100, 300, 400, 1000, 2000, 2000]);
  });

  test('keeps reconnecting however long the outage lasts', () => {
    for (let attempt = 1; attempt <= 500; attempt++) {
      expect(reconnectDelay(attempt)).toBeGreaterThan(0);
    }
  });
});
