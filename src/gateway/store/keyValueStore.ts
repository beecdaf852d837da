import Redis from 'ioredis';
import { getNow } from '../../shared/clock';
import { StoreUnavailableError } from '../../shared/errors';

/**
 * Capabilities the auth core needs from its backing store. Every operation
 * must be linearizable from the point of view of concurrent callers; the
 * application layer adds no locking of its own.
 *
 * TTLs are in seconds. An omitted TTL means the key never expires.
 */
export interface KeyValueStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  exists(key: string): Promise<boolean>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  /** Writes only when the key is absent. Returns whether the write happened. */
  setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  /** Atomically reads and deletes a key; at most one caller ever sees the value. */
  take(key: string): Promise<string | null>;
  /**
   * Atomically increments a counter and returns the new count. The TTL is
   * applied in the same step when the increment creates the key.
   */
  incrementWithExpiry(key: string, windowSeconds: number): Promise<number>;
}

interface Entry {
  value: string;
  expiresAtMs: number | null;
}

/**
 * In-process implementation. Each method runs without awaiting between its
 * read and write, so the event loop makes it atomic.
 */
export class InMemoryKeyValueStore implements KeyValueStore {
  private entries: Map<string, Entry> = new Map();

  async connect(): Promise<void> {
    // No-op for in-memory store
  }

  async disconnect(): Promise<void> {
    this.entries.clear();
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== null;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.entries.set(key, { value, expiresAtMs: this.expiry(ttlSeconds) });
  }

  async setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
    if (this.live(key)) return false;
    this.entries.set(key, { value, expiresAtMs: this.expiry(ttlSeconds) });
    return true;
  }

  async delete(key: string): Promise<boolean> {
    const existed = this.live(key) !== null;
    this.entries.delete(key);
    return existed;
  }

  async take(key: string): Promise<string | null> {
    const entry = this.live(key);
    if (!entry) return null;
    this.entries.delete(key);
    return entry.value;
  }

  async incrementWithExpiry(key: string, windowSeconds: number): Promise<number> {
    const entry = this.live(key);
    if (!entry) {
      this.entries.set(key, { value: '1', expiresAtMs: this.expiry(windowSeconds) });
      return 1;
    }
    const count = parseInt(entry.value, 10) + 1;
    entry.value = String(count);
    return count;
  }

  private live(key: string): Entry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAtMs !== null && entry.expiresAtMs <= getNow().getTime()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  private expiry(ttlSeconds?: number): number | null {
    return ttlSeconds === undefined ? null : getNow().getTime() + ttlSeconds * 1000;
  }
}

// INCR and EXPIRE in one server-side step: no window where a counter exists
// without its TTL, and no read-then-write race between callers.
const INCREMENT_WITH_EXPIRY_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
if count == 1 then
  redis.call('EXPIRE', KEYS[1], ARGV[1])
end
return count
`;

/**
 * Reconnect backoff for the Redis client. Never gives up: returning null
 * would end the connection for good and turn a short outage into a
 * permanent one.
 */
export function reconnectDelay(attempt: number): number {
  return Math.min(attempt * 100, 2000);
}

export interface RedisStoreOptions {
  commandTimeoutMs: number;
}

export class RedisKeyValueStore implements KeyValueStore {
  private client: Redis | null = null;

  constructor(
    private readonly url: string,
    private readonly options: RedisStoreOptions,
  ) {}

  async connect(): Promise<void> {
    this.client = new Redis(this.url, {
      commandTimeout: this.options.commandTimeoutMs,
      maxRetriesPerRequest: 1,
      retryStrategy: reconnectDelay,
    });

    await this.run('ping', (client) => client.ping());
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
    }
  }

  async exists(key: string): Promise<boolean> {
    const result = await this.run('exists', (client) => client.exists(key));
    return result === 1;
  }

  async get(key: string): Promise<string | null> {
    return this.run('get', (client) => client.get(key));
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    await this.run('set', (client) =>
      ttlSeconds === undefined ? client.set(key, value) : client.set(key, value, 'EX', ttlSeconds),
    );
  }

  async setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
    const result = await this.run('setIfAbsent', (client) =>
      ttlSeconds === undefined
        ? client.set(key, value, 'NX')
        : client.set(key, value, 'EX', ttlSeconds, 'NX'),
    );
    return result === 'OK';
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.run('delete', (client) => client.del(key));
    return removed > 0;
  }

  async take(key: string): Promise<string | null> {
    return this.run('take', (client) => client.getdel(key));
  }

  async incrementWithExpiry(key: string, windowSeconds: number): Promise<number> {
    const result = await this.run('incrementWithExpiry', (client) =>
      client.eval(INCREMENT_WITH_EXPIRY_SCRIPT, 1, key, windowSeconds),
    );
    if (typeof result !== 'number') {
      throw new StoreUnavailableError('incrementWithExpiry', new Error(`Unexpected script reply: ${String(result)}`));
    }
    return result;
  }

  private async run<T>(operation: string, command: (client: Redis) => Promise<T>): Promise<T> {
    if (!this.client) throw new StoreUnavailableError(operation, new Error('Redis not connected'));
    try {
      return await command(this.client);
    } catch (error) {
      throw new StoreUnavailableError(operation, error);
    }
  }
}
